import { Injectable } from '@nestjs/common';
import type { Response } from 'express';
import { invalidParamException } from '../../exception/business-exception.util';
import type { HttpRequest } from '../../http/http-request';
import { HEADER_TENANT_ID } from '../../http/web-framework.utils';
import { FilterChain, OncePerRequestFilter } from '../web-filter';
import { WebFilterName, WebFilterOrder } from '../web-filter-order';

/**
 * 租户上下文过滤器
 *
 * 解析 tenant-id 请求头写入请求上下文
 */
@Injectable()
export class TenantContextFilter extends OncePerRequestFilter {
  readonly name = WebFilterName.TENANT_CONTEXT;
  readonly order = WebFilterOrder.TENANT_CONTEXT_FILTER;

  protected async doFilterInternal(
    request: HttpRequest,
    response: Response,
    chain: FilterChain,
  ): Promise<void> {
    const header = request.header(HEADER_TENANT_ID);
    if (header) {
      const tenantId = Number(header);
      if (!Number.isSafeInteger(tenantId) || tenantId < 0) {
        throw invalidParamException('租户编号格式不正确:{}', header);
      }
      request.context.tenantId = tenantId;
    }
    await chain.doFilter(request, response);
  }
}
