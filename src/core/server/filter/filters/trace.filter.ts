import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { Response } from 'express';
import type { HttpRequest } from '../../http/http-request';
import { HEADER_TRACE_ID } from '../../http/web-framework.utils';
import { FilterChain, OncePerRequestFilter } from '../web-filter';
import { WebFilterName, WebFilterOrder } from '../web-filter-order';

/**
 * 链路追踪过滤器
 *
 * 沿用上游传入的 trace-id，没有时生成新的，并写回响应头
 */
@Injectable()
export class TraceFilter extends OncePerRequestFilter {
  readonly name = WebFilterName.TRACE;
  readonly order = WebFilterOrder.TRACE_FILTER;

  protected async doFilterInternal(
    request: HttpRequest,
    response: Response,
    chain: FilterChain,
  ): Promise<void> {
    const traceId = request.header(HEADER_TRACE_ID) || randomUUID();
    request.context.traceId = traceId;
    response.setHeader(HEADER_TRACE_ID, traceId);
    await chain.doFilter(request, response);
  }
}
