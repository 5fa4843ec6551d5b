import { HttpStatus, Injectable } from '@nestjs/common';
import type { Response } from 'express';
import { GlobalErrorCodes } from '../../exception/error-code';
import type { HttpRequest } from '../../http/http-request';
import { getLoginUserId } from '../../http/web-framework.utils';
import { ApiResponse } from '../../response/api-response';
import { OncePerRequestFilter } from '../web-filter';
import { WebFilterName, WebFilterOrder } from '../web-filter-order';

const WRITE_METHODS: ReadonlySet<string> = new Set(['POST', 'PUT', 'DELETE']);

/**
 * 演示模式过滤器
 *
 * 已登录用户的写请求（POST / PUT / DELETE）直接返回 DEMO_DENY，不进入后续处理
 */
@Injectable()
export class DemoFilter extends OncePerRequestFilter {
  readonly name = WebFilterName.DEMO;
  readonly order = WebFilterOrder.DEMO_FILTER;

  shouldNotFilter(request: HttpRequest): boolean {
    return !WRITE_METHODS.has(request.method.toUpperCase()) || getLoginUserId(request) === undefined;
  }

  protected async doFilterInternal(request: HttpRequest, response: Response): Promise<void> {
    const result = ApiResponse.error(GlobalErrorCodes.DEMO_DENY);
    request.context.setApiResponse(result);
    response.status(HttpStatus.OK).json(result);
  }
}
