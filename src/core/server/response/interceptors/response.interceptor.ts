import { CallHandler, ExecutionContext, HttpStatus, Injectable, NestInterceptor } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { RequestContext } from '../../http/request-context';
import { ApiResponse } from '../api-response';
import { RAW_RESPONSE_KEY } from '../decorators/api-response.decorator';

/**
 * 响应拦截器
 * 自动将 controller 返回的数据包装成统一的成功响应格式，并记录到请求上下文，
 * 供访问日志读取。统一响应的 HTTP 状态码固定为 200
 *
 * 豁免机制：
 * - 使用 @RawResponse() 装饰器标记的端点会跳过包装
 * - controller 已经返回 ApiResponse 时不再包装
 */
@Injectable()
export class ResponseInterceptor implements NestInterceptor<unknown, unknown> {
  constructor(private readonly reflector: Reflector) {}

  intercept(context: ExecutionContext, next: CallHandler<unknown>): Observable<unknown> {
    const isRawResponse = this.reflector.getAllAndOverride<boolean>(RAW_RESPONSE_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);

    if (isRawResponse) {
      return next.handle();
    }

    const http = context.switchToHttp();
    const request = http.getRequest<Request>();

    return next.handle().pipe(
      map((data) => {
        const result = data instanceof ApiResponse ? data : ApiResponse.success(data);
        RequestContext.of(request).setApiResponse(result);
        http.getResponse<Response>().status(HttpStatus.OK);
        return result;
      }),
    );
  }
}
