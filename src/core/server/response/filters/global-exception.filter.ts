import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Request, Response } from 'express';
import { ExceptionDispatcher } from '../../exception/exception-dispatcher';
import { ExpressHttpRequest } from '../../http/http-request';
import { RequestContext } from '../../http/request-context';

/**
 * 全局异常过滤器
 * 所有异常都交给 ExceptionDispatcher 转换为统一响应，HTTP 状态码固定为 200
 *
 * 使用方式：由 WebModule 通过 APP_FILTER 全局注册，
 * 过滤器链（中间件）中抛出的异常同样经过这里
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  constructor(private readonly dispatcher: ExceptionDispatcher) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const raw = ctx.getRequest<Request>();

    const result = this.dispatcher.dispatch(exception, ExpressHttpRequest.of(raw));

    if (response.headersSent || response.writableEnded || response.destroyed) {
      this.logger.warn(`[${raw.method}] ${raw.originalUrl} 响应已发送或连接已断开，丢弃 ${result.code}`);
      return;
    }

    RequestContext.of(raw).setApiResponse(result);
    response.status(HttpStatus.OK).json(result);
  }
}
