import { Injectable } from '@nestjs/common';
import cors from 'cors';
import type { Response } from 'express';
import type { HttpRequest } from '../../http/http-request';
import { FilterChain, OncePerRequestFilter } from '../web-filter';
import { WebFilterName, WebFilterOrder } from '../web-filter-order';

/**
 * 跨域过滤器
 *
 * 预检请求由 cors 直接响应，不进入后续过滤器
 */
@Injectable()
export class CorsFilter extends OncePerRequestFilter {
  readonly name = WebFilterName.CORS;
  readonly order = WebFilterOrder.CORS_FILTER;

  private readonly handler = cors({
    origin: true,
    credentials: true,
    maxAge: 1800,
  });

  protected async doFilterInternal(
    request: HttpRequest,
    response: Response,
    chain: FilterChain,
  ): Promise<void> {
    const proceed = await new Promise<boolean>((resolve, reject) => {
      const onFinish = () => resolve(false);
      response.once('finish', onFinish);
      this.handler(request.raw, response, (error?: unknown) => {
        response.removeListener('finish', onFinish);
        if (error) {
          reject(error);
          return;
        }
        resolve(true);
      });
    });
    if (proceed) {
      await chain.doFilter(request, response);
    }
  }
}
