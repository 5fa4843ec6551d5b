import { Injectable, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { WebConfigService } from '../../config/web-config.service';
import { ExpressHttpRequest } from '../http/http-request';
import { readJsonBody } from '../http/request-body.reader';
import { isJsonRequest } from '../http/web-framework.utils';
import { WebFilterRegistry } from './web-filter.registry';

/**
 * 过滤器链中间件
 *
 * 在请求上下文中按顺序执行已注册的过滤器，全部放行后解析 JSON 请求体并进入路由
 */
@Injectable()
export class WebFilterChainMiddleware implements NestMiddleware<Request, Response> {
  constructor(
    private readonly registry: WebFilterRegistry,
    private readonly config: WebConfigService,
  ) {}

  async use(req: Request, res: Response, next: NextFunction): Promise<void> {
    const request = new ExpressHttpRequest(req);
    await request.context.run(() =>
      this.registry.execute(request, res, async (effective) => {
        if (isJsonRequest(effective)) {
          req.body = await readJsonBody(effective, this.config.web.bodyLimit);
        }
        next();
      }),
    );
  }
}
