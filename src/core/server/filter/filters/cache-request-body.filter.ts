import { Injectable } from '@nestjs/common';
import type { Response } from 'express';
import { WebConfigService } from '../../../config/web-config.service';
import { CachedBodyRequest } from '../../http/cached-body-request';
import type { HttpRequest } from '../../http/http-request';
import { isJsonRequest } from '../../http/web-framework.utils';
import { FilterChain, OncePerRequestFilter } from '../web-filter';
import { WebFilterName, WebFilterOrder } from '../web-filter-order';

/**
 * 请求体缓存过滤器
 *
 * JSON 请求的请求体读入内存，后续过滤器、日志与控制器都可以重复读取
 */
@Injectable()
export class CacheRequestBodyFilter extends OncePerRequestFilter {
  readonly name = WebFilterName.REQUEST_BODY_CACHE;
  readonly order = WebFilterOrder.REQUEST_BODY_CACHE_FILTER;

  constructor(private readonly config: WebConfigService) {
    super();
  }

  shouldNotFilter(request: HttpRequest): boolean {
    const path = request.path;
    if (this.config.web.bodyCacheExcludedPrefixes.some((prefix) => path.startsWith(prefix))) {
      return true;
    }
    return !isJsonRequest(request);
  }

  protected async doFilterInternal(
    request: HttpRequest,
    response: Response,
    chain: FilterChain,
  ): Promise<void> {
    const cached = await CachedBodyRequest.wrap(request, { limit: this.config.web.bodyLimit });
    await chain.doFilter(cached, response);
  }
}
