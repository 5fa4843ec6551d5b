import type { Response } from 'express';
import type { HttpRequest } from '../http/http-request';
import { ApiPrefixes, isApiRequest } from '../http/web-framework.utils';

/**
 * 过滤器链
 */
export interface FilterChain {
  doFilter(request: HttpRequest, response: Response): Promise<void>;
}

/**
 * 过滤器
 *
 * doFilter 可以：
 * - 调用 chain.doFilter 继续执行（可传入新的请求对象）
 * - 直接写出响应并不调用 chain，后续过滤器与处理器都不会执行
 */
export interface WebFilter {
  readonly name: string;
  readonly order: number;
  doFilter(request: HttpRequest, response: Response, chain: FilterChain): Promise<void>;
}

/**
 * 每个请求最多执行一次的过滤器基类
 */
export abstract class OncePerRequestFilter implements WebFilter {
  abstract readonly name: string;
  abstract readonly order: number;

  async doFilter(request: HttpRequest, response: Response, chain: FilterChain): Promise<void> {
    const marker = `${this.name}.FILTERED`;
    if (request.context.attributes.has(marker) || this.shouldNotFilter(request)) {
      return chain.doFilter(request, response);
    }
    request.context.attributes.set(marker, true);
    return this.doFilterInternal(request, response, chain);
  }

  /**
   * 返回 true 时跳过本过滤器
   */
  shouldNotFilter(_request: HttpRequest): boolean {
    return false;
  }

  protected abstract doFilterInternal(
    request: HttpRequest,
    response: Response,
    chain: FilterChain,
  ): Promise<void>;
}

/**
 * 只处理管理后台 / 用户端 API 请求的过滤器
 */
export abstract class ApiRequestFilter extends OncePerRequestFilter {
  protected constructor(protected readonly prefixes: ApiPrefixes) {
    super();
  }

  shouldNotFilter(request: HttpRequest): boolean {
    return !isApiRequest(request, this.prefixes);
  }
}
