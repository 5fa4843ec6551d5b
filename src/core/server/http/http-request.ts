import { Readable } from 'node:stream';
import type { Request } from 'express';
import { RequestContext } from './request-context';

/**
 * 过滤器链中传递的请求抽象
 *
 * 默认实现直接代理 express 请求；请求体只能读取一次。
 * CachedBodyRequest 实现可重复读取
 */
export interface HttpRequest {
  readonly method: string;
  /** 不含查询串的路径 */
  readonly path: string;
  /** 包含查询串的原始 URL */
  readonly url: string;
  readonly query: Readonly<Record<string, unknown>>;
  readonly contentType: string | undefined;
  readonly context: RequestContext;
  readonly raw: Request;
  /** 请求体是否已缓存（可重复读取） */
  readonly bodyCached: boolean;

  header(name: string): string | undefined;

  /**
   * 打开请求体读取流
   */
  openReader(): Readable;

  /**
   * 请求体字节数；未知时返回 undefined
   */
  length(): number | undefined;
}

export class ExpressHttpRequest implements HttpRequest {
  readonly bodyCached = false;

  readonly context: RequestContext;

  constructor(readonly raw: Request) {
    this.context = RequestContext.of(raw);
  }

  /**
   * 当前过滤器链中的请求；尚未进入过滤器链时包装原始请求
   */
  static of(raw: Request): HttpRequest {
    return RequestContext.of(raw).request ?? new ExpressHttpRequest(raw);
  }

  get method(): string {
    return this.raw.method;
  }

  get url(): string {
    return this.raw.originalUrl;
  }

  get path(): string {
    const url = this.raw.originalUrl;
    const queryStart = url.indexOf('?');
    return queryStart === -1 ? url : url.substring(0, queryStart);
  }

  get query(): Readonly<Record<string, unknown>> {
    return this.raw.query;
  }

  get contentType(): string | undefined {
    return this.header('content-type');
  }

  header(name: string): string | undefined {
    return this.raw.get(name);
  }

  openReader(): Readable {
    return this.raw;
  }

  length(): number | undefined {
    const value = this.header('content-length');
    if (value === undefined) {
      return undefined;
    }
    const length = Number(value);
    return Number.isInteger(length) && length >= 0 ? length : undefined;
  }
}
