import { AsyncLocalStorage } from 'node:async_hooks';
import type { Request } from 'express';
import type { LoginUser } from '../../security/login-user';
import type { ApiResponse } from '../response/api-response';
import type { HttpRequest } from './http-request';

const contexts = new WeakMap<Request, RequestContext>();

const storage = new AsyncLocalStorage<RequestContext>();

/**
 * 单次请求的上下文
 *
 * 与 express 请求对象一一对应，保存过滤器链写入的追踪 ID、租户、登录用户，
 * 以及最终写出的统一响应体（只允许写入一次）
 */
export class RequestContext {
  readonly attributes = new Map<string, unknown>();

  traceId?: string;

  tenantId?: number;

  loginUser?: LoginUser;

  /** 过滤器链当前传递的请求（可能是缓存请求体后的包装对象） */
  request?: HttpRequest;

  private apiResponse?: ApiResponse<unknown>;

  private constructor(readonly raw: Request) {}

  /**
   * 获取（不存在时创建）请求对应的上下文
   */
  static of(raw: Request): RequestContext {
    let context = contexts.get(raw);
    if (!context) {
      context = new RequestContext(raw);
      contexts.set(raw, context);
    }
    return context;
  }

  /**
   * 记录最终响应体；已记录时返回 false 并保留原值
   */
  setApiResponse(response: ApiResponse<unknown>): boolean {
    if (this.apiResponse) {
      return false;
    }
    this.apiResponse = response;
    return true;
  }

  getApiResponse(): ApiResponse<unknown> | undefined {
    return this.apiResponse;
  }

  /**
   * 在当前上下文中执行 callback，期间可通过 getCurrentContext() 访问
   */
  run<R>(callback: () => R): R {
    return storage.run(this, callback);
  }
}

/**
 * 当前请求上下文；不在请求处理流程中时返回 undefined
 */
export function getCurrentContext(): RequestContext | undefined {
  return storage.getStore();
}

/**
 * 当前请求；不在请求处理流程中时返回 undefined
 */
export function getCurrentRequest(): HttpRequest | undefined {
  return storage.getStore()?.request;
}
