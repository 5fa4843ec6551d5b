import { UserType } from '../../security/login-user';
import { readCachedBody } from './cached-body-request';
import type { HttpRequest } from './http-request';

/**
 * 请求头
 */
export const HEADER_TENANT_ID = 'tenant-id';
export const HEADER_TRACE_ID = 'trace-id';
export const HEADER_TERMINAL = 'terminal';
export const HEADER_AUTHORIZATION = 'authorization';

/**
 * 管理后台 / 用户端 API 前缀
 */
export interface ApiPrefixes {
  readonly adminPrefix: string;
  readonly appPrefix: string;
}

export function getLoginUserId(request: HttpRequest | undefined): number | undefined {
  return request?.context.loginUser?.id;
}

/**
 * 登录用户类型
 *
 * 优先取已认证用户的类型；未登录时根据请求路径前缀推断
 */
export function getLoginUserType(
  request: HttpRequest | undefined,
  prefixes: ApiPrefixes,
): UserType | undefined {
  if (!request) {
    return undefined;
  }
  const userType = request.context.loginUser?.userType;
  if (userType !== undefined) {
    return userType;
  }
  if (request.path.startsWith(prefixes.adminPrefix)) {
    return UserType.ADMIN;
  }
  if (request.path.startsWith(prefixes.appPrefix)) {
    return UserType.MEMBER;
  }
  return undefined;
}

export function getTenantId(request: HttpRequest | undefined): number | undefined {
  return request?.context.tenantId ?? request?.context.loginUser?.tenantId;
}

export function isJsonRequest(request: HttpRequest): boolean {
  return request.contentType?.toLowerCase().startsWith('application/json') ?? false;
}

/**
 * 是否为管理后台或用户端 API 请求
 */
export function isApiRequest(request: HttpRequest, prefixes: ApiPrefixes): boolean {
  return request.path.startsWith(prefixes.adminPrefix) || request.path.startsWith(prefixes.appPrefix);
}

/**
 * 客户端 IP，优先读取代理头
 */
export function getClientIp(request: HttpRequest): string | undefined {
  for (const name of ['x-forwarded-for', 'x-real-ip', 'proxy-client-ip']) {
    const value = request.header(name);
    if (value && value.toLowerCase() !== 'unknown') {
      return value.split(',')[0].trim();
    }
  }
  return request.raw.ip ?? request.raw.socket?.remoteAddress;
}

/**
 * 请求参数 JSON：`{ query, body }`
 *
 * 只读取已缓存的请求体；JSON 请求体解析为对象，其它保留原文
 */
export function getRequestParams(request: HttpRequest): string {
  const text = readCachedBody(request);
  let body: unknown = text;
  if (text !== undefined && text.length > 0 && isJsonRequest(request)) {
    try {
      body = JSON.parse(text);
    } catch {
      body = text;
    }
  }
  return JSON.stringify({ query: request.query, body });
}
