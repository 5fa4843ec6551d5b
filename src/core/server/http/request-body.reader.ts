import { CachedBodyRequest } from './cached-body-request';
import type { HttpRequest } from './http-request';
import { isJsonRequest } from './web-framework.utils';
import { MalformedBodyException } from '../exception/request.exceptions';

/**
 * 解析 JSON 请求体
 *
 * 已缓存的请求直接使用缓存，否则读取原始流（只能读取一次）。
 * 非 JSON 请求或空请求体返回 undefined
 *
 * @throws MalformedBodyException 请求体不是合法的 JSON
 */
export async function readJsonBody(request: HttpRequest, limit?: number): Promise<unknown> {
  if (!isJsonRequest(request)) {
    return undefined;
  }
  const cached =
    request instanceof CachedBodyRequest ? request : await CachedBodyRequest.wrap(request, { limit });
  const text = cached.text();
  if (text.trim().length === 0) {
    return undefined;
  }
  try {
    const body: unknown = JSON.parse(text);
    return body;
  } catch (error) {
    throw MalformedBodyException.unparseable(error);
  }
}
