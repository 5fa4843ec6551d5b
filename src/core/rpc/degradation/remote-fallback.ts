import { Logger } from '@nestjs/common';
import axios from 'axios';

/**
 * 远程调用降级策略
 */
export enum DegradationPolicy {
  /** 尽力而为：降级为无害的默认值，记录告警 */
  BEST_EFFORT = 'best-effort',
  /** 关键调用：降级为明确的错误响应，记录错误 */
  CRITICAL = 'critical',
}

/**
 * 远程调用超时
 */
export class RemoteCallTimeoutError extends Error {
  constructor(
    readonly target: string,
    readonly timeoutMs: number,
  ) {
    super(`${target} 调用超时 (${timeoutMs}ms)`);
    this.name = 'RemoteCallTimeoutError';
  }
}

export interface FallbackOptions<T> {
  /** 远程服务名称，用于日志 */
  name: string;
  policy: DegradationPolicy;
  /** 根据失败原因创建降级实现 */
  fallbackFactory: (cause: unknown) => T;
  /** 单次调用超时（毫秒），不设置时只依赖客户端自身的超时 */
  timeoutMs?: number;
}

const TRANSPORT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'EPIPE',
  'ERR_NETWORK',
]);

/**
 * 是否为传输层失败（超时、连接失败、无响应、5xx）
 *
 * 远程服务返回的错误响应、4xx、以及其它异常都不属于传输层失败
 */
export function isTransportFailure(error: unknown): boolean {
  if (error instanceof RemoteCallTimeoutError) {
    return true;
  }
  if (axios.isAxiosError(error)) {
    if (!error.response) {
      return true;
    }
    return error.response.status >= 500;
  }
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    TRANSPORT_ERROR_CODES.has(error.code)
  );
}

/**
 * 为远程客户端加上降级处理
 *
 * 返回的代理对象与 client 类型相同；方法调用发生传输层失败时，
 * 改为调用 fallbackFactory(cause) 返回对象的同名方法，其它异常原样抛出
 */
export function withFallback<T extends object>(client: T, options: FallbackOptions<T>): T {
  const logger = new Logger(`RemoteFallback:${options.name}`);

  const invoke = async (
    target: T,
    method: string,
    fn: (...args: unknown[]) => unknown,
    args: unknown[],
  ): Promise<unknown> => {
    try {
      const pending = Promise.resolve(Reflect.apply(fn, target, args));
      return await (options.timeoutMs === undefined
        ? pending
        : withTimeout(pending, options.timeoutMs, `${options.name}.${method}`));
    } catch (error) {
      if (!isTransportFailure(error)) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      if (options.policy === DegradationPolicy.CRITICAL) {
        logger.error(`[${method}] 远程调用失败，返回降级结果: ${reason}`);
      } else {
        logger.warn(`[${method}] 远程调用失败，返回默认结果: ${reason}`);
      }
      const fallback = options.fallbackFactory(error);
      const fallbackMethod: unknown = Reflect.get(fallback, method);
      if (typeof fallbackMethod !== 'function') {
        throw error;
      }
      return Reflect.apply(fallbackMethod, fallback, args);
    }
  };

  return new Proxy(client, {
    get(target, property, receiver) {
      const value: unknown = Reflect.get(target, property, receiver);
      if (typeof value !== 'function' || typeof property !== 'string' || property === 'constructor') {
        return value;
      }
      return (...args: unknown[]) => invoke(target, property, (...a: unknown[]) => Reflect.apply(value, target, a), args);
    },
  });
}

async function withTimeout<R>(promise: Promise<R>, timeoutMs: number, target: string): Promise<R> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new RemoteCallTimeoutError(target, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
