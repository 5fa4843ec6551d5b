import { ConsoleLogger, Injectable, Scope } from '@nestjs/common';
import { getCurrentContext } from '../server/http/request-context';

export type StructuredLogLevel = 'log' | 'warn' | 'error' | 'debug' | 'verbose';

/**
 * 应用 Logger 服务
 *
 * 继承 NestJS 的 ConsoleLogger，在请求处理流程中输出的日志前加上追踪 ID，
 * 所有使用 Logger 的地方无需修改即可生效
 */
@Injectable({ scope: Scope.TRANSIENT })
export class AppLoggerService extends ConsoleLogger {
  log(message: unknown, ...optionalParams: unknown[]): void {
    super.log(this.withTraceId(message), ...optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    super.error(this.withTraceId(message), ...optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    super.warn(this.withTraceId(message), ...optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    super.debug(this.withTraceId(message), ...optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    super.verbose(this.withTraceId(message), ...optionalParams);
  }

  /**
   * 结构化日志
   *
   * fields 序列化为 JSON 追加在消息之后；无法序列化时只输出字段名。
   * 写日志失败时改写到 stderr，不向调用方抛出
   */
  structured(
    level: StructuredLogLevel,
    message: string,
    fields: Record<string, unknown> = {},
    error?: unknown,
  ): void {
    const line = appendFields(message, fields);
    try {
      if (level === 'error') {
        if (error === undefined) {
          this.error(line);
        } else {
          this.error(line, error instanceof Error ? error.stack : String(error));
        }
        return;
      }
      this[level](error === undefined ? line : `${line} - ${describeError(error)}`);
    } catch (writeError) {
      process.stderr.write(`${line} (${describeError(writeError)})\n`);
    }
  }

  /**
   * 字符串日志加上 `[traceId]` 前缀；不在请求中或日志不是字符串时原样返回
   */
  withTraceId(message: unknown): unknown {
    const traceId = getCurrentContext()?.traceId;
    if (!traceId || typeof message !== 'string') {
      return message;
    }
    return `[${traceId}] ${message}`;
  }
}

function appendFields(message: string, fields: Record<string, unknown>): string {
  const keys = Object.keys(fields);
  if (keys.length === 0) {
    return message;
  }
  try {
    return `${message} ${JSON.stringify(fields)}`;
  } catch {
    return `${message} {${keys.join(',')}}`;
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
