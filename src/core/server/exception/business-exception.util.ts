import { Logger } from '@nestjs/common';
import { BusinessException } from './business.exception';
import { ErrorCode, GlobalErrorCodes } from './error-code';

const logger = new Logger('BusinessExceptionUtil');

const PLACEHOLDER = '{}';

/**
 * 构建业务异常
 *
 * @example
 * throw exception(USER_NOT_EXISTS, userId);
 */
export function exception(errorCode: ErrorCode, ...params: unknown[]): BusinessException {
  return formatException(errorCode.code, errorCode.msg, ...params);
}

export function formatException(
  code: string,
  messagePattern: string,
  ...params: unknown[]
): BusinessException {
  return new BusinessException(code, formatMessage(code, messagePattern, params));
}

/**
 * 参数不合法的业务异常，错误码固定为 BAD_REQUEST
 */
export function invalidParamException(
  messagePattern: string,
  ...params: unknown[]
): BusinessException {
  return formatException(GlobalErrorCodes.BAD_REQUEST.code, messagePattern, ...params);
}

/**
 * 按顺序将 params 填入 messagePattern 中的 `{}` 占位符
 *
 * - 参数多于占位符：多余参数丢弃，记录告警
 * - 参数少于占位符：剩余占位符原样保留，记录告警
 * - 该方法不会抛出异常
 */
export function formatMessage(
  code: string,
  messagePattern: string | null | undefined,
  params: readonly unknown[],
): string {
  if (!messagePattern) {
    return '';
  }
  if (params.length === 0) {
    return messagePattern;
  }

  let result = '';
  let cursor = 0;
  for (let i = 0; i < params.length; i++) {
    const index = messagePattern.indexOf(PLACEHOLDER, cursor);
    if (index === -1) {
      logger.warn(
        `[formatMessage][参数过多：错误码(${code})|错误内容(${messagePattern})|参数(${i})]`,
      );
      return result + messagePattern.substring(cursor);
    }
    result += messagePattern.substring(cursor, index) + stringifyParam(params[i]);
    cursor = index + PLACEHOLDER.length;
  }

  const rest = messagePattern.substring(cursor);
  if (rest.includes(PLACEHOLDER)) {
    logger.warn(
      `[formatMessage][参数过少：错误码(${code})|错误内容(${messagePattern})|参数(${params.length})]`,
    );
  }
  return result + rest;
}

function stringifyParam(param: unknown): string {
  if (typeof param === 'string') {
    return param;
  }
  if (param instanceof Error) {
    return param.message;
  }
  if (typeof param === 'object' && param !== null) {
    try {
      return JSON.stringify(param) ?? String(param);
    } catch {
      return String(param);
    }
  }
  return String(param);
}
