import { MethodNotAllowedException } from '@nestjs/common';
import { ValidationError } from 'class-validator';

/**
 * 必填请求参数缺失
 */
export class MissingParameterException extends Error {
  constructor(readonly parameterName: string) {
    super(`Required request parameter '${parameterName}' is not present`);
    this.name = 'MissingParameterException';
  }
}

/**
 * 请求参数无法转换为目标类型
 */
export class ParameterTypeMismatchException extends Error {
  constructor(
    readonly parameterName: string,
    readonly value: unknown,
    readonly requiredType: string,
  ) {
    super(`${parameterName}=${String(value)}`);
    this.name = 'ParameterTypeMismatchException';
  }
}

/**
 * 字段级校验错误
 */
export interface FieldError {
  readonly field: string;
  readonly message: string;
  readonly rejectedValue?: unknown;
}

/**
 * 对象级（跨字段）校验错误
 */
export interface ObjectError {
  readonly message: string;
}

/**
 * 校验异常基类
 *
 * fieldErrors 保持声明顺序，嵌套字段使用 `a.b.c` 路径
 */
export abstract class ValidationException extends Error {
  protected constructor(
    readonly fieldErrors: readonly FieldError[],
    readonly globalErrors: readonly ObjectError[],
  ) {
    super(fieldErrors[0]?.message ?? globalErrors[0]?.message ?? 'Validation failed');
  }

  /**
   * 第一条字段错误，其次第一条对象错误
   */
  firstMessage(): string | undefined {
    return this.fieldErrors[0]?.message ?? this.globalErrors[0]?.message;
  }
}

/**
 * 请求体（JSON）校验失败
 */
export class BodyValidationException extends ValidationException {
  constructor(fieldErrors: readonly FieldError[], globalErrors: readonly ObjectError[] = []) {
    super(fieldErrors, globalErrors);
    this.name = 'BodyValidationException';
  }

  static fromValidationErrors(errors: readonly ValidationError[]): BodyValidationException {
    return new BodyValidationException(flattenValidationErrors(errors));
  }
}

/**
 * 表单 / 查询参数绑定校验失败
 */
export class BindingValidationException extends ValidationException {
  constructor(fieldErrors: readonly FieldError[], globalErrors: readonly ObjectError[] = []) {
    super(fieldErrors, globalErrors);
    this.name = 'BindingValidationException';
  }

  static fromValidationErrors(errors: readonly ValidationError[]): BindingValidationException {
    return new BindingValidationException(flattenValidationErrors(errors));
  }
}

export type MalformedBodyReason = 'invalid-format' | 'missing' | 'unparseable';

/**
 * 请求体无法读取
 *
 * - invalid-format：字段值与声明类型不符
 * - missing：需要请求体但未提供
 * - unparseable：请求体不是合法的 JSON
 */
export class MalformedBodyException extends Error {
  private constructor(
    readonly reason: MalformedBodyReason,
    message: string,
    readonly field?: string,
    readonly value?: unknown,
  ) {
    super(message);
    this.name = 'MalformedBodyException';
  }

  static invalidFormat(field: string, value: unknown): MalformedBodyException {
    return new MalformedBodyException('invalid-format', `${field}=${String(value)}`, field, value);
  }

  static missing(): MalformedBodyException {
    return new MalformedBodyException('missing', 'Required request body is missing');
  }

  static unparseable(cause: unknown): MalformedBodyException {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new MalformedBodyException('unparseable', `JSON parse error: ${detail}`);
  }
}

/**
 * 请求体读取失败（连接中断、流错误）
 */
export class RequestBodyReadException extends Error {
  constructor(readonly cause: unknown) {
    super(`Failed to read request body: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'RequestBodyReadException';
  }
}

/**
 * 路由存在但不支持当前请求方法
 */
export class RequestMethodNotSupportedException extends MethodNotAllowedException {
  constructor(
    readonly method: string,
    readonly supportedMethods: readonly string[],
  ) {
    super(`Request method '${method}' is not supported`);
  }
}

function flattenValidationErrors(errors: readonly ValidationError[], parentPath = ''): FieldError[] {
  const result: FieldError[] = [];
  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const messages = error.constraints ? Object.values(error.constraints) : [];
    if (messages.length > 0) {
      result.push({ field: path, message: messages[0], rejectedValue: error.value });
    }
    if (error.children && error.children.length > 0) {
      result.push(...flattenValidationErrors(error.children, path));
    }
  }
  return result;
}
