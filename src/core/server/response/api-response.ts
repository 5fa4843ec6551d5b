import { ApiProperty } from '@nestjs/swagger';
import { BusinessException } from '../exception/business.exception';
import { formatMessage } from '../exception/business-exception.util';
import { ErrorCode, GlobalErrorCodes, SUCCESS_CODE } from '../exception/error-code';

/**
 * 响应体 JSON 结构
 */
export interface ApiResponseBody<T = unknown> {
  code: string;
  msg: string;
  data?: T;
}

type Payload<T> = { readonly ok: true; readonly data: T } | { readonly ok: false };

/**
 * 统一响应体
 *
 * 成功：`{ code: "00000", msg: "", data }`，data 为 null / undefined 时省略
 * 失败：`{ code, msg }`，code 一定不是成功码
 *
 * 实例不可变；HTTP 状态码始终为 200，调用方依据 code 判断结果
 */
export class ApiResponse<T = unknown> {
  @ApiProperty({ description: '错误码，成功时为 00000', example: SUCCESS_CODE })
  readonly code: string;

  @ApiProperty({ description: '提示信息', example: '' })
  readonly msg: string;

  private readonly payload: Payload<T>;

  private constructor(code: string, msg: string, payload: Payload<T>) {
    this.code = code;
    this.msg = msg;
    this.payload = payload;
  }

  static success<T>(data: T): ApiResponse<T> {
    return new ApiResponse<T>(SUCCESS_CODE, '', { ok: true, data });
  }

  /**
   * 构建失败响应
   *
   * @example
   * ApiResponse.error(GlobalErrorCodes.DEMO_DENY);
   * ApiResponse.error('A0001', '请求参数缺失:{}', 'id');
   */
  static error<T = never>(errorCode: ErrorCode, ...params: unknown[]): ApiResponse<T>;
  static error<T = never>(code: string, message: string, ...params: unknown[]): ApiResponse<T>;
  static error<T = never>(
    codeOrErrorCode: string | ErrorCode,
    ...rest: unknown[]
  ): ApiResponse<T> {
    if (typeof codeOrErrorCode !== 'string') {
      return ApiResponse.create<T>(codeOrErrorCode.code, codeOrErrorCode.msg, rest);
    }
    const [message, ...params] = rest;
    return ApiResponse.create<T>(codeOrErrorCode, typeof message === 'string' ? message : '', params);
  }

  /**
   * 将另一个失败响应转换为当前泛型
   */
  static fromError<T = never>(result: ApiResponse<unknown>): ApiResponse<T> {
    assertNotSuccessCode(result.code);
    return new ApiResponse<T>(result.code, result.msg, { ok: false });
  }

  static fromException<T = never>(ex: BusinessException): ApiResponse<T> {
    return ApiResponse.create<T>(ex.code, ex.message, []);
  }

  static isSuccess(code: string): boolean {
    return code === SUCCESS_CODE;
  }

  /**
   * 解析远程服务返回的 JSON 响应体
   *
   * @throws TypeError 响应体不是合法的统一响应结构
   */
  static parse<T>(body: unknown, isData: (value: unknown) => value is T): ApiResponse<T> {
    if (typeof body !== 'object' || body === null) {
      throw new TypeError('远程响应不是合法的 JSON 对象');
    }
    const code: unknown = Reflect.get(body, 'code');
    const msg: unknown = Reflect.get(body, 'msg');
    if (typeof code !== 'string') {
      throw new TypeError('远程响应缺少 code 字段');
    }
    if (!ApiResponse.isSuccess(code)) {
      return ApiResponse.create<T>(code, typeof msg === 'string' ? msg : '', []);
    }
    const data: unknown = Reflect.get(body, 'data');
    if (!isData(data)) {
      throw new TypeError(`远程响应 data 字段格式不正确: ${JSON.stringify(data)}`);
    }
    return ApiResponse.success(data);
  }

  private static create<T>(code: string, pattern: string, params: readonly unknown[]): ApiResponse<T> {
    assertNotSuccessCode(code);
    return new ApiResponse<T>(code, formatMessage(code, pattern, params), { ok: false });
  }

  get data(): T | undefined {
    return this.payload.ok ? this.payload.data : undefined;
  }

  isSuccess(): boolean {
    return ApiResponse.isSuccess(this.code);
  }

  isError(): boolean {
    return !this.isSuccess();
  }

  /**
   * 失败时抛出对应的 BusinessException
   */
  checkError(): void {
    if (this.isSuccess()) {
      return;
    }
    throw new BusinessException(this.code, this.msg);
  }

  /**
   * 成功时返回 data，失败时抛出 BusinessException
   */
  getDataOrThrow(): T {
    if (!this.payload.ok) {
      throw new BusinessException(this.code, this.msg);
    }
    return this.payload.data;
  }

  toJSON(): ApiResponseBody<T> {
    if (this.payload.ok && this.payload.data !== undefined && this.payload.data !== null) {
      return { code: this.code, msg: this.msg, data: this.payload.data };
    }
    return { code: this.code, msg: this.msg };
  }
}

function assertNotSuccessCode(code: string): void {
  if (ApiResponse.isSuccess(code)) {
    throw new Error(`失败响应不能使用成功码 ${code}`);
  }
}

/**
 * 内部错误的兜底响应
 */
export function internalErrorResponse<T = never>(): ApiResponse<T> {
  return ApiResponse.error<T>(GlobalErrorCodes.INTERNAL_SERVER_ERROR);
}
