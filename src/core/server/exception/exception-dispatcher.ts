import {
  ForbiddenException,
  HttpException,
  Injectable,
  Logger,
  MethodNotAllowedException,
  NotFoundException,
  Optional,
  PayloadTooLargeException,
  UnsupportedMediaTypeException,
} from '@nestjs/common';
import { STATUS_CODES } from 'node:http';
import { ApiErrorLogApi } from '../../rpc/infra/api-error-log.api';
import { fireAndForget } from '../../rpc/degradation/fire-and-forget';
import type { HttpRequest } from '../http/http-request';
import { RouteMethodIndex } from '../http/route-method.index';
import { getLoginUserId } from '../http/web-framework.utils';
import { ApiResponse, internalErrorResponse } from '../response/api-response';
import { ApiErrorLogBuilder } from './api-error-log.builder';
import { BusinessException } from './business.exception';
import { ErrorCode, GlobalErrorCodes } from './error-code';
import { ExecutionException } from './execution.exception';
import {
  BindingValidationException,
  BodyValidationException,
  MalformedBodyException,
  MissingParameterException,
  ParameterTypeMismatchException,
  RequestBodyReadException,
  RequestMethodNotSupportedException,
  ValidationException,
} from './request.exceptions';
import { firstFrameOutside, getRootCauseMessage } from './stack-trace.util';

/**
 * 异常分类
 */
export enum FaultCategory {
  MISSING_PARAMETER = 'MISSING_PARAMETER',
  PARAMETER_TYPE_MISMATCH = 'PARAMETER_TYPE_MISMATCH',
  BODY_VALIDATION = 'BODY_VALIDATION',
  BINDING_VALIDATION = 'BINDING_VALIDATION',
  MALFORMED_BODY = 'MALFORMED_BODY',
  BODY_READ_FAILED = 'BODY_READ_FAILED',
  UPLOAD_TOO_LARGE = 'UPLOAD_TOO_LARGE',
  NOT_FOUND = 'NOT_FOUND',
  METHOD_NOT_ALLOWED = 'METHOD_NOT_ALLOWED',
  MEDIA_TYPE_NOT_SUPPORTED = 'MEDIA_TYPE_NOT_SUPPORTED',
  BUSINESS = 'BUSINESS',
  ACCESS_DENIED = 'ACCESS_DENIED',
  EXECUTION_WRAPPER = 'EXECUTION_WRAPPER',
  HTTP_FRAMEWORK = 'HTTP_FRAMEWORK',
  WRAPPED_BUSINESS = 'WRAPPED_BUSINESS',
  SCHEMA_NOT_PROVISIONED = 'SCHEMA_NOT_PROVISIONED',
  INTERNAL = 'INTERNAL',
}

/**
 * 分类规则：matches 命中后由 handle 生成响应
 */
export interface ExceptionRule {
  readonly category: FaultCategory;
  matches(error: unknown): boolean;
  handle(error: unknown, request: HttpRequest | undefined, depth: number): ApiResponse<never>;
}

/**
 * 不需要打印日志的业务异常信息
 */
export const IGNORE_ERROR_MESSAGES: ReadonlySet<string> = new Set(['无效的刷新令牌']);

/**
 * 向下查找业务异常的层数：只检查直接的 cause
 */
export const BUSINESS_UNWRAP_DEPTH = 1;

/**
 * ExecutionException 重新分派的最大层数
 */
export const MAX_REDISPATCH_DEPTH = 8;

/**
 * 未导入表结构的可选模块
 */
export const UNPROVISIONED_MODULES: ReadonlyArray<{ tablePrefix: string; name: string }> = [
  { tablePrefix: 'report_', name: '报表模块' },
  { tablePrefix: 'bpm_', name: '工作流模块' },
];

const TABLE_MISSING_PHRASES = ["doesn't exist", 'does not exist'];

const ROUTE_NOT_FOUND_MESSAGE = /^Cannot [A-Z]+ \//;

const BUSINESS_EXCEPTION_FILES = ['business.exception', 'business-exception.util'];

/**
 * HTTP 状态码对应的错误码
 */
const STATUS_ERROR_CODES: Readonly<Record<number, ErrorCode>> = {
  400: GlobalErrorCodes.BAD_REQUEST,
  401: GlobalErrorCodes.UNAUTHORIZED,
  403: GlobalErrorCodes.FORBIDDEN,
  404: GlobalErrorCodes.NOT_FOUND,
  405: GlobalErrorCodes.METHOD_NOT_ALLOWED,
  423: GlobalErrorCodes.LOCKED,
  429: GlobalErrorCodes.TOO_MANY_REQUESTS,
};

function defineRule<E>(
  category: FaultCategory,
  guard: (error: unknown) => error is E,
  handle: (error: E, request: HttpRequest | undefined, depth: number) => ApiResponse<never>,
): ExceptionRule {
  return {
    category,
    matches: guard,
    handle: (error, request, depth) => (guard(error) ? handle(error, request, depth) : internalErrorResponse()),
  };
}

function instanceOf<E>(type: abstract new (...args: never[]) => E): (error: unknown) => error is E {
  return (error: unknown): error is E => error instanceof type;
}

/**
 * express 请求体解析（body-parser）抛出的错误，带有 type 与 status
 */
export interface BodyParserError extends Error {
  readonly type: string;
  readonly status: number;
}

export function isBodyParserError(error: unknown, type?: string): error is BodyParserError {
  if (!(error instanceof Error) || !('type' in error) || !('status' in error)) {
    return false;
  }
  if (typeof error.type !== 'string' || typeof error.status !== 'number') {
    return false;
  }
  return type === undefined || error.type === type;
}

/**
 * 路由未匹配时框架抛出的 404（`Cannot <METHOD> <path>`）；业务代码抛出的 NotFoundException 不算
 */
function isRouteNotFound(error: unknown): error is NotFoundException {
  return error instanceof NotFoundException && ROUTE_NOT_FOUND_MESSAGE.test(error.message);
}

function hasCause(value: unknown): value is { cause: unknown } {
  return typeof value === 'object' && value !== null && 'cause' in value;
}

function badRequest(pattern: string, ...params: unknown[]): ApiResponse<never> {
  return ApiResponse.error(GlobalErrorCodes.BAD_REQUEST.code, pattern, ...params);
}

/**
 * 全局异常分派
 *
 * 按 rules 顺序匹配，第一条命中的规则生成统一响应。
 * 任何输入都返回且只返回一个响应，不会抛出异常
 */
@Injectable()
export class ExceptionDispatcher {
  private readonly logger = new Logger(ExceptionDispatcher.name);

  readonly rules: readonly ExceptionRule[] = [
    defineRule(FaultCategory.MISSING_PARAMETER, instanceOf(MissingParameterException), (ex) =>
      badRequest('请求参数缺失:{}', ex.parameterName),
    ),
    defineRule(FaultCategory.PARAMETER_TYPE_MISMATCH, instanceOf(ParameterTypeMismatchException), (ex) =>
      badRequest('请求参数类型错误:{}', ex.message),
    ),
    defineRule(FaultCategory.BODY_VALIDATION, instanceOf(BodyValidationException), (ex) =>
      this.handleValidation(ex),
    ),
    defineRule(FaultCategory.BINDING_VALIDATION, instanceOf(BindingValidationException), (ex) =>
      this.handleValidation(ex),
    ),
    defineRule(
      FaultCategory.MALFORMED_BODY,
      (error): error is MalformedBodyException | BodyParserError =>
        error instanceof MalformedBodyException || isBodyParserError(error, 'entity.parse.failed'),
      (ex) => {
        if (!(ex instanceof MalformedBodyException)) {
          return badRequest('请求参数格式错误: {}', ex.message);
        }
        switch (ex.reason) {
          case 'invalid-format':
            return badRequest('请求参数类型错误:{}', ex.message);
          case 'missing':
            return badRequest('请求参数类型错误: request body 缺失');
          case 'unparseable':
            return badRequest('请求参数格式错误: request body 不是合法的 JSON');
        }
      },
    ),
    defineRule(FaultCategory.BODY_READ_FAILED, instanceOf(RequestBodyReadException), (ex) => {
      this.logger.warn(`[requestBodyReadHandler] ${ex.message}`);
      return badRequest('请求体读取失败，请重试');
    }),
    defineRule(
      FaultCategory.UPLOAD_TOO_LARGE,
      (error): error is Error =>
        error instanceof PayloadTooLargeException || (isBodyParserError(error) && error.status === 413),
      () => badRequest('上传文件过大，请调整后重试'),
    ),
    defineRule(FaultCategory.NOT_FOUND, isRouteNotFound, (_ex, request) => this.handleNotFound(request)),
    defineRule(FaultCategory.METHOD_NOT_ALLOWED, instanceOf(MethodNotAllowedException), (ex, request) =>
      ex instanceof RequestMethodNotSupportedException
        ? this.methodNotAllowed(ex.method, ex.supportedMethods)
        : this.methodNotAllowed(request?.method ?? ex.message, []),
    ),
    defineRule(
      FaultCategory.MEDIA_TYPE_NOT_SUPPORTED,
      (error): error is Error =>
        error instanceof UnsupportedMediaTypeException || (isBodyParserError(error) && error.status === 415),
      (ex, request) => badRequest('请求类型不正确:{}', request?.contentType ?? ex.message),
    ),
    defineRule(FaultCategory.BUSINESS, instanceOf(BusinessException), (ex) =>
      this.handleBusiness(ex),
    ),
    defineRule(FaultCategory.ACCESS_DENIED, instanceOf(ForbiddenException), (_ex, request) => {
      this.logger.warn(
        `[accessDeniedHandler][userId(${getLoginUserId(request) ?? '-'}) 无法访问 url(${request?.url ?? '-'})]`,
      );
      return ApiResponse.error(GlobalErrorCodes.FORBIDDEN);
    }),
    defineRule(FaultCategory.EXECUTION_WRAPPER, instanceOf(ExecutionException), (ex, request, depth) =>
      depth >= MAX_REDISPATCH_DEPTH
        ? this.handleInternal(ex, request)
        : this.resolve(ex.cause, request, depth + 1),
    ),
    defineRule(
      FaultCategory.HTTP_FRAMEWORK,
      (error): error is HttpException | BodyParserError =>
        (error instanceof HttpException && error.getStatus() < 500) ||
        (isBodyParserError(error) && error.status < 500),
      (ex) => {
        const status = ex instanceof HttpException ? ex.getStatus() : ex.status;
        const errorCode: ErrorCode | undefined = STATUS_ERROR_CODES[status];
        if (!errorCode) {
          return badRequest(ex.message);
        }
        // 使用默认描述（如 Not Found）时返回错误码自身的提示
        return ex.message === STATUS_CODES[status]
          ? ApiResponse.error(errorCode)
          : ApiResponse.error(errorCode.code, ex.message);
      },
    ),
    defineRule(
      FaultCategory.WRAPPED_BUSINESS,
      (error): error is unknown => unwrapBusiness(error) !== undefined,
      (ex) => {
        const business = unwrapBusiness(ex);
        return business ? this.handleBusiness(business) : internalErrorResponse();
      },
    ),
    defineRule(
      FaultCategory.SCHEMA_NOT_PROVISIONED,
      (error): error is unknown => findUnprovisionedModule(error) !== undefined,
      (ex) => {
        const moduleName = findUnprovisionedModule(ex) ?? '';
        return ApiResponse.error(GlobalErrorCodes.NOT_IMPLEMENTED.code, '[{} - 表结构未导入]', moduleName);
      },
    ),
    defineRule(FaultCategory.INTERNAL, (error): error is unknown => true, (ex, request) =>
      this.handleInternal(ex, request),
    ),
  ];

  constructor(
    private readonly apiErrorLogApi: ApiErrorLogApi,
    private readonly errorLogBuilder: ApiErrorLogBuilder,
    @Optional() private readonly routeMethodIndex?: RouteMethodIndex,
  ) {}

  /**
   * 将异常转换为统一响应
   */
  dispatch(error: unknown, request?: HttpRequest): ApiResponse<never> {
    try {
      return this.resolve(error, request, 0);
    } catch (secondary) {
      this.reportSecondaryFailure(error, secondary);
      return internalErrorResponse();
    }
  }

  /**
   * 异常命中的分类
   */
  classify(error: unknown): FaultCategory {
    return this.rules.find((rule) => rule.matches(error))?.category ?? FaultCategory.INTERNAL;
  }

  private resolve(error: unknown, request: HttpRequest | undefined, depth: number): ApiResponse<never> {
    const rule = this.rules.find((candidate) => candidate.matches(error));
    return rule ? rule.handle(error, request, depth) : this.handleInternal(error, request);
  }

  private handleValidation(ex: ValidationException): ApiResponse<never> {
    const message = ex.firstMessage();
    if (message === undefined) {
      return ApiResponse.error(GlobalErrorCodes.BAD_REQUEST);
    }
    return badRequest('请求参数不正确:{}', message);
  }

  private handleNotFound(request: HttpRequest | undefined): ApiResponse<never> {
    if (request && this.routeMethodIndex) {
      const allowed = this.routeMethodIndex.allowedMethods(request.path);
      if (allowed.length > 0 && !allowed.includes('ALL') && !allowed.includes(request.method.toUpperCase())) {
        return this.methodNotAllowed(request.method, allowed);
      }
    }
    return ApiResponse.error(GlobalErrorCodes.NOT_FOUND.code, '请求地址不存在:{}', request?.path ?? '');
  }

  private methodNotAllowed(method: string, supportedMethods: readonly string[]): ApiResponse<never> {
    if (supportedMethods.length === 0) {
      return ApiResponse.error(GlobalErrorCodes.METHOD_NOT_ALLOWED.code, '请求方法不正确:{}', method);
    }
    return ApiResponse.error(
      GlobalErrorCodes.METHOD_NOT_ALLOWED.code,
      '请求方法不正确:{}，支持的方法:{}',
      method,
      supportedMethods.join(', '),
    );
  }

  private handleBusiness(ex: BusinessException): ApiResponse<never> {
    if (!IGNORE_ERROR_MESSAGES.has(ex.message)) {
      const frame = firstFrameOutside(ex, BUSINESS_EXCEPTION_FILES);
      this.logger.warn(`[businessExceptionHandler] ${ex.code} ${ex.message}${frame ? `\n\t${frame.raw}` : ''}`);
    }
    return ApiResponse.fromException(ex);
  }

  private handleInternal(error: unknown, request: HttpRequest | undefined): ApiResponse<never> {
    this.logger.error(
      `[defaultExceptionHandler] ${request ? `${request.method} ${request.url}` : '-'}`,
      error instanceof Error ? error.stack : String(error),
    );
    this.createExceptionLog(error, request);
    return internalErrorResponse();
  }

  private createExceptionLog(error: unknown, request: HttpRequest | undefined): void {
    void fireAndForget('createApiErrorLog', async () =>
      this.apiErrorLogApi.createApiErrorLog(this.errorLogBuilder.build(error, request)),
    );
  }

  private reportSecondaryFailure(error: unknown, secondary: unknown): void {
    const detail = `${getRootCauseMessage(error)} / ${getRootCauseMessage(secondary)}`;
    try {
      this.logger.error(`[dispatch] 异常处理失败，返回兜底响应: ${detail}`);
    } catch {
      process.stderr.write(`[ExceptionDispatcher] 异常处理失败: ${detail}\n`);
    }
  }
}

function unwrapBusiness(error: unknown): BusinessException | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < BUSINESS_UNWRAP_DEPTH; depth++) {
    if (!hasCause(current)) {
      return undefined;
    }
    current = current.cause;
    if (current instanceof BusinessException) {
      return current;
    }
  }
  return undefined;
}

function findUnprovisionedModule(error: unknown): string | undefined {
  const message = getRootCauseMessage(error);
  if (!TABLE_MISSING_PHRASES.some((phrase) => message.includes(phrase))) {
    return undefined;
  }
  return UNPROVISIONED_MODULES.find((module) => message.includes(module.tablePrefix))?.name;
}
