import { Injectable } from '@nestjs/common';
import { WebConfigService } from '../../config/web-config.service';
import { ApiErrorLogCreateReqDto } from '../../rpc/infra/dto/api-error-log-create.dto';
import type { HttpRequest } from '../http/http-request';
import {
  getClientIp,
  getLoginUserId,
  getLoginUserType,
  getRequestParams,
} from '../http/web-framework.utils';
import { getRootCauseMessage, parseStack } from './stack-trace.util';

/**
 * 构建 API 错误日志
 */
@Injectable()
export class ApiErrorLogBuilder {
  constructor(private readonly config: WebConfigService) {}

  build(error: unknown, request: HttpRequest | undefined, now = new Date()): ApiErrorLogCreateReqDto {
    const err = error instanceof Error ? error : undefined;
    const frame = parseStack(err?.stack)[0];
    return {
      userId: getLoginUserId(request),
      userType: getLoginUserType(request, this.config.web.apiPrefixes),
      traceId: request?.context.traceId,
      applicationName: this.config.web.applicationName,
      requestMethod: request?.method ?? '',
      requestUrl: request?.path ?? '',
      requestParams: request ? getRequestParams(request) : '{}',
      userIp: request ? getClientIp(request) : undefined,
      userAgent: request?.header('user-agent'),
      exceptionTime: now.toISOString(),
      exceptionName: err?.name ?? typeof error,
      exceptionMessage: err?.message ?? String(error),
      exceptionRootCauseMessage: getRootCauseMessage(error),
      exceptionStackTrace: err?.stack ?? String(error),
      exceptionClassName: frame?.className,
      exceptionFileName: frame?.fileName,
      exceptionMethodName: frame?.methodName,
      exceptionLineNumber: frame?.lineNumber,
    };
  }
}
