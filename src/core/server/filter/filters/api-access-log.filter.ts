import { Injectable } from '@nestjs/common';
import type { Response } from 'express';
import { WebConfigService } from '../../../config/web-config.service';
import { fireAndForget } from '../../../rpc/degradation/fire-and-forget';
import { ApiAccessLogApi } from '../../../rpc/infra/api-access-log.api';
import { ApiAccessLogCreateReqDto } from '../../../rpc/infra/dto/api-access-log-create.dto';
import type { HttpRequest } from '../../http/http-request';
import {
  getClientIp,
  getLoginUserId,
  getLoginUserType,
  getRequestParams,
} from '../../http/web-framework.utils';
import { ApiRequestFilter, FilterChain } from '../web-filter';
import { WebFilterName, WebFilterOrder } from '../web-filter-order';

/**
 * API 访问日志过滤器
 *
 * 响应结束后记录请求参数、统一响应体与耗时，异步写入访问日志服务
 */
@Injectable()
export class ApiAccessLogFilter extends ApiRequestFilter {
  readonly name = WebFilterName.API_ACCESS_LOG;
  readonly order = WebFilterOrder.API_ACCESS_LOG_FILTER;

  constructor(
    private readonly config: WebConfigService,
    private readonly apiAccessLogApi: ApiAccessLogApi,
  ) {
    super(config.web.apiPrefixes);
  }

  protected async doFilterInternal(
    request: HttpRequest,
    response: Response,
    chain: FilterChain,
  ): Promise<void> {
    const beginTime = new Date();
    response.once('finish', () => {
      void fireAndForget('createApiAccessLog', async () =>
        this.apiAccessLogApi.createApiAccessLog(this.buildAccessLog(request, beginTime, new Date(), response.statusCode)),
      );
    });
    await chain.doFilter(request, response);
  }

  buildAccessLog(
    request: HttpRequest,
    beginTime: Date,
    endTime: Date,
    statusCode: number,
  ): ApiAccessLogCreateReqDto {
    const result = request.context.getApiResponse();
    return {
      traceId: request.context.traceId,
      userId: getLoginUserId(request),
      userType: getLoginUserType(request, this.prefixes),
      applicationName: this.config.web.applicationName,
      requestMethod: request.method,
      requestUrl: request.path,
      requestParams: getRequestParams(request),
      responseBody: result ? JSON.stringify(result) : undefined,
      userIp: getClientIp(request),
      userAgent: request.header('user-agent'),
      beginTime: beginTime.toISOString(),
      endTime: endTime.toISOString(),
      duration: endTime.getTime() - beginTime.getTime(),
      resultCode: result?.code ?? String(statusCode),
      resultMsg: result?.msg,
    };
  }
}
