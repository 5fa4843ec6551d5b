import { Global, Module } from '@nestjs/common';
import type { AxiosInstance } from 'axios';
import { HttpClientFactory } from '../client-http/http-client.factory';
import { WebConfigService } from '../config/web-config.service';
import { DegradationPolicy, withFallback } from './degradation/remote-fallback';
import { ApiAccessLogApi, apiAccessLogApiFallback, HttpApiAccessLogApi } from './infra/api-access-log.api';
import { ApiErrorLogApi, apiErrorLogApiFallback, HttpApiErrorLogApi } from './infra/api-error-log.api';
import { INFRA_HTTP_CLIENT, SYSTEM_HTTP_CLIENT } from './rpc.constants';
import { HttpOAuth2TokenApi, OAuth2TokenApi, oauth2TokenApiFallback } from './system/oauth2-token.api';
import { HttpPermissionApi, PermissionApi, permissionApiFallback } from './system/permission.api';

/**
 * 远程服务模块
 *
 * 每个远程服务都经过 withFallback 包装：
 * - 日志类服务尽力而为，失败时返回 success(false)
 * - 令牌、权限服务为关键调用，失败时返回错误响应
 */
@Global()
@Module({
  providers: [
    {
      provide: INFRA_HTTP_CLIENT,
      inject: [HttpClientFactory, WebConfigService],
      useFactory: (factory: HttpClientFactory, config: WebConfigService): AxiosInstance =>
        factory.create({
          baseURL: config.rpc.infraBaseUrl,
          timeout: config.rpc.timeout,
          logPrefix: '[RPC infra]',
        }),
    },
    {
      provide: SYSTEM_HTTP_CLIENT,
      inject: [HttpClientFactory, WebConfigService],
      useFactory: (factory: HttpClientFactory, config: WebConfigService): AxiosInstance =>
        factory.create({
          baseURL: config.rpc.systemBaseUrl,
          timeout: config.rpc.timeout,
          logPrefix: '[RPC system]',
        }),
    },
    {
      provide: ApiErrorLogApi,
      inject: [INFRA_HTTP_CLIENT, WebConfigService],
      useFactory: (client: AxiosInstance, config: WebConfigService): ApiErrorLogApi =>
        withFallback<ApiErrorLogApi>(new HttpApiErrorLogApi(client), {
          name: 'ApiErrorLogApi',
          policy: DegradationPolicy.BEST_EFFORT,
          fallbackFactory: apiErrorLogApiFallback,
          timeoutMs: config.rpc.timeout,
        }),
    },
    {
      provide: ApiAccessLogApi,
      inject: [INFRA_HTTP_CLIENT, WebConfigService],
      useFactory: (client: AxiosInstance, config: WebConfigService): ApiAccessLogApi =>
        withFallback<ApiAccessLogApi>(new HttpApiAccessLogApi(client), {
          name: 'ApiAccessLogApi',
          policy: DegradationPolicy.BEST_EFFORT,
          fallbackFactory: apiAccessLogApiFallback,
          timeoutMs: config.rpc.timeout,
        }),
    },
    {
      provide: OAuth2TokenApi,
      inject: [SYSTEM_HTTP_CLIENT, WebConfigService],
      useFactory: (client: AxiosInstance, config: WebConfigService): OAuth2TokenApi =>
        withFallback<OAuth2TokenApi>(new HttpOAuth2TokenApi(client), {
          name: 'OAuth2TokenApi',
          policy: DegradationPolicy.CRITICAL,
          fallbackFactory: oauth2TokenApiFallback,
          timeoutMs: config.rpc.timeout,
        }),
    },
    {
      provide: PermissionApi,
      inject: [SYSTEM_HTTP_CLIENT, WebConfigService],
      useFactory: (client: AxiosInstance, config: WebConfigService): PermissionApi =>
        withFallback<PermissionApi>(new HttpPermissionApi(client), {
          name: 'PermissionApi',
          policy: DegradationPolicy.CRITICAL,
          fallbackFactory: permissionApiFallback,
          timeoutMs: config.rpc.timeout,
        }),
    },
  ],
  exports: [ApiErrorLogApi, ApiAccessLogApi, OAuth2TokenApi, PermissionApi],
})
export class RpcModule {}
