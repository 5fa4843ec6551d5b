import { MiddlewareConsumer, Module, NestModule, OnApplicationBootstrap } from '@nestjs/common';
import { APP_FILTER, APP_INTERCEPTOR, APP_PIPE, DiscoveryModule } from '@nestjs/core';
import { WebConfigService } from '../config/web-config.service';
import { SecurityModule } from '../security/security.module';
import { TokenAuthenticationFilter } from '../security/token-authentication.filter';
import { ApiErrorLogBuilder } from './exception/api-error-log.builder';
import { globalErrorCodeRegistry } from './exception/error-code';
import { ExceptionDispatcher } from './exception/exception-dispatcher';
import {
  ApiAccessLogFilter,
  CacheRequestBodyFilter,
  CorsFilter,
  DemoFilter,
  TenantContextFilter,
  TraceFilter,
} from './filter/filters';
import { WebFilterChainMiddleware } from './filter/web-filter-chain.middleware';
import { WebFilterRegistry } from './filter/web-filter.registry';
import { RouteMethodIndex } from './http/route-method.index';
import { RequestValidationPipe } from './pipes/request-validation.pipe';
import { GlobalExceptionFilter } from './response/filters/global-exception.filter';
import { ResponseInterceptor } from './response/interceptors/response.interceptor';

/**
 * Web 模块
 *
 * - 过滤器链：所有请求先经过 WebFilterChainMiddleware
 * - 全局异常过滤器、响应拦截器、参数校验管道
 */
@Module({
  imports: [DiscoveryModule, SecurityModule],
  providers: [
    CorsFilter,
    TraceFilter,
    CacheRequestBodyFilter,
    TenantContextFilter,
    ApiAccessLogFilter,
    DemoFilter,
    {
      provide: WebFilterRegistry,
      inject: [
        WebConfigService,
        CorsFilter,
        TraceFilter,
        CacheRequestBodyFilter,
        TenantContextFilter,
        ApiAccessLogFilter,
        TokenAuthenticationFilter,
        DemoFilter,
      ],
      useFactory: (
        config: WebConfigService,
        corsFilter: CorsFilter,
        traceFilter: TraceFilter,
        cacheRequestBodyFilter: CacheRequestBodyFilter,
        tenantContextFilter: TenantContextFilter,
        apiAccessLogFilter: ApiAccessLogFilter,
        tokenAuthenticationFilter: TokenAuthenticationFilter,
        demoFilter: DemoFilter,
      ): WebFilterRegistry => {
        const registry = new WebFilterRegistry()
          .register(corsFilter)
          .register(traceFilter)
          .register(cacheRequestBodyFilter)
          .register(tenantContextFilter)
          .register(apiAccessLogFilter)
          .register(tokenAuthenticationFilter);
        if (config.web.demoEnabled) {
          registry.register(demoFilter);
        }
        return registry.assertDependencies();
      },
    },
    RouteMethodIndex,
    ApiErrorLogBuilder,
    ExceptionDispatcher,
    { provide: APP_FILTER, useClass: GlobalExceptionFilter },
    { provide: APP_INTERCEPTOR, useClass: ResponseInterceptor },
    { provide: APP_PIPE, useClass: RequestValidationPipe },
  ],
  exports: [WebFilterRegistry, ExceptionDispatcher],
})
export class WebModule implements NestModule, OnApplicationBootstrap {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(WebFilterChainMiddleware).forRoutes('*');
  }

  onApplicationBootstrap(): void {
    globalErrorCodeRegistry.freeze();
  }
}
