import { Global, Module } from '@nestjs/common';
import { HttpClientFactory } from './http-client.factory';

/**
 * HTTP 客户端模块
 * 提供配置化的 axios 客户端工厂
 */
@Global()
@Module({
  providers: [HttpClientFactory],
  exports: [HttpClientFactory],
})
export class HttpClientModule {}
