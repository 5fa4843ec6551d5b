import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import {
  HttpClientModule,
  LoggerModule,
  RpcModule,
  WebConfigModule,
  WebModule,
  validate,
} from './core';
import { MonitoringModule } from './core/monitoring';

/**
 * 应用根模块
 *
 * 目录结构: src/
 *   └── core/              - 核心技术层
 *       ├── config/        - 配置管理
 *       ├── logger/        - 日志
 *       ├── client-http/   - 客户端 HTTP 工具
 *       ├── rpc/           - 远程服务调用与降级
 *       ├── security/      - 令牌认证、权限校验
 *       ├── server/        - 过滤器链、异常分发、统一响应
 *       └── monitoring/    - 健康检查
 */
@Module({
  imports: [
    // ==================== 全局配置 ====================
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [`.env.${process.env.NODE_ENV || 'development'}`, '.env'],
      expandVariables: true,
      validate,
    }),
    WebConfigModule,

    // ==================== 核心层 (Core Layer) ====================
    LoggerModule,
    HttpClientModule,
    RpcModule,
    WebModule,
    MonitoringModule,
  ],
})
export class AppModule {}
