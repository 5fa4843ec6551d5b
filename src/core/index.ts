/**
 * 核心层 - 统一导出入口
 *
 * - config: 配置管理
 * - logger: 日志
 * - client-http: 客户端 HTTP 工具
 * - rpc: 远程服务调用与降级
 * - security: 令牌认证、权限校验
 * - server: 过滤器链、异常分发、统一响应
 */

// 基础设施
export * from './config';
export * from './logger';

// 客户端功能
export * from './client-http';
export * from './rpc';

// 服务端功能
export * from './security';
export * from './server';

// 工具函数
export * from './utils';
