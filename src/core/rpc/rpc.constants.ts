/**
 * 远程服务 RPC 接口前缀
 */
export const RPC_API_PREFIX = '/rpc-api';

export const INFRA_RPC_PREFIX = `${RPC_API_PREFIX}/infra`;
export const SYSTEM_RPC_PREFIX = `${RPC_API_PREFIX}/system`;

/**
 * 远程服务 axios 客户端注入令牌
 */
export const INFRA_HTTP_CLIENT = Symbol('INFRA_HTTP_CLIENT');
export const SYSTEM_HTTP_CLIENT = Symbol('SYSTEM_HTTP_CLIENT');
