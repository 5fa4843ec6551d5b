import type { ApiPrefixes } from '../server/http/web-framework.utils';

/**
 * Web 层配置快照
 */
export interface WebProperties {
  readonly applicationName: string;
  readonly demoEnabled: boolean;
  readonly bodyCacheExcludedPrefixes: readonly string[];
  readonly bodyLimit: number;
  readonly apiPrefixes: ApiPrefixes;
}

/**
 * 远程服务配置快照
 */
export interface RpcProperties {
  readonly infraBaseUrl: string;
  readonly systemBaseUrl: string;
  readonly timeout: number;
}

export const DEFAULT_APPLICATION_NAME = 'web-app';
export const DEFAULT_BODY_CACHE_EXCLUDED_PREFIXES = ['/admin/', '/actuator/'];
export const DEFAULT_BODY_LIMIT = 1024 * 1024;
export const DEFAULT_ADMIN_API_PREFIX = '/admin-api';
export const DEFAULT_APP_API_PREFIX = '/app-api';
export const DEFAULT_RPC_TIMEOUT = 5000;
