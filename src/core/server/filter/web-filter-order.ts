/**
 * 过滤器顺序
 *
 * 数值越小越先执行；相同数值按注册顺序执行
 */
export const WebFilterOrder = {
  CORS_FILTER: -2147483648,
  TRACE_FILTER: -2147483648 + 1,
  ENV_TAG_FILTER: -2147483648 + 2,

  REQUEST_BODY_CACHE_FILTER: -2147483648 + 500,
  API_ENCRYPT_FILTER: -2147483648 + 501,

  TENANT_CONTEXT_FILTER: -104,
  API_ACCESS_LOG_FILTER: -103,
  XSS_FILTER: -102,
  SECURITY_FILTER: -100,
  TENANT_SECURITY_FILTER: -99,

  DEMO_FILTER: 2147483647,
} as const;

/**
 * 过滤器名称
 */
export const WebFilterName = {
  CORS: 'corsFilter',
  TRACE: 'traceFilter',
  REQUEST_BODY_CACHE: 'cacheRequestBodyFilter',
  TENANT_CONTEXT: 'tenantContextFilter',
  API_ACCESS_LOG: 'apiAccessLogFilter',
  TOKEN_AUTHENTICATION: 'tokenAuthenticationFilter',
  DEMO: 'demoFilter',
} as const;

/**
 * 过滤器之间的先后依赖：[先执行, 后执行]
 *
 * 注册表启动时校验已注册过滤器之间的关系
 */
export const WEB_FILTER_DEPENDENCIES: ReadonlyArray<readonly [before: string, after: string]> = [
  // 跨域处理必须最先执行，预检请求不进入后续过滤器
  [WebFilterName.CORS, WebFilterName.TRACE],
  [WebFilterName.CORS, WebFilterName.REQUEST_BODY_CACHE],
  [WebFilterName.CORS, WebFilterName.TOKEN_AUTHENTICATION],
  // 访问日志读取请求体，需要先缓存
  [WebFilterName.REQUEST_BODY_CACHE, WebFilterName.API_ACCESS_LOG],
  [WebFilterName.TRACE, WebFilterName.API_ACCESS_LOG],
  [WebFilterName.TENANT_CONTEXT, WebFilterName.API_ACCESS_LOG],
  [WebFilterName.TENANT_CONTEXT, WebFilterName.TOKEN_AUTHENTICATION],
  // 演示模式依赖登录用户，必须最后执行
  [WebFilterName.TOKEN_AUTHENTICATION, WebFilterName.DEMO],
  [WebFilterName.TENANT_CONTEXT, WebFilterName.DEMO],
  [WebFilterName.API_ACCESS_LOG, WebFilterName.DEMO],
  [WebFilterName.REQUEST_BODY_CACHE, WebFilterName.DEMO],
];
