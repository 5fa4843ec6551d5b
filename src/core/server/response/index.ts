/**
 * 服务端响应处理 - 统一导出
 */

// 统一响应体
export * from './api-response';

// 装饰器
export * from './decorators/api-response.decorator';

// 过滤器
export * from './filters/global-exception.filter';

// 拦截器
export * from './interceptors/response.interceptor';
