import { SetMetadata } from '@nestjs/common';

/**
 * 元数据键：标记原始响应
 */
export const RAW_RESPONSE_KEY = 'raw_response';

/**
 * 原始响应装饰器
 * 用于标记**不需要**统一响应格式的端点（豁免全局 ResponseInterceptor）
 *
 * 使用场景：
 * 1. 健康检查等需要固定格式的探针接口
 * 2. 文件下载、流式输出
 *
 * 使用方式：
 * ```typescript
 * @RawResponse()
 * @Get('health')
 * health() {
 *   return { status: 'UP' };
 * }
 * ```
 */
export function RawResponse() {
  return SetMetadata(RAW_RESPONSE_KEY, true);
}
