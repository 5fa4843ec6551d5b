import type { NestExpressApplication } from '@nestjs/platform-express';
import type { WebProperties } from '../../config/web.properties';

/**
 * 安装表单请求体解析
 *
 * JSON 请求体由过滤器链读取，express 只解析 urlencoded 表单，上限与 JSON 请求体相同。
 * 超限、解析失败等错误由全局异常过滤器转换为统一响应
 */
export function useFormBodyParser(app: NestExpressApplication, web: WebProperties): void {
  app.useBodyParser('urlencoded', { extended: true, limit: web.bodyLimit });
}
