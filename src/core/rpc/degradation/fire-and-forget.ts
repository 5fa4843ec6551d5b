import { Logger } from '@nestjs/common';
import { ApiResponse } from '../../server/response/api-response';

const logger = new Logger('FireAndForget');

/**
 * 异步执行 task，不等待结果
 *
 * task 的异常或失败响应只记录日志，不会传递给调用方。
 * 返回的 Promise 永远不会 reject，调用方用 `void` 忽略即可
 */
export function fireAndForget(label: string, task: () => Promise<unknown>): Promise<void> {
  return Promise.resolve()
    .then(task)
    .then((result) => {
      if (result instanceof ApiResponse && result.isError()) {
        logger.warn(`[${label}] 调用返回失败: ${result.code} ${result.msg}`);
      }
    })
    .catch((error: unknown) => {
      logger.error(
        `[${label}] 调用异常: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    });
}
