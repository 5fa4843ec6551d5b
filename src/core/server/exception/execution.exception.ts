/**
 * 执行包装异常
 *
 * 异步计算、缓存加载等场景把真实异常包装在 cause 中抛出，
 * 全局异常处理会以 cause 重新分派
 */
export class ExecutionException extends Error {
  constructor(
    readonly cause: unknown,
    message?: string,
  ) {
    super(message ?? (cause instanceof Error ? cause.message : String(cause)));
    this.name = 'ExecutionException';
  }
}
