/**
 * 业务逻辑异常
 *
 * 由业务代码主动抛出，携带错误码与已格式化的提示信息，
 * 全局异常处理会原样返回 code 与 msg
 */
export class BusinessException extends Error {
  constructor(
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'BusinessException';
  }
}
