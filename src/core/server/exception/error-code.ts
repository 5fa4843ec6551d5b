/**
 * 错误码对象
 *
 * code 为不透明字符串，首字母区分错误来源：
 * - A 开头：调用方错误（参数、权限、请求方式等）
 * - B 开头：服务端错误
 * - C 开头：第三方 / 上游服务错误
 *
 * msg 可以包含 `{}` 占位符，由 formatMessage 按顺序填充
 */
export interface ErrorCode {
  readonly code: string;
  readonly msg: string;
}

/**
 * 错误来源分类
 */
export enum FaultClass {
  SUCCESS = 'success',
  CALLER = 'caller',
  SERVER = 'server',
  UPSTREAM = 'upstream',
}

/**
 * 成功码，任何错误码都不允许与之相同
 */
export const SUCCESS_CODE = '00000';

/**
 * 全局错误码
 */
export const GlobalErrorCodes = {
  SUCCESS: { code: SUCCESS_CODE, msg: '成功' },

  // ==================== 调用方错误 ====================
  BAD_REQUEST: { code: 'A0001', msg: '用户端错误' },
  REGISTER_ERROR: { code: 'A0100', msg: '用户注册错误' },
  UNAUTHORIZED: { code: 'A0200', msg: '用户未登录' },
  FORBIDDEN: { code: 'A0300', msg: '没有该操作权限' },
  INVALID_PARAMS: { code: 'A0400', msg: '用户请求参数错误' },
  NOT_FOUND: { code: 'A0404', msg: '请求未找到' },
  METHOD_NOT_ALLOWED: { code: 'A0405', msg: '请求方法不正确' },
  LOCKED: { code: 'A0423', msg: '请求失败，请稍后重试' },
  TOO_MANY_REQUESTS: { code: 'A0429', msg: '请求过于频繁，请稍后重试' },
  REPEATED_REQUESTS: { code: 'A0900', msg: '重复请求，请稍后重试' },
  DEMO_DENY: { code: 'A0901', msg: '演示模式，禁止写操作' },

  // ==================== 服务端错误 ====================
  INTERNAL_SERVER_ERROR: { code: 'B0001', msg: '系统执行出错' },
  NOT_IMPLEMENTED: { code: 'B0501', msg: '功能未实现/未开启' },
  ERROR_CONFIGURATION: { code: 'B0502', msg: '错误的配置项' },
  UNKNOWN: { code: 'B0999', msg: '未知错误' },

  // ==================== 上游服务错误 ====================
  THIRD_PARTY_ERROR: { code: 'C0001', msg: '调用第三方服务出错' },
} as const satisfies Record<string, ErrorCode>;

/**
 * 错误码注册表
 *
 * 启动阶段注册，freeze() 之后只读
 */
export class ErrorCodeRegistry {
  private readonly codes = new Map<string, ErrorCode>();
  private frozen = false;

  constructor(initial: Iterable<ErrorCode> = []) {
    for (const errorCode of initial) {
      this.register(errorCode);
    }
  }

  register(errorCode: ErrorCode): void {
    if (this.frozen) {
      throw new Error(`错误码注册表已冻结，无法注册 ${errorCode.code}`);
    }
    const existing = this.codes.get(errorCode.code);
    if (existing && existing.msg !== errorCode.msg) {
      throw new Error(`错误码 ${errorCode.code} 重复注册: "${existing.msg}" / "${errorCode.msg}"`);
    }
    this.codes.set(errorCode.code, errorCode);
  }

  lookup(code: string): ErrorCode | undefined {
    return this.codes.get(code);
  }

  faultClassOf(code: string): FaultClass | undefined {
    return faultClassOf(code);
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }
}

export function faultClassOf(code: string): FaultClass | undefined {
  if (code === SUCCESS_CODE) {
    return FaultClass.SUCCESS;
  }
  switch (code.charAt(0)) {
    case 'A':
      return FaultClass.CALLER;
    case 'B':
      return FaultClass.SERVER;
    case 'C':
      return FaultClass.UPSTREAM;
    default:
      return undefined;
  }
}

/**
 * 进程级默认注册表，包含全部全局错误码
 */
export const globalErrorCodeRegistry = new ErrorCodeRegistry(Object.values(GlobalErrorCodes));
