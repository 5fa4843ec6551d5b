/**
 * 用户类型
 */
export enum UserType {
  /** 普通用户（用户端 API） */
  MEMBER = 1,
  /** 管理人员（管理后台 API） */
  ADMIN = 2,
}

/**
 * 登录用户信息，由令牌校验结果构建
 */
export interface LoginUser {
  id: number;
  userType: UserType;
  tenantId?: number;
  /** 授权范围 */
  scopes: string[];
  /** 附加信息（昵称、部门等） */
  info?: Record<string, string>;
  expiresTime?: Date;
}
