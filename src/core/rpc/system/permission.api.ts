import type { AxiosInstance } from 'axios';
import { GlobalErrorCodes } from '../../server/exception/error-code';
import { ApiResponse } from '../../server/response/api-response';
import { isBoolean } from '../infra/api-error-log.api';
import { SYSTEM_RPC_PREFIX } from '../rpc.constants';

/**
 * 权限远程服务
 */
export abstract class PermissionApi {
  /**
   * 是否拥有任一权限
   */
  abstract hasAnyPermissions(userId: number, permissions: readonly string[]): Promise<ApiResponse<boolean>>;

  /**
   * 是否拥有任一角色
   */
  abstract hasAnyRoles(userId: number, roles: readonly string[]): Promise<ApiResponse<boolean>>;
}

export class HttpPermissionApi extends PermissionApi {
  constructor(private readonly client: AxiosInstance) {
    super();
  }

  async hasAnyPermissions(userId: number, permissions: readonly string[]): Promise<ApiResponse<boolean>> {
    const { data } = await this.client.get<unknown>(`${SYSTEM_RPC_PREFIX}/permission/has-any-permissions`, {
      params: { userId, permissions: permissions.join(',') },
    });
    return ApiResponse.parse(data, isBoolean);
  }

  async hasAnyRoles(userId: number, roles: readonly string[]): Promise<ApiResponse<boolean>> {
    const { data } = await this.client.get<unknown>(`${SYSTEM_RPC_PREFIX}/permission/has-any-roles`, {
      params: { userId, roles: roles.join(',') },
    });
    return ApiResponse.parse(data, isBoolean);
  }
}

export const PERMISSION_UNAVAILABLE = '权限服务调用失败';

/**
 * 关键调用：权限服务不可用时返回错误响应，由调用方拒绝请求
 */
export function permissionApiFallback(): PermissionApi {
  const unavailable = async () =>
    ApiResponse.error<boolean>(GlobalErrorCodes.INTERNAL_SERVER_ERROR.code, PERMISSION_UNAVAILABLE);
  return {
    hasAnyPermissions: unavailable,
    hasAnyRoles: unavailable,
  };
}
