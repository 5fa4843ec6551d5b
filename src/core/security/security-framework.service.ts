import { Injectable } from '@nestjs/common';
import { LRUCache } from 'lru-cache';
import { ExecutionException } from '../server/exception/execution.exception';
import { getCurrentContext } from '../server/http/request-context';
import { PermissionApi } from '../rpc/system/permission.api';
import { LoginUser } from './login-user';

/**
 * 权限判断结果缓存时间
 */
export const PERMISSION_CACHE_TTL_MS = 60 * 1000;

const PERMISSION_CACHE_MAX = 10000;

/**
 * 权限判断服务
 *
 * 权限、角色判断结果缓存 1 分钟；远程加载失败时包装为 ExecutionException 抛出
 */
@Injectable()
export class SecurityFrameworkService {
  private readonly cache = new LRUCache<string, boolean>({
    max: PERMISSION_CACHE_MAX,
    ttl: PERMISSION_CACHE_TTL_MS,
  });

  constructor(private readonly permissionApi: PermissionApi) {}

  getLoginUser(): LoginUser | undefined {
    return getCurrentContext()?.loginUser;
  }

  hasPermission(permission: string): Promise<boolean> {
    return this.hasAnyPermissions(permission);
  }

  async hasAnyPermissions(...permissions: string[]): Promise<boolean> {
    const user = this.getLoginUser();
    if (!user) {
      return false;
    }
    return this.load(`permission:${user.id}:${permissions.join(',')}`, async () =>
      (await this.permissionApi.hasAnyPermissions(user.id, permissions)).getDataOrThrow(),
    );
  }

  hasRole(role: string): Promise<boolean> {
    return this.hasAnyRoles(role);
  }

  async hasAnyRoles(...roles: string[]): Promise<boolean> {
    const user = this.getLoginUser();
    if (!user) {
      return false;
    }
    return this.load(`role:${user.id}:${roles.join(',')}`, async () =>
      (await this.permissionApi.hasAnyRoles(user.id, roles)).getDataOrThrow(),
    );
  }

  hasScope(scope: string): boolean {
    return this.hasAnyScopes(scope);
  }

  hasAnyScopes(...scopes: string[]): boolean {
    const user = this.getLoginUser();
    if (!user) {
      return false;
    }
    return scopes.some((scope) => user.scopes.includes(scope));
  }

  private async load(key: string, loader: () => Promise<boolean>): Promise<boolean> {
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached;
    }
    let value: boolean;
    try {
      value = await loader();
    } catch (error) {
      throw new ExecutionException(error);
    }
    this.cache.set(key, value);
    return value;
  }
}
