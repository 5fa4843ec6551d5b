import { SetMetadata } from '@nestjs/common';

/**
 * 元数据键：接口所需权限
 */
export const PERMISSIONS_KEY = 'required_permissions';

/**
 * 要求登录用户拥有任一权限
 *
 * @example
 * @RequirePermissions('system:user:create')
 * @Post()
 * create(@Body() dto: UserCreateReqDto) {}
 */
export function RequirePermissions(...permissions: string[]) {
  return SetMetadata(PERMISSIONS_KEY, permissions);
}
