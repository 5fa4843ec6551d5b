import { SetMetadata } from '@nestjs/common';

/**
 * 元数据键：允许匿名访问
 */
export const PERMIT_ALL_KEY = 'permit_all';

/**
 * 管理后台接口默认要求登录；标注后允许匿名访问
 *
 * @example
 * @PermitAll()
 * @Post('login')
 * login(@Body() dto: AuthLoginReqDto) {}
 */
export function PermitAll() {
  return SetMetadata(PERMIT_ALL_KEY, true);
}
