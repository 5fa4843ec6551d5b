import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { PermissionGuard } from './permission.guard';
import { SecurityFrameworkService } from './security-framework.service';
import { TokenAuthenticationFilter } from './token-authentication.filter';

/**
 * 安全模块
 */
@Module({
  providers: [
    SecurityFrameworkService,
    TokenAuthenticationFilter,
    { provide: APP_GUARD, useClass: PermissionGuard },
  ],
  exports: [SecurityFrameworkService, TokenAuthenticationFilter],
})
export class SecurityModule {}
