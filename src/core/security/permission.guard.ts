import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request } from 'express';
import { WebConfigService } from '../config/web-config.service';
import { ExpressHttpRequest } from '../server/http/http-request';
import { PERMIT_ALL_KEY } from './permit-all.decorator';
import { PERMISSIONS_KEY } from './require-permissions.decorator';
import { SecurityFrameworkService } from './security-framework.service';

/**
 * 权限守卫
 *
 * - 管理后台接口默认要求登录，@PermitAll() 标注的除外
 * - 标注了 @RequirePermissions 的接口：未登录返回 401，无权限返回 403
 */
@Injectable()
export class PermissionGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly securityFrameworkService: SecurityFrameworkService,
    private readonly config: WebConfigService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const targets = [context.getHandler(), context.getClass()];
    const permissions = this.reflector.getAllAndOverride<string[] | undefined>(PERMISSIONS_KEY, targets) ?? [];
    const permitAll = this.reflector.getAllAndOverride<boolean | undefined>(PERMIT_ALL_KEY, targets) ?? false;

    const loginRequired = permissions.length > 0 || (!permitAll && this.isAdminRequest(context));
    if (!loginRequired) {
      return true;
    }
    if (!this.securityFrameworkService.getLoginUser()) {
      throw new UnauthorizedException();
    }
    if (permissions.length > 0 && !(await this.securityFrameworkService.hasAnyPermissions(...permissions))) {
      throw new ForbiddenException();
    }
    return true;
  }

  private isAdminRequest(context: ExecutionContext): boolean {
    const request = ExpressHttpRequest.of(context.switchToHttp().getRequest<Request>());
    return request.path.startsWith(this.config.web.apiPrefixes.adminPrefix);
  }
}
