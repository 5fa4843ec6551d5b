import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { UserType } from '../../../security/login-user';

/**
 * 访问令牌校验结果
 */
export class OAuth2AccessTokenCheckRespDto {
  @ApiProperty({ description: '用户编号' })
  userId!: number;

  @ApiProperty({ description: '用户类型', enum: UserType })
  userType!: UserType;

  @ApiPropertyOptional({ description: '用户信息' })
  userInfo?: Record<string, string>;

  @ApiPropertyOptional({ description: '租户编号' })
  tenantId?: number | null;

  @ApiProperty({ description: '授权范围', type: [String] })
  scopes!: string[];

  @ApiPropertyOptional({ description: '过期时间（毫秒时间戳）' })
  expiresTime?: number | null;
}

export function isAccessTokenCheckResult(value: unknown): value is OAuth2AccessTokenCheckRespDto {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const userId: unknown = Reflect.get(value, 'userId');
  const userType: unknown = Reflect.get(value, 'userType');
  const tenantId: unknown = Reflect.get(value, 'tenantId');
  const scopes: unknown = Reflect.get(value, 'scopes');
  return (
    typeof userId === 'number' &&
    (userType === UserType.ADMIN || userType === UserType.MEMBER) &&
    (tenantId === undefined || tenantId === null || typeof tenantId === 'number') &&
    Array.isArray(scopes) &&
    scopes.every((scope) => typeof scope === 'string')
  );
}
