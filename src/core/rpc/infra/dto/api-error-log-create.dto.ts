import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * API 错误日志创建请求
 */
export class ApiErrorLogCreateReqDto {
  @ApiPropertyOptional({ description: '用户编号' })
  userId?: number;

  @ApiPropertyOptional({ description: '用户类型' })
  userType?: number;

  @ApiPropertyOptional({ description: '链路追踪编号' })
  traceId?: string;

  @ApiProperty({ description: '应用名' })
  applicationName!: string;

  @ApiProperty({ description: '请求方法名', example: 'POST' })
  requestMethod!: string;

  @ApiProperty({ description: '访问地址', example: '/admin-api/system/user/create' })
  requestUrl!: string;

  @ApiProperty({ description: '请求参数，JSON: { query, body }' })
  requestParams!: string;

  @ApiPropertyOptional({ description: '用户 IP' })
  userIp?: string;

  @ApiPropertyOptional({ description: '浏览器 UA' })
  userAgent?: string;

  @ApiProperty({ description: '异常时间' })
  exceptionTime!: string;

  @ApiProperty({ description: '异常名' })
  exceptionName!: string;

  @ApiProperty({ description: '异常导致的消息' })
  exceptionMessage!: string;

  @ApiProperty({ description: '异常导致的根消息' })
  exceptionRootCauseMessage!: string;

  @ApiProperty({ description: '异常的栈轨迹' })
  exceptionStackTrace!: string;

  @ApiPropertyOptional({ description: '异常发生的类全名' })
  exceptionClassName?: string;

  @ApiPropertyOptional({ description: '异常发生的类文件' })
  exceptionFileName?: string;

  @ApiPropertyOptional({ description: '异常发生的方法名' })
  exceptionMethodName?: string;

  @ApiPropertyOptional({ description: '异常发生的方法所在行' })
  exceptionLineNumber?: number;
}
