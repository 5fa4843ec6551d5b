import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * API 访问日志创建请求
 */
export class ApiAccessLogCreateReqDto {
  @ApiPropertyOptional({ description: '链路追踪编号' })
  traceId?: string;

  @ApiPropertyOptional({ description: '用户编号' })
  userId?: number;

  @ApiPropertyOptional({ description: '用户类型' })
  userType?: number;

  @ApiProperty({ description: '应用名' })
  applicationName!: string;

  @ApiProperty({ description: '请求方法名' })
  requestMethod!: string;

  @ApiProperty({ description: '访问地址' })
  requestUrl!: string;

  @ApiProperty({ description: '请求参数，JSON: { query, body }' })
  requestParams!: string;

  @ApiPropertyOptional({ description: '响应结果' })
  responseBody?: string;

  @ApiPropertyOptional({ description: '用户 IP' })
  userIp?: string;

  @ApiPropertyOptional({ description: '浏览器 UA' })
  userAgent?: string;

  @ApiProperty({ description: '开始请求时间' })
  beginTime!: string;

  @ApiProperty({ description: '结束请求时间' })
  endTime!: string;

  @ApiProperty({ description: '执行时长，单位：毫秒' })
  duration!: number;

  @ApiProperty({ description: '结果码' })
  resultCode!: string;

  @ApiPropertyOptional({ description: '结果提示' })
  resultMsg?: string;
}
