import { Controller, Get } from '@nestjs/common';
import { WebConfigService } from '../config/web-config.service';
import { RawResponse } from '../server/response/decorators/api-response.decorator';

export interface HealthStatus {
  status: 'UP';
  application: string;
  timestamp: number;
}

/**
 * 健康检查
 * GET /actuator/health
 *
 * 探针接口返回固定格式，不经过统一响应包装
 */
@Controller('actuator')
export class HealthController {
  constructor(private readonly config: WebConfigService) {}

  @RawResponse()
  @Get('health')
  health(): HealthStatus {
    return {
      status: 'UP',
      application: this.config.web.applicationName,
      timestamp: Date.now(),
    };
  }
}
