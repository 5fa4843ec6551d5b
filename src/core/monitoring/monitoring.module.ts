import { Module } from '@nestjs/common';
import { HealthController } from './health.controller';

/**
 * 监控模块
 */
@Module({
  controllers: [HealthController],
})
export class MonitoringModule {}
