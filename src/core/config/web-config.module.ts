import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { WebConfigService } from './web-config.service';

/**
 * Web 配置模块
 */
@Global()
@Module({
  imports: [ConfigModule],
  providers: [WebConfigService],
  exports: [WebConfigService],
})
export class WebConfigModule {}
