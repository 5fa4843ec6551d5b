import { ConfigService } from '@nestjs/config';
import { WebConfigService } from '../../config/web-config.service';

/**
 * 测试用配置；overrides 覆盖默认环境变量
 */
export function createTestWebConfig(overrides: Record<string, string> = {}): WebConfigService {
  return new WebConfigService(
    new ConfigService({
      NODE_ENV: 'test',
      RPC_INFRA_BASE_URL: 'http://infra.test',
      RPC_SYSTEM_BASE_URL: 'http://system.test',
      ...overrides,
    }),
  );
}
