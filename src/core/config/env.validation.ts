import { plainToInstance } from 'class-transformer';
import {
  IsEnum,
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Matches,
  Min,
  validateSync,
} from 'class-validator';

/**
 * 环境变量枚举
 */
export enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

/**
 * 环境变量配置类
 * 使用 class-validator 装饰器进行验证
 */
export class EnvironmentVariables {
  // ==================== 基础配置 ====================
  @IsEnum(Environment, {
    message: 'NODE_ENV 必须是 development、production 或 test',
  })
  @IsNotEmpty({ message: 'NODE_ENV 环境变量未配置，请在 .env 文件中设置' })
  NODE_ENV!: Environment;

  @IsOptional()
  @IsNumber({}, { message: 'PORT 必须是数字' })
  @Min(1, { message: 'PORT 必须大于 0' })
  PORT?: number;

  @IsOptional()
  @IsString({ message: 'APP_NAME 必须是字符串' })
  APP_NAME?: string;

  // ==================== Web 配置 ====================
  @IsOptional()
  @IsIn(['true', 'false'], { message: 'WEB_DEMO_ENABLED 必须是 true 或 false' })
  WEB_DEMO_ENABLED?: string;

  @IsOptional()
  @IsString({ message: 'WEB_BODY_CACHE_EXCLUDED_PREFIXES 必须是逗号分隔的路径前缀' })
  WEB_BODY_CACHE_EXCLUDED_PREFIXES?: string;

  @IsOptional()
  @IsNumber({}, { message: 'WEB_BODY_LIMIT 必须是数字' })
  @Min(1024, { message: 'WEB_BODY_LIMIT 必须大于等于 1024 字节' })
  WEB_BODY_LIMIT?: number;

  @IsOptional()
  @Matches(/^\/[\w-]+$/, { message: 'WEB_ADMIN_API_PREFIX 必须以 / 开头，例如 /admin-api' })
  WEB_ADMIN_API_PREFIX?: string;

  @IsOptional()
  @Matches(/^\/[\w-]+$/, { message: 'WEB_APP_API_PREFIX 必须以 / 开头，例如 /app-api' })
  WEB_APP_API_PREFIX?: string;

  // ==================== 远程服务配置 ====================
  @IsUrl({ require_tld: false }, { message: 'RPC_INFRA_BASE_URL 必须是有效的 URL' })
  @IsNotEmpty({ message: 'RPC_INFRA_BASE_URL 环境变量未配置，请在 .env 文件中设置' })
  RPC_INFRA_BASE_URL!: string;

  @IsUrl({ require_tld: false }, { message: 'RPC_SYSTEM_BASE_URL 必须是有效的 URL' })
  @IsNotEmpty({ message: 'RPC_SYSTEM_BASE_URL 环境变量未配置，请在 .env 文件中设置' })
  RPC_SYSTEM_BASE_URL!: string;

  @IsOptional()
  @IsNumber({}, { message: 'RPC_TIMEOUT 必须是数字' })
  @Min(100, { message: 'RPC_TIMEOUT 必须大于等于 100ms' })
  RPC_TIMEOUT?: number;
}

/**
 * 验证环境变量
 * 在应用启动时调用，如果验证失败会抛出错误并阻止应用启动
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    const errorMessages = errors
      .map((error) => {
        const constraints = error.constraints ? Object.values(error.constraints) : [];
        return `  - ${error.property}: ${constraints.join(', ')}`;
      })
      .join('\n');

    throw new Error(`\n❌ 环境变量验证失败：\n${errorMessages}\n\n请检查你的 .env 文件配置。`);
  }

  return validatedConfig;
}
