import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DEFAULT_ADMIN_API_PREFIX,
  DEFAULT_APP_API_PREFIX,
  DEFAULT_APPLICATION_NAME,
  DEFAULT_BODY_CACHE_EXCLUDED_PREFIXES,
  DEFAULT_BODY_LIMIT,
  DEFAULT_RPC_TIMEOUT,
  RpcProperties,
  WebProperties,
} from './web.properties';

/**
 * Web 配置服务
 *
 * 启动时从环境变量读取一次，之后只读
 */
@Injectable()
export class WebConfigService {
  readonly web: WebProperties;
  readonly rpc: RpcProperties;

  constructor(private readonly configService: ConfigService) {
    this.web = Object.freeze({
      applicationName: this.getString('APP_NAME') ?? DEFAULT_APPLICATION_NAME,
      demoEnabled: this.getString('WEB_DEMO_ENABLED') === 'true',
      bodyCacheExcludedPrefixes: Object.freeze(
        this.getList('WEB_BODY_CACHE_EXCLUDED_PREFIXES') ?? DEFAULT_BODY_CACHE_EXCLUDED_PREFIXES,
      ),
      bodyLimit: this.getNumber('WEB_BODY_LIMIT') ?? DEFAULT_BODY_LIMIT,
      apiPrefixes: Object.freeze({
        adminPrefix: this.getString('WEB_ADMIN_API_PREFIX') ?? DEFAULT_ADMIN_API_PREFIX,
        appPrefix: this.getString('WEB_APP_API_PREFIX') ?? DEFAULT_APP_API_PREFIX,
      }),
    });

    this.rpc = Object.freeze({
      // 已在启动时验证
      infraBaseUrl: this.getString('RPC_INFRA_BASE_URL') ?? '',
      systemBaseUrl: this.getString('RPC_SYSTEM_BASE_URL') ?? '',
      timeout: this.getNumber('RPC_TIMEOUT') ?? DEFAULT_RPC_TIMEOUT,
    });
  }

  get nodeEnv(): string {
    return this.getString('NODE_ENV') ?? 'development';
  }

  get port(): number {
    return this.getNumber('PORT') ?? 48080;
  }

  private getString(key: string): string | undefined {
    const value = this.configService.get<unknown>(key);
    if (value === undefined || value === null || value === '') {
      return undefined;
    }
    return String(value).trim();
  }

  private getNumber(key: string): number | undefined {
    const value = this.getString(key);
    if (value === undefined) {
      return undefined;
    }
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }

  private getList(key: string): string[] | undefined {
    const value = this.getString(key);
    if (value === undefined) {
      return undefined;
    }
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
}
