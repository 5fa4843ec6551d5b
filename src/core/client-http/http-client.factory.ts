import { Injectable, Logger } from '@nestjs/common';
import axios, { AxiosError, AxiosInstance, InternalAxiosRequestConfig } from 'axios';

/**
 * HTTP 客户端配置选项
 */
export interface HttpClientOptions {
  /** 基础 URL */
  baseURL?: string;
  /** 请求超时时间（毫秒） */
  timeout?: number;
  /** 默认请求头 */
  headers?: Record<string, string>;
  /** 日志前缀，用于区分不同的客户端 */
  logPrefix?: string;
  /** 是否启用详细日志 */
  verbose?: boolean;
}

/**
 * HTTP 客户端工厂
 * 用于创建配置化的 Axios 实例，统一管理拦截器和日志
 */
@Injectable()
export class HttpClientFactory {
  private readonly logger = new Logger(HttpClientFactory.name);

  /**
   * 创建 HTTP 客户端实例
   * @param options 配置选项
   * @returns 配置好的 Axios 实例
   */
  create(options: HttpClientOptions): AxiosInstance {
    const { baseURL, timeout = 30000, headers = {}, logPrefix = '[HTTP]', verbose = false } = options;

    this.logger.log(`创建 HTTP 客户端: ${logPrefix}`);
    if (baseURL) {
      this.logger.log(`  - Base URL: ${baseURL}`);
    }
    this.logger.log(`  - Timeout: ${timeout}ms`);

    const client = axios.create({
      baseURL,
      timeout,
      headers: {
        'Content-Type': 'application/json',
        ...headers,
      },
    });

    client.interceptors.request.use((config: InternalAxiosRequestConfig) => {
      const method = config.method?.toUpperCase() || 'UNKNOWN';
      const url = config.url || 'unknown';
      this.logger.debug(`${logPrefix} 发送请求: ${method} ${url}`);

      if (verbose && config.data) {
        this.logger.debug(`${logPrefix} 请求体: ${JSON.stringify(config.data)}`);
      }

      return config;
    });

    client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        if (axios.isAxiosError(error)) {
          this.logAxiosError(logPrefix, error);
        }
        return Promise.reject(error);
      },
    );

    return client;
  }

  private logAxiosError(logPrefix: string, error: AxiosError): void {
    const url = error.config?.url || 'unknown';
    if (error.response) {
      this.logger.error(`${logPrefix} 响应错误 ${error.response.status}: ${url}`);
    } else if (error.request) {
      this.logger.error(`${logPrefix} 无响应: ${url} ${error.code ?? ''} ${error.message}`);
    } else {
      this.logger.error(`${logPrefix} 请求配置错误: ${error.message}`);
    }
  }
}
