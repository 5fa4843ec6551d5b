import { Injectable, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { OAuth2TokenApi } from '../rpc/system/oauth2-token.api';
import type { HttpRequest } from '../server/http/http-request';
import { HEADER_AUTHORIZATION } from '../server/http/web-framework.utils';
import { FilterChain, OncePerRequestFilter } from '../server/filter/web-filter';
import { WebFilterName, WebFilterOrder } from '../server/filter/web-filter-order';
import { extractBearerToken, maskToken } from '../utils/string.util';

/**
 * 令牌认证过滤器
 *
 * 校验 Authorization: Bearer 令牌，通过后将登录用户写入请求上下文；
 * 没有令牌或校验未通过时按未登录继续处理
 */
@Injectable()
export class TokenAuthenticationFilter extends OncePerRequestFilter {
  private readonly logger = new Logger(TokenAuthenticationFilter.name);

  readonly name = WebFilterName.TOKEN_AUTHENTICATION;
  readonly order = WebFilterOrder.SECURITY_FILTER;

  constructor(private readonly oauth2TokenApi: OAuth2TokenApi) {
    super();
  }

  protected async doFilterInternal(
    request: HttpRequest,
    response: Response,
    chain: FilterChain,
  ): Promise<void> {
    const token = extractBearerToken(request.header(HEADER_AUTHORIZATION));
    if (token) {
      const result = await this.oauth2TokenApi.checkAccessToken(token);
      const data = result.data;
      if (result.isSuccess() && data) {
        request.context.loginUser = {
          id: data.userId,
          userType: data.userType,
          tenantId: data.tenantId ?? undefined,
          scopes: data.scopes,
          info: data.userInfo,
          expiresTime: typeof data.expiresTime === 'number' ? new Date(data.expiresTime) : undefined,
        };
      } else {
        this.logger.debug(`[token] ${maskToken(token)} 校验未通过: ${result.code} ${result.msg}`);
      }
    }
    await chain.doFilter(request, response);
  }
}
