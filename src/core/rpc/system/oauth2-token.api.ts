import type { AxiosInstance } from 'axios';
import { GlobalErrorCodes } from '../../server/exception/error-code';
import { ApiResponse } from '../../server/response/api-response';
import { SYSTEM_RPC_PREFIX } from '../rpc.constants';
import {
  isAccessTokenCheckResult,
  OAuth2AccessTokenCheckRespDto,
} from './dto/oauth2-access-token-check.dto';

/**
 * OAuth2 令牌远程服务
 */
export abstract class OAuth2TokenApi {
  abstract checkAccessToken(accessToken: string): Promise<ApiResponse<OAuth2AccessTokenCheckRespDto>>;
}

export class HttpOAuth2TokenApi extends OAuth2TokenApi {
  constructor(private readonly client: AxiosInstance) {
    super();
  }

  async checkAccessToken(accessToken: string): Promise<ApiResponse<OAuth2AccessTokenCheckRespDto>> {
    const { data } = await this.client.get<unknown>(`${SYSTEM_RPC_PREFIX}/oauth2/token/check`, {
      params: { accessToken },
    });
    return ApiResponse.parse(data, isAccessTokenCheckResult);
  }
}

export const OAUTH2_TOKEN_UNAVAILABLE = '令牌服务调用失败';

/**
 * 关键调用：令牌服务不可用时返回错误响应，请求按未登录处理
 */
export function oauth2TokenApiFallback(): OAuth2TokenApi {
  return {
    checkAccessToken: async () =>
      ApiResponse.error(GlobalErrorCodes.INTERNAL_SERVER_ERROR.code, OAUTH2_TOKEN_UNAVAILABLE),
  };
}
