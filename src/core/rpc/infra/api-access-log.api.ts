import type { AxiosInstance } from 'axios';
import { ApiResponse } from '../../server/response/api-response';
import { INFRA_RPC_PREFIX } from '../rpc.constants';
import { isBoolean } from './api-error-log.api';
import { ApiAccessLogCreateReqDto } from './dto/api-access-log-create.dto';

/**
 * API 访问日志远程服务
 */
export abstract class ApiAccessLogApi {
  abstract createApiAccessLog(createDto: ApiAccessLogCreateReqDto): Promise<ApiResponse<boolean>>;
}

export class HttpApiAccessLogApi extends ApiAccessLogApi {
  constructor(private readonly client: AxiosInstance) {
    super();
  }

  async createApiAccessLog(createDto: ApiAccessLogCreateReqDto): Promise<ApiResponse<boolean>> {
    const { data } = await this.client.post<unknown>(`${INFRA_RPC_PREFIX}/api-access-log/create`, createDto);
    return ApiResponse.parse(data, isBoolean);
  }
}

export function apiAccessLogApiFallback(): ApiAccessLogApi {
  return {
    createApiAccessLog: async () => ApiResponse.success(false),
  };
}
