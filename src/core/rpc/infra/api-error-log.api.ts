import type { AxiosInstance } from 'axios';
import { ApiResponse } from '../../server/response/api-response';
import { INFRA_RPC_PREFIX } from '../rpc.constants';
import { ApiErrorLogCreateReqDto } from './dto/api-error-log-create.dto';

/**
 * API 错误日志远程服务
 */
export abstract class ApiErrorLogApi {
  abstract createApiErrorLog(createDto: ApiErrorLogCreateReqDto): Promise<ApiResponse<boolean>>;
}

export class HttpApiErrorLogApi extends ApiErrorLogApi {
  constructor(private readonly client: AxiosInstance) {
    super();
  }

  async createApiErrorLog(createDto: ApiErrorLogCreateReqDto): Promise<ApiResponse<boolean>> {
    const { data } = await this.client.post<unknown>(`${INFRA_RPC_PREFIX}/api-error-log/create`, createDto);
    return ApiResponse.parse(data, isBoolean);
  }
}

/**
 * 尽力而为：记录失败不影响业务
 */
export function apiErrorLogApiFallback(): ApiErrorLogApi {
  return {
    createApiErrorLog: async () => ApiResponse.success(false),
  };
}

export function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean';
}
