import {
  ForbiddenException,
  HttpException,
  Logger,
  MethodNotAllowedException,
  NotFoundException,
  PayloadTooLargeException,
  UnauthorizedException,
  UnsupportedMediaTypeException,
} from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { WebConfigService } from '@core/config/web-config.service';
import { ApiErrorLogApi } from '@core/rpc/infra/api-error-log.api';
import { UserType } from '@core/security/login-user';
import { RouteMethodIndex } from '../http/route-method.index';
import { ApiResponse } from '../response/api-response';
import { FakeHttpRequest } from '../testing/fake-http-request';
import { createTestWebConfig } from '../testing/test-web-config';
import { ApiErrorLogBuilder } from './api-error-log.builder';
import { BusinessException } from './business.exception';
import { ExceptionDispatcher, FaultCategory } from './exception-dispatcher';
import { ExecutionException } from './execution.exception';
import {
  BindingValidationException,
  BodyValidationException,
  MalformedBodyException,
  MissingParameterException,
  ParameterTypeMismatchException,
  RequestBodyReadException,
  RequestMethodNotSupportedException,
} from './request.exceptions';

/** express body-parser 抛出的错误形状 */
function bodyParserError(message: string, type: string, status: number): Error {
  return Object.assign(new Error(message), { type, status, statusCode: status, expose: true });
}

const flushPromises = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('ExceptionDispatcher', () => {
  let dispatcher: ExceptionDispatcher;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  const mockApiErrorLogApi = {
    createApiErrorLog: jest.fn(),
  };

  const mockRouteMethodIndex = {
    allowedMethods: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    mockApiErrorLogApi.createApiErrorLog.mockResolvedValue(ApiResponse.success(true));
    mockRouteMethodIndex.allowedMethods.mockReturnValue([]);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ExceptionDispatcher,
        ApiErrorLogBuilder,
        { provide: WebConfigService, useValue: createTestWebConfig() },
        { provide: ApiErrorLogApi, useValue: mockApiErrorLogApi },
        { provide: RouteMethodIndex, useValue: mockRouteMethodIndex },
      ],
    }).compile();

    dispatcher = module.get<ExceptionDispatcher>(ExceptionDispatcher);
  });

  afterEach(() => {
    warnSpy.mockRestore();
    errorSpy.mockRestore();
  });

  function dispatch(error: unknown, request?: FakeHttpRequest) {
    return dispatcher.dispatch(error, request).toJSON();
  }

  describe('request errors', () => {
    it('should report a missing parameter', () => {
      expect(dispatch(new MissingParameterException('id'))).toEqual({ code: 'A0001', msg: '请求参数缺失:id' });
    });

    it('should report a parameter type mismatch', () => {
      expect(dispatch(new ParameterTypeMismatchException('age', 'abc', 'integer'))).toEqual({
        code: 'A0001',
        msg: '请求参数类型错误:age=abc',
      });
    });

    it('should report the first validation message', () => {
      const error = new BodyValidationException([
        { field: 'name', message: 'name should not be empty' },
        { field: 'age', message: 'age must be an integer number' },
      ]);

      expect(dispatch(error)).toEqual({ code: 'A0001', msg: '请求参数不正确:name should not be empty' });
    });

    it('should fall back to the global validation message', () => {
      expect(dispatch(new BindingValidationException([], [{ message: '开始时间必须早于结束时间' }]))).toEqual({
        code: 'A0001',
        msg: '请求参数不正确:开始时间必须早于结束时间',
      });
    });

    it('should use plain BAD_REQUEST for validation without messages', () => {
      expect(dispatch(new BindingValidationException([]))).toEqual({ code: 'A0001', msg: '用户端错误' });
    });

    it('should distinguish malformed body reasons', () => {
      expect(dispatch(MalformedBodyException.invalidFormat('age', 'x'))).toEqual({
        code: 'A0001',
        msg: '请求参数类型错误:age=x',
      });
      expect(dispatch(MalformedBodyException.missing())).toEqual({
        code: 'A0001',
        msg: '请求参数类型错误: request body 缺失',
      });
      expect(dispatch(MalformedBodyException.unparseable(new SyntaxError('Unexpected end of JSON input')))).toEqual({
        code: 'A0001',
        msg: '请求参数格式错误: request body 不是合法的 JSON',
      });
    });

    it('should ask the caller to retry a failed body read', () => {
      expect(dispatch(new RequestBodyReadException(new Error('aborted')))).toEqual({
        code: 'A0001',
        msg: '请求体读取失败，请重试',
      });
    });

    it('should report an oversized upload', () => {
      expect(dispatch(new PayloadTooLargeException())).toEqual({ code: 'A0001', msg: '上传文件过大，请调整后重试' });
    });

    it('should treat body parser errors as caller faults', () => {
      expect(dispatch(bodyParserError('request entity too large', 'entity.too.large', 413))).toEqual({
        code: 'A0001',
        msg: '上传文件过大，请调整后重试',
      });
      expect(dispatch(bodyParserError('Unexpected token', 'entity.parse.failed', 400))).toEqual({
        code: 'A0001',
        msg: '请求参数格式错误: Unexpected token',
      });
      expect(dispatch(bodyParserError('unsupported charset "LATIN-9"', 'charset.unsupported', 415))).toEqual({
        code: 'A0001',
        msg: '请求类型不正确:unsupported charset "LATIN-9"',
      });
      expect(dispatch(bodyParserError('request aborted', 'request.aborted', 400))).toEqual({
        code: 'A0001',
        msg: 'request aborted',
      });
      expect(errorSpy).not.toHaveBeenCalled();
      expect(mockApiErrorLogApi.createApiErrorLog).not.toHaveBeenCalled();
    });

    it('should report an unsupported content type', () => {
      const request = new FakeHttpRequest({ method: 'POST', headers: { 'content-type': 'text/plain' } });

      expect(dispatch(new UnsupportedMediaTypeException(), request)).toEqual({
        code: 'A0001',
        msg: '请求类型不正确:text/plain',
      });
    });
  });

  describe('routing errors', () => {
    it('should report an unknown path', () => {
      const request = new FakeHttpRequest({ method: 'GET', path: '/admin-api/nothing' });

      expect(dispatch(new NotFoundException('Cannot GET /admin-api/nothing'), request)).toEqual({
        code: 'A0404',
        msg: '请求地址不存在:/admin-api/nothing',
      });
      expect(mockRouteMethodIndex.allowedMethods).toHaveBeenCalledWith('/admin-api/nothing');
    });

    it('should report a known path with the wrong method', () => {
      mockRouteMethodIndex.allowedMethods.mockReturnValue(['GET', 'POST']);
      const request = new FakeHttpRequest({ method: 'DELETE', path: '/admin-api/users' });

      expect(dispatch(new NotFoundException('Cannot DELETE /admin-api/users'), request)).toEqual({
        code: 'A0405',
        msg: '请求方法不正确:DELETE，支持的方法:GET, POST',
      });
    });

    it('should keep the message of a not-found raised by a handler', () => {
      const request = new FakeHttpRequest({ method: 'GET', path: '/app-api/users/9' });

      expect(dispatch(new NotFoundException('用户不存在'), request)).toEqual({ code: 'A0404', msg: '用户不存在' });
      expect(dispatch(new NotFoundException(), request)).toEqual({ code: 'A0404', msg: '请求未找到' });
      expect(dispatcher.classify(new NotFoundException('用户不存在'))).toBe(FaultCategory.HTTP_FRAMEWORK);
      expect(mockRouteMethodIndex.allowedMethods).not.toHaveBeenCalled();
    });

    it('should report method errors raised by handlers', () => {
      expect(dispatch(new RequestMethodNotSupportedException('PUT', ['GET']))).toEqual({
        code: 'A0405',
        msg: '请求方法不正确:PUT，支持的方法:GET',
      });
      expect(dispatch(new MethodNotAllowedException(), new FakeHttpRequest({ method: 'PATCH' }))).toEqual({
        code: 'A0405',
        msg: '请求方法不正确:PATCH',
      });
    });
  });

  describe('business errors', () => {
    it('should return the code and message unchanged', () => {
      expect(dispatch(new BusinessException('A1001', '用户不存在'))).toEqual({ code: 'A1001', msg: '用户不存在' });
      expect(warnSpy).toHaveBeenCalledWith(expect.stringMatching(/^\[businessExceptionHandler\] A1001 用户不存在/));
    });

    it('should not log ignored messages', () => {
      expect(dispatch(new BusinessException('A0200', '无效的刷新令牌'))).toEqual({
        code: 'A0200',
        msg: '无效的刷新令牌',
      });
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it('should unwrap one level of cause', () => {
      const error = new Error('wrapper', { cause: new BusinessException('A1002', '库存不足') });

      expect(dispatch(error)).toEqual({ code: 'A1002', msg: '库存不足' });
    });

    it('should not unwrap deeper causes', () => {
      const error = new Error('outer', {
        cause: new Error('inner', { cause: new BusinessException('A1002', '库存不足') }),
      });

      expect(dispatch(error)).toEqual({ code: 'B0001', msg: '系统执行出错' });
    });
  });

  describe('framework errors', () => {
    it('should deny access', () => {
      const request = new FakeHttpRequest({ method: 'DELETE', path: '/admin-api/users' });
      request.context.loginUser = { id: 1, userType: UserType.ADMIN, scopes: [] };

      expect(dispatch(new ForbiddenException(), request)).toEqual({ code: 'A0300', msg: '没有该操作权限' });
      expect(warnSpy).toHaveBeenCalledWith('[accessDeniedHandler][userId(1) 无法访问 url(/admin-api/users)]');
    });

    it('should map client HTTP statuses to error codes', () => {
      expect(dispatch(new UnauthorizedException())).toEqual({ code: 'A0200', msg: '用户未登录' });
      expect(dispatch(new HttpException('Too Many Requests', 429))).toEqual({
        code: 'A0429',
        msg: '请求过于频繁，请稍后重试',
      });
      expect(dispatch(new HttpException('Gone', 410))).toEqual({ code: 'A0001', msg: 'Gone' });
      expect(dispatch(new UnauthorizedException('令牌已过期'))).toEqual({ code: 'A0200', msg: '令牌已过期' });
    });
  });

  describe('execution wrappers', () => {
    function wrap(error: unknown, times: number): unknown {
      let current = error;
      for (let i = 0; i < times; i++) {
        current = new ExecutionException(current);
      }
      return current;
    }

    it('should re-dispatch the cause', () => {
      expect(dispatch(wrap(new MissingParameterException('id'), 1))).toEqual({
        code: 'A0001',
        msg: '请求参数缺失:id',
      });
      expect(dispatch(wrap(new BusinessException('A1001', '用户不存在'), 8))).toEqual({
        code: 'A1001',
        msg: '用户不存在',
      });
    });

    it('should stop re-dispatching after the depth limit', () => {
      expect(dispatch(wrap(new BusinessException('A1001', '用户不存在'), 9))).toEqual({
        code: 'B0001',
        msg: '系统执行出错',
      });
    });
  });

  describe('schema errors', () => {
    it.each([
      ["Table 'app.report_go_view_project' doesn't exist", '[报表模块 - 表结构未导入]'],
      ['relation "bpm_process_definition" does not exist', '[工作流模块 - 表结构未导入]'],
    ])('should point at the missing module for %s', (message, expected) => {
      expect(dispatch(new Error(message))).toEqual({ code: 'B0501', msg: expected });
    });

    it('should treat unknown missing tables as internal errors', () => {
      expect(dispatch(new Error("Table 'app.system_users' doesn't exist"))).toEqual({
        code: 'B0001',
        msg: '系统执行出错',
      });
    });
  });

  describe('internal errors', () => {
    it('should hide the detail and record an error log', async () => {
      const request = new FakeHttpRequest({
        method: 'POST',
        path: '/admin-api/users',
        headers: { 'user-agent': 'jest' },
      });
      request.context.traceId = 'trace-1';

      expect(dispatch(new Error('boom'), request)).toEqual({ code: 'B0001', msg: '系统执行出错' });
      await flushPromises();

      expect(errorSpy).toHaveBeenCalledWith('[defaultExceptionHandler] POST /admin-api/users', expect.any(String));
      expect(mockApiErrorLogApi.createApiErrorLog).toHaveBeenCalledTimes(1);
      expect(mockApiErrorLogApi.createApiErrorLog).toHaveBeenCalledWith(
        expect.objectContaining({
          userType: UserType.ADMIN,
          traceId: 'trace-1',
          applicationName: 'web-app',
          requestMethod: 'POST',
          requestUrl: '/admin-api/users',
          requestParams: '{"query":{}}',
          userIp: '127.0.0.1',
          userAgent: 'jest',
          exceptionName: 'Error',
          exceptionMessage: 'boom',
          exceptionRootCauseMessage: 'Error: boom',
        }),
      );
    });

    it('should handle thrown values that are not errors', () => {
      expect(dispatch('oops')).toEqual({ code: 'B0001', msg: '系统执行出错' });
    });

    it('should not fail when recording the error log fails', async () => {
      mockApiErrorLogApi.createApiErrorLog.mockRejectedValue(new Error('infra down'));

      expect(dispatch(new Error('boom'))).toEqual({ code: 'B0001', msg: '系统执行出错' });
      await flushPromises();

      expect(errorSpy).toHaveBeenCalledWith('[createApiErrorLog] 调用异常: infra down', expect.any(String));
    });

    it('should fall back when a handler itself fails', () => {
      mockRouteMethodIndex.allowedMethods.mockImplementation(() => {
        throw new Error('index broken');
      });

      expect(dispatch(new NotFoundException('Cannot GET /x'), new FakeHttpRequest({ path: '/x' }))).toEqual({
        code: 'B0001',
        msg: '系统执行出错',
      });
      expect(errorSpy).toHaveBeenCalledWith(
        '[dispatch] 异常处理失败，返回兜底响应: NotFoundException: Cannot GET /x / Error: index broken',
      );
    });
  });

  describe('classify', () => {
    it('should name the first matching rule', () => {
      expect(dispatcher.classify(new BusinessException('A1001', 'x'))).toBe(FaultCategory.BUSINESS);
      expect(dispatcher.classify(new ExecutionException(new Error('x')))).toBe(FaultCategory.EXECUTION_WRAPPER);
      expect(dispatcher.classify(new PayloadTooLargeException())).toBe(FaultCategory.UPLOAD_TOO_LARGE);
      expect(dispatcher.classify(42)).toBe(FaultCategory.INTERNAL);
    });
  });
});
