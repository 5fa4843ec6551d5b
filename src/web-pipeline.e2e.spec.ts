import { Body, Controller, Delete, Get, NotFoundException, Param, Post } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { Test, TestingModule } from '@nestjs/testing';
import { IsInt, IsOptional, IsString } from 'class-validator';
import request from 'supertest';
import {
  ApiAccessLogApi,
  ApiErrorLogApi,
  ApiResponse,
  HttpClientModule,
  OAuth2TokenApi,
  ParseIntParamPipe,
  PermissionApi,
  PermitAll,
  RequirePermissions,
  RpcModule,
  UserType,
  useFormBodyParser,
  WebConfigModule,
  WebConfigService,
  WebModule,
} from '@core';
import { MonitoringModule } from '@core/monitoring';
import { createTestWebConfig } from '@core/server/testing';

class CreateUserDto {
  @IsString()
  name!: string;
}

class CreateProfileDto {
  @IsOptional()
  @IsString()
  nickname?: string;

  @IsOptional()
  @IsInt()
  age?: number;
}

const handled: string[] = [];

@Controller('admin-api/users')
class UserTestController {
  @Post()
  create(@Body() dto: CreateUserDto) {
    handled.push(`create:${dto.name}`);
    return { id: 1 };
  }

  @PermitAll()
  @Post('register')
  register(@Body() dto: CreateUserDto) {
    handled.push(`register:${dto.name}`);
    return { id: 2 };
  }

  @Get(':id')
  get(@Param('id', ParseIntParamPipe) id: number) {
    return { id, name: 'tom' };
  }

  @RequirePermissions('system:user:delete')
  @Delete(':id')
  remove(@Param('id', ParseIntParamPipe) id: number) {
    handled.push(`remove:${id}`);
    return true;
  }
}

@Controller('app-api/profiles')
class ProfileTestController {
  @Post()
  create(@Body() dto: CreateProfileDto) {
    return dto;
  }

  @Post('touch')
  touch(): void {
    handled.push('touch');
  }

  @Get('missing')
  missing(): never {
    throw new NotFoundException('资料不存在');
  }

  @Get('boom')
  boom(): never {
    throw new Error('boom');
  }
}

describe('Web pipeline (e2e)', () => {
  let app: NestExpressApplication;

  const mockOAuth2TokenApi = {
    checkAccessToken: jest.fn(),
  };
  const mockPermissionApi = {
    hasAnyPermissions: jest.fn(),
    hasAnyRoles: jest.fn(),
  };
  const mockApiAccessLogApi = {
    createApiAccessLog: jest.fn(),
  };
  const mockApiErrorLogApi = {
    createApiErrorLog: jest.fn(),
  };

  beforeAll(async () => {
    const moduleRef: TestingModule = await Test.createTestingModule({
      imports: [WebConfigModule, HttpClientModule, RpcModule, WebModule, MonitoringModule],
      controllers: [UserTestController, ProfileTestController],
    })
      .overrideProvider(WebConfigService)
      .useValue(createTestWebConfig({ WEB_DEMO_ENABLED: 'true', WEB_BODY_LIMIT: '65536' }))
      .overrideProvider(OAuth2TokenApi)
      .useValue(mockOAuth2TokenApi)
      .overrideProvider(PermissionApi)
      .useValue(mockPermissionApi)
      .overrideProvider(ApiAccessLogApi)
      .useValue(mockApiAccessLogApi)
      .overrideProvider(ApiErrorLogApi)
      .useValue(mockApiErrorLogApi)
      .compile();

    app = moduleRef.createNestApplication<NestExpressApplication>({ bodyParser: false, logger: false });
    useFormBodyParser(app, moduleRef.get(WebConfigService).web);
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    jest.clearAllMocks();
    handled.length = 0;
    mockOAuth2TokenApi.checkAccessToken.mockResolvedValue(
      ApiResponse.success({ userId: 1, userType: UserType.ADMIN, tenantId: 1, scopes: [] }),
    );
    mockApiAccessLogApi.createApiAccessLog.mockResolvedValue(ApiResponse.success(true));
    mockApiErrorLogApi.createApiErrorLog.mockResolvedValue(ApiResponse.success(true));
  });

  it('should wrap successful results', async () => {
    const res = await request(app.getHttpServer())
      .get('/admin-api/users/7')
      .set('Authorization', 'Bearer test-access-token')
      .set('trace-id', 'trace-e2e')
      .expect(200);

    expect(res.body).toEqual({ code: '00000', msg: '', data: { id: 7, name: 'tom' } });
    expect(res.headers['trace-id']).toBe('trace-e2e');
  });

  it('should deny writes from logged-in users in demo mode', async () => {
    const res = await request(app.getHttpServer())
      .post('/admin-api/users')
      .set('Authorization', 'Bearer test-access-token')
      .set('Content-Type', 'application/json')
      .send('{"name":"tom"}')
      .expect(200);

    expect(res.body).toEqual({ code: 'A0901', msg: '演示模式，禁止写操作' });
    expect(handled).toEqual([]);
    expect(mockApiAccessLogApi.createApiAccessLog).toHaveBeenCalledWith(
      expect.objectContaining({
        userId: 1,
        userType: UserType.ADMIN,
        requestMethod: 'POST',
        requestUrl: '/admin-api/users',
        requestParams: '{"query":{},"body":{"name":"tom"}}',
        resultCode: 'A0901',
        resultMsg: '演示模式，禁止写操作',
      }),
    );
  });

  it('should require login for admin writes', async () => {
    const res = await request(app.getHttpServer())
      .post('/admin-api/users')
      .set('Content-Type', 'application/json')
      .send('{"name":"tom"}')
      .expect(200);

    expect(res.body).toEqual({ code: 'A0200', msg: '用户未登录' });
    expect(handled).toEqual([]);
  });

  it('should let anonymous writes reach public admin handlers', async () => {
    const res = await request(app.getHttpServer())
      .post('/admin-api/users/register')
      .set('Content-Type', 'application/json')
      .send('{"name":"tom"}')
      .expect(200);

    expect(res.body).toEqual({ code: '00000', msg: '', data: { id: 2 } });
    expect(handled).toEqual(['register:tom']);
  });

  it('should omit data when a handler returns nothing', async () => {
    const res = await request(app.getHttpServer()).post('/app-api/profiles/touch').expect(200);

    expect(res.text).toBe('{"code":"00000","msg":""}');
    expect(handled).toEqual(['touch']);
  });

  it('should reject a body that is not JSON for a DTO', async () => {
    const res = await request(app.getHttpServer())
      .post('/app-api/profiles')
      .set('Content-Type', 'text/plain')
      .send('hello')
      .expect(200);

    expect(res.body).toEqual({ code: 'A0001', msg: '请求类型不正确:text/plain' });
  });

  it('should report an oversized form as a caller fault', async () => {
    const res = await request(app.getHttpServer())
      .post('/app-api/profiles')
      .type('form')
      .send(`nickname=${'x'.repeat(100_000)}`)
      .expect(200);

    expect(res.body).toEqual({ code: 'A0001', msg: '上传文件过大，请调整后重试' });
    expect(mockApiErrorLogApi.createApiErrorLog).not.toHaveBeenCalled();
  });

  it('should report a body field of the wrong type', async () => {
    const res = await request(app.getHttpServer())
      .post('/app-api/profiles')
      .set('Content-Type', 'application/json')
      .send('{"age":"not-a-number"}')
      .expect(200);

    expect(res.body).toEqual({ code: 'A0001', msg: '请求参数类型错误:age=not-a-number' });
  });

  it('should report a body that is not JSON', async () => {
    const res = await request(app.getHttpServer())
      .post('/app-api/profiles')
      .set('Content-Type', 'application/json')
      .send('{"age":')
      .expect(200);

    expect(res.body).toEqual({ code: 'A0001', msg: '请求参数格式错误: request body 不是合法的 JSON' });
  });

  it('should report a path parameter of the wrong type', async () => {
    const res = await request(app.getHttpServer())
      .get('/admin-api/users/abc')
      .set('Authorization', 'Bearer test-access-token')
      .expect(200);

    expect(res.body).toEqual({ code: 'A0001', msg: '请求参数类型错误:id=abc' });
  });

  it('should reject a malformed tenant header', async () => {
    const res = await request(app.getHttpServer()).get('/admin-api/users/7').set('tenant-id', 'abc').expect(200);

    expect(res.body).toEqual({ code: 'A0001', msg: '租户编号格式不正确:abc' });
  });

  it('should report unknown paths', async () => {
    const res = await request(app.getHttpServer()).get('/admin-api/nothing').expect(200);

    expect(res.body).toEqual({ code: 'A0404', msg: '请求地址不存在:/admin-api/nothing' });
  });

  it('should report unsupported methods on known paths', async () => {
    const res = await request(app.getHttpServer()).delete('/admin-api/users').expect(200);

    expect(res.body).toEqual({ code: 'A0405', msg: '请求方法不正确:DELETE，支持的方法:POST' });
  });

  it('should require login for protected handlers', async () => {
    const res = await request(app.getHttpServer()).delete('/admin-api/users/7').expect(200);

    expect(res.body).toEqual({ code: 'A0200', msg: '用户未登录' });
    expect(handled).toEqual([]);
  });

  it('should keep the message of a not-found raised by a handler', async () => {
    const res = await request(app.getHttpServer()).get('/app-api/profiles/missing').expect(200);

    expect(res.body).toEqual({ code: 'A0404', msg: '资料不存在' });
  });

  it('should hide internal errors and record them', async () => {
    const res = await request(app.getHttpServer()).get('/app-api/profiles/boom').expect(200);

    expect(res.body).toEqual({ code: 'B0001', msg: '系统执行出错' });
    expect(mockApiErrorLogApi.createApiErrorLog).toHaveBeenCalledWith(
      expect.objectContaining({ requestMethod: 'GET', requestUrl: '/app-api/profiles/boom', exceptionMessage: 'boom' }),
    );
  });

  it('should serve the health endpoint without the envelope', async () => {
    const res = await request(app.getHttpServer()).get('/actuator/health').expect(200);

    expect(res.body).toEqual({ status: 'UP', application: 'web-app', timestamp: expect.any(Number) });
  });
});
