import { Logger } from '@nestjs/common';
import { BusinessException } from './business.exception';
import { exception, formatMessage, invalidParamException } from './business-exception.util';
import { GlobalErrorCodes } from './error-code';

describe('formatMessage', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it('should fill placeholders in order', () => {
    expect(formatMessage('A1001', '用户({})不属于租户({})', ['tom', 1])).toBe('用户(tom)不属于租户(1)');
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('should return the pattern unchanged without params', () => {
    expect(formatMessage('A1001', '请求参数缺失:{}', [])).toBe('请求参数缺失:{}');
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('should return an empty string for an empty pattern', () => {
    expect(formatMessage('A1001', '', ['x'])).toBe('');
    expect(formatMessage('A1001', null, ['x'])).toBe('');
  });

  it('should drop surplus params and warn', () => {
    expect(formatMessage('A1001', 'a{}b', [1, 2])).toBe('a1b');
    expect(warnSpy).toHaveBeenCalledWith('[formatMessage][参数过多：错误码(A1001)|错误内容(a{}b)|参数(1)]');
  });

  it('should keep remaining placeholders and warn when params are short', () => {
    expect(formatMessage('A1001', '{}-{}', ['x'])).toBe('x-{}');
    expect(warnSpy).toHaveBeenCalledWith('[formatMessage][参数过少：错误码(A1001)|错误内容({}-{})|参数(1)]');
  });

  it('should stringify errors, objects and primitives', () => {
    expect(formatMessage('B1001', '{}|{}|{}|{}', [new Error('boom'), { id: 1 }, null, true])).toBe(
      'boom|{"id":1}|null|true',
    );
  });
});

describe('exception helpers', () => {
  it('should build a business exception from an error code', () => {
    const ex = exception({ code: 'A1002', msg: '手机号({})已存在' }, '13800000000');

    expect(ex).toBeInstanceOf(BusinessException);
    expect(ex.code).toBe('A1002');
    expect(ex.message).toBe('手机号(13800000000)已存在');
  });

  it('should use BAD_REQUEST for invalid params', () => {
    const ex = invalidParamException('租户编号格式不正确:{}', 'abc');

    expect(ex.code).toBe(GlobalErrorCodes.BAD_REQUEST.code);
    expect(ex.message).toBe('租户编号格式不正确:abc');
  });
});
