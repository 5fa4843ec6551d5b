import { ExecutionException } from './execution.exception';
import { firstFrameOutside, getRootCauseMessage, parseStack } from './stack-trace.util';

const STACK = [
  'Error: boom',
  '    at UserService.create (/srv/src/user.service.ts:10:5)',
  '    at async Promise.all (index 0)',
  '    at /srv/src/main.ts:3:1',
].join('\n');

describe('parseStack', () => {
  it('should parse frames with and without function names', () => {
    const frames = parseStack(STACK);

    expect(frames).toHaveLength(3);
    expect(frames[0]).toEqual({
      className: 'UserService',
      methodName: 'create',
      fileName: '/srv/src/user.service.ts',
      lineNumber: 10,
      raw: 'at UserService.create (/srv/src/user.service.ts:10:5)',
    });
    expect(frames[1]).toEqual({ raw: 'at async Promise.all (index 0)' });
    expect(frames[2]).toEqual({ fileName: '/srv/src/main.ts', lineNumber: 3, raw: 'at /srv/src/main.ts:3:1' });
  });

  it('should return no frames for a missing stack', () => {
    expect(parseStack(undefined)).toEqual([]);
  });
});

describe('firstFrameOutside', () => {
  it('should skip frames from excluded files', () => {
    const error = new Error('boom');
    error.stack = STACK;

    expect(firstFrameOutside(error, ['user.service'])?.raw).toBe('at async Promise.all (index 0)');
    expect(firstFrameOutside(error, [])?.methodName).toBe('create');
  });
});

describe('getRootCauseMessage', () => {
  it('should follow the cause chain', () => {
    const error = new ExecutionException(new ExecutionException(new TypeError('bad input')));

    expect(getRootCauseMessage(error)).toBe('TypeError: bad input');
  });

  it('should stop on cyclic causes', () => {
    const first = new Error('first');
    const second = new Error('second', { cause: first });
    first.cause = second;

    expect(getRootCauseMessage(second)).toBe('Error: first');
  });

  it('should stringify non-error values', () => {
    expect(getRootCauseMessage('plain')).toBe('plain');
  });
});
