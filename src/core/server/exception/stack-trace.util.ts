/**
 * 堆栈帧
 */
export interface StackFrame {
  readonly className?: string;
  readonly methodName?: string;
  readonly fileName?: string;
  readonly lineNumber?: number;
  readonly raw: string;
}

const FRAME_WITH_FUNCTION = /^\s*at (?:async )?(.+?) \((.+?):(\d+):\d+\)$/;
const FRAME_WITHOUT_FUNCTION = /^\s*at (?:async )?(.+?):(\d+):\d+$/;

/**
 * 解析 V8 格式的 error.stack
 */
export function parseStack(stack: string | undefined): StackFrame[] {
  if (!stack) {
    return [];
  }
  return stack
    .split('\n')
    .filter((line) => line.trimStart().startsWith('at '))
    .map(parseFrame);
}

function parseFrame(line: string): StackFrame {
  const raw = line.trim();
  const withFunction = FRAME_WITH_FUNCTION.exec(line);
  if (withFunction) {
    const [, fn, fileName, lineNumber] = withFunction;
    const dot = fn.lastIndexOf('.');
    return {
      className: dot > 0 ? fn.substring(0, dot) : undefined,
      methodName: dot > 0 ? fn.substring(dot + 1) : fn,
      fileName,
      lineNumber: Number(lineNumber),
      raw,
    };
  }
  const withoutFunction = FRAME_WITHOUT_FUNCTION.exec(line);
  if (withoutFunction) {
    const [, fileName, lineNumber] = withoutFunction;
    return { fileName, lineNumber: Number(lineNumber), raw };
  }
  return { raw };
}

/**
 * 第一个不属于 excludedFiles 的堆栈帧
 */
export function firstFrameOutside(
  error: Error,
  excludedFiles: readonly string[],
): StackFrame | undefined {
  return parseStack(error.stack).find(
    (frame) => !excludedFiles.some((file) => frame.fileName?.includes(file)),
  );
}

/**
 * 沿 cause 链找到最底层异常的信息
 */
export function getRootCauseMessage(error: unknown): string {
  let current: unknown = error;
  const seen = new Set<unknown>();
  while (hasCause(current) && current.cause !== undefined && !seen.has(current.cause)) {
    seen.add(current);
    current = current.cause;
  }
  if (current instanceof Error) {
    return `${current.name}: ${current.message}`;
  }
  return String(current);
}

function hasCause(value: unknown): value is { cause: unknown } {
  return typeof value === 'object' && value !== null && 'cause' in value;
}
