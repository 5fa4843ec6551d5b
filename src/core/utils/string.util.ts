/**
 * 字符串工具函数
 */

/**
 * 对令牌进行脱敏处理，用于日志输出
 * 显示前4位和后4位，中间用...替代
 *
 * @example
 * maskToken('a1b2c3d4e5f6g7h8') // => 'a1b2...g7h8'
 * maskToken('short')            // => '***'
 * maskToken(undefined)          // => undefined
 */
export function maskToken(token: string | undefined): string | undefined {
  if (!token) {
    return undefined;
  }
  if (token.length <= 8) {
    return '***';
  }
  return `${token.substring(0, 4)}...${token.substring(token.length - 4)}`;
}

/**
 * 去掉 `Bearer ` 前缀（大小写不敏感），不是 Bearer 令牌时返回 undefined
 *
 * @example
 * extractBearerToken('Bearer abc') // => 'abc'
 * extractBearerToken('Basic abc')  // => undefined
 */
export function extractBearerToken(authorization: string | undefined): string | undefined {
  if (!authorization) {
    return undefined;
  }
  const match = /^bearer\s+(.+)$/i.exec(authorization.trim());
  return match ? match[1].trim() : undefined;
}
