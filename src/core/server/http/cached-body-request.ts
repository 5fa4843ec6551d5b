import { PayloadTooLargeException } from '@nestjs/common';
import { Readable } from 'node:stream';
import type { Request } from 'express';
import { RequestBodyReadException } from '../exception/request.exceptions';
import type { HttpRequest } from './http-request';
import type { RequestContext } from './request-context';

export interface CachedBodyOptions {
  /** 请求体最大字节数，超过时抛出 PayloadTooLargeException */
  limit?: number;
}

/**
 * 请求体可重复读取的请求
 *
 * 创建时一次性读完原始请求体并缓存在内存中，之后每次 openReader()
 * 都返回一个从第 0 个字节开始的新流，互不共享读取位置。
 * 除请求体外的所有属性都委托给被包装的请求
 */
export class CachedBodyRequest implements HttpRequest {
  readonly bodyCached = true;

  private constructor(
    private readonly delegate: HttpRequest,
    private readonly body: Buffer,
  ) {}

  /**
   * 读完 request 的请求体并返回包装后的请求
   *
   * @throws RequestBodyReadException 读取失败（连接中断等）
   * @throws PayloadTooLargeException 超过 limit
   */
  static async wrap(request: HttpRequest, options: CachedBodyOptions = {}): Promise<CachedBodyRequest> {
    const body = await readFully(request.openReader(), options.limit);
    return new CachedBodyRequest(request, body);
  }

  get method(): string {
    return this.delegate.method;
  }

  get path(): string {
    return this.delegate.path;
  }

  get url(): string {
    return this.delegate.url;
  }

  get query(): Readonly<Record<string, unknown>> {
    return this.delegate.query;
  }

  get contentType(): string | undefined {
    return this.delegate.contentType;
  }

  get context(): RequestContext {
    return this.delegate.context;
  }

  get raw(): Request {
    return this.delegate.raw;
  }

  header(name: string): string | undefined {
    return this.delegate.header(name);
  }

  openReader(): Readable {
    return Readable.from(copyOf(this.body), { objectMode: false });
  }

  /**
   * 缓存的字节数，与 content-length 请求头无关
   */
  length(): number {
    return this.body.length;
  }

  /**
   * 以 UTF-8 解码的请求体
   */
  text(): string {
    return this.body.toString('utf8');
  }
}

function* copyOf(body: Buffer): Generator<Buffer> {
  if (body.length > 0) {
    yield Buffer.from(body);
  }
}

async function readFully(stream: Readable, limit?: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let total = 0;
  try {
    for await (const chunk of stream) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      total += buffer.length;
      if (limit !== undefined && total > limit) {
        throw new PayloadTooLargeException(`Request body exceeds ${limit} bytes`);
      }
      chunks.push(buffer);
    }
  } catch (error) {
    if (error instanceof PayloadTooLargeException) {
      throw error;
    }
    throw new RequestBodyReadException(error);
  }
  return Buffer.concat(chunks, total);
}

/**
 * 读取请求体文本；请求体未缓存时返回 undefined，避免消费只能读一次的原始流
 */
export function readCachedBody(request: HttpRequest): string | undefined {
  return request instanceof CachedBodyRequest ? request.text() : undefined;
}
