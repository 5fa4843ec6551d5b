import {
  ArgumentMetadata,
  Injectable,
  PipeTransform,
  Type,
  UnsupportedMediaTypeException,
} from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import {
  BindingValidationException,
  BodyValidationException,
  MalformedBodyException,
} from '../exception/request.exceptions';
import { getCurrentRequest } from '../http/request-context';
import { isJsonRequest } from '../http/web-framework.utils';

const PRIMITIVE_TYPES: ReadonlyArray<unknown> = [String, Boolean, Number, Array, Object];

/**
 * 全局请求参数校验管道
 *
 * - @Body()：整体绑定到 DTO 时只接受 JSON 请求体；
 *   请求体缺失、字段类型不符、校验失败分别抛出不同异常
 * - @Query() 等：校验失败抛出 BindingValidationException
 */
@Injectable()
export class RequestValidationPipe implements PipeTransform<unknown> {
  async transform(value: unknown, metadata: ArgumentMetadata): Promise<unknown> {
    const { metatype, type, data } = metadata;
    const isWholeBody = type === 'body' && data === undefined;

    if (!metatype || PRIMITIVE_TYPES.includes(metatype)) {
      if (isWholeBody && value === undefined && metatype) {
        throw MalformedBodyException.missing();
      }
      return value;
    }

    if (isWholeBody) {
      assertJsonContentType();
      if (value === undefined || value === null) {
        throw MalformedBodyException.missing();
      }
      if (!isPlainObject(value)) {
        throw MalformedBodyException.invalidFormat('body', JSON.stringify(value));
      }
      const mismatch = findTypeMismatch(metatype, value);
      if (mismatch) {
        throw MalformedBodyException.invalidFormat(mismatch.field, mismatch.value);
      }
    }

    const plain = isPlainObject(value) ? value : {};
    const instance: object = plainToInstance(metatype, plain, {
      enableImplicitConversion: type !== 'body',
    });
    const errors = await validate(instance);
    if (errors.length > 0) {
      throw type === 'body'
        ? BodyValidationException.fromValidationErrors(errors)
        : BindingValidationException.fromValidationErrors(errors);
    }
    return instance;
  }
}

/**
 * 当前请求声明了非 JSON 的 Content-Type 时抛出 UnsupportedMediaTypeException
 */
function assertJsonContentType(): void {
  const request = getCurrentRequest();
  if (request?.contentType !== undefined && !isJsonRequest(request)) {
    throw new UnsupportedMediaTypeException(`Content-Type '${request.contentType}' is not supported`);
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 按 design:type 元数据检查请求体字段是否可以转换为声明的类型
 */
function findTypeMismatch(
  metatype: Type<unknown>,
  body: Record<string, unknown>,
): { field: string; value: unknown } | undefined {
  for (const [field, value] of Object.entries(body)) {
    if (value === null || value === undefined) {
      continue;
    }
    const declared: unknown = Reflect.getMetadata('design:type', metatype.prototype, field);
    if (declared === Number && !isNumeric(value)) {
      return { field, value };
    }
    if (declared === Boolean && !isBooleanLike(value)) {
      return { field, value };
    }
    if (declared === Date && !isDateLike(value)) {
      return { field, value };
    }
  }
  return undefined;
}

function isNumeric(value: unknown): boolean {
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  return typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value));
}

function isBooleanLike(value: unknown): boolean {
  return typeof value === 'boolean' || value === 'true' || value === 'false';
}

function isDateLike(value: unknown): boolean {
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  return typeof value === 'string' && !Number.isNaN(Date.parse(value));
}
