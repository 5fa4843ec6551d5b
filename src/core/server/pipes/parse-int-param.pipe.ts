import { ArgumentMetadata, Injectable, Optional, PipeTransform } from '@nestjs/common';
import { MissingParameterException, ParameterTypeMismatchException } from '../exception/request.exceptions';

export interface ParseIntParamOptions {
  /** 为 true 时参数缺失返回 undefined */
  optional?: boolean;
}

/**
 * 整数参数管道
 *
 * @example
 * get(@Query('id', ParseIntParamPipe) id: number)
 */
@Injectable()
export class ParseIntParamPipe implements PipeTransform<unknown, number | undefined> {
  constructor(@Optional() private readonly options: ParseIntParamOptions = {}) {}

  transform(value: unknown, metadata: ArgumentMetadata): number | undefined {
    const name = metadata.data ?? metadata.type;
    if (value === undefined || value === null || value === '') {
      if (this.options.optional) {
        return undefined;
      }
      throw new MissingParameterException(name);
    }
    const text = String(value).trim();
    if (!/^[-+]?\d+$/.test(text)) {
      throw new ParameterTypeMismatchException(name, value, 'integer');
    }
    const parsed = Number(text);
    if (!Number.isSafeInteger(parsed)) {
      throw new ParameterTypeMismatchException(name, value, 'integer');
    }
    return parsed;
  }
}
