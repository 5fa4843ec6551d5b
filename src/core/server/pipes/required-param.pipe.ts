import { ArgumentMetadata, Injectable, PipeTransform } from '@nestjs/common';
import { MissingParameterException } from '../exception/request.exceptions';

/**
 * 必填参数管道
 *
 * @example
 * list(@Query('status', RequiredParamPipe) status: string)
 */
@Injectable()
export class RequiredParamPipe implements PipeTransform<unknown> {
  transform(value: unknown, metadata: ArgumentMetadata): unknown {
    if (value === undefined || value === null || value === '') {
      throw new MissingParameterException(metadata.data ?? metadata.type);
    }
    return value;
  }
}
