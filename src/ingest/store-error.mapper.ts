import {
  BadGatewayException,
  HttpException,
  InternalServerErrorException,
  NotFoundException,
  NotImplementedException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { StoreError, describeError } from '../storage/storage.errors';

/**
 * Translates store failures into HTTP errors for the messaging client.
 * "Cannot answer" (501) stays distinguishable from "no data".
 */
export function toHttpException(err: unknown): HttpException {
  if (err instanceof HttpException) return err;
  if (!(err instanceof StoreError)) {
    return new InternalServerErrorException('Unexpected storage failure');
  }

  const body = { code: err.code, message: describeError(err) };
  switch (err.code) {
    case 'UNSUPPORTED':
      return new NotImplementedException(body);
    case 'MEDIA_UNAVAILABLE':
      return new NotFoundException(body);
    case 'LOCK_BUSY':
      return new ServiceUnavailableException(body);
    case 'API':
    case 'TRANSPORT':
    case 'PARSE':
    case 'DOMAIN':
      return new BadGatewayException(body);
    default:
      return new InternalServerErrorException(body);
  }
}
