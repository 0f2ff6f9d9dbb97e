import { HttpStatus } from '@nestjs/common';
import { BaseAppError } from './base-app-error';

export type BadRequestErrorCode = 'BAD_REQUEST' | 'UNSUPPORTED_CATEGORY' | 'NO_CONTENT_PROVIDED';

export class BadRequestError extends BaseAppError {
  constructor(message: string, errorCode: BadRequestErrorCode = 'BAD_REQUEST') {
    super(message, HttpStatus.BAD_REQUEST, errorCode);
  }
}
