import { HttpException, HttpStatus } from '@nestjs/common';

export interface ErrorField {
  field: string;
  message: string;
}

/**
 * Base application error class.
 * All custom errors should extend this class.
 */
export class BaseAppError extends HttpException {
  constructor(
    message: string,
    public readonly statusCode: HttpStatus = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly errorCode?: string,
    public readonly fields?: ErrorField[],
  ) {
    super(message, statusCode);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      statusCode: this.statusCode,
      message: this.message,
      error: this.errorCode || this.name,
      timestamp: new Date().toISOString(),
      ...(this.fields?.length && { fields: this.fields }),
    };
  }
}
