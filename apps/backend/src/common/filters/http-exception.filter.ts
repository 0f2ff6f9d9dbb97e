import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { BaseAppError, ErrorField } from '../errors';

interface ErrorResponse {
  statusCode: number;
  message: string;
  error: string;
  timestamp: string;
  path: string;
  fields?: ErrorField[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Global exception filter that converts all exceptions to a consistent JSON response format.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';
    let error = 'INTERNAL_SERVER_ERROR';
    let fields: ErrorField[] | undefined;

    if (exception instanceof BaseAppError) {
      status = exception.statusCode;
      message = exception.message;
      error = exception.errorCode || exception.name;
      fields = exception.fields?.length ? exception.fields : undefined;
    } else if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();
      if (typeof exceptionResponse === 'string') {
        message = exceptionResponse;
      } else if (isRecord(exceptionResponse)) {
        if (Array.isArray(exceptionResponse.message)) {
          message = exceptionResponse.message.map(String).join(', ');
        } else if (typeof exceptionResponse.message === 'string') {
          message = exceptionResponse.message;
        }
        if (exceptionResponse.error) {
          error = String(exceptionResponse.error);
        }
      }
    }
    // Anything else keeps the generic message; the real one is only logged.

    if (status >= 500) {
      const internalMessage = exception instanceof Error ? exception.message : 'Unknown';
      this.logger.error(
        `${request.method} ${request.url} - ${status} - ${internalMessage}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(`${request.method} ${request.url} - ${status} - ${message}`);
    }

    const errorResponse: ErrorResponse = {
      statusCode: status,
      message,
      error,
      timestamp: new Date().toISOString(),
      path: request.url,
      ...(fields && { fields }),
    };

    response.status(status).json(errorResponse);
  }
}
