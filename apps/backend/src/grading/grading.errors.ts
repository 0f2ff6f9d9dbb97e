import { HttpStatus } from '@nestjs/common';
import { BaseAppError, ErrorField } from '../common/errors';

export type GradingErrorCode =
  | 'TEMPLATE_UNAVAILABLE'
  | 'MODEL_CALL_FAILED'
  | 'MODEL_BLOCKED'
  | 'EMPTY_RESPONSE'
  | 'INVALID_JSON_SHAPE'
  | 'MALFORMED_JSON'
  | 'SCHEMA_VIOLATION';

/**
 * Text that explains a failure to an operator. It is logged, never rendered.
 */
export type GradingDiagnostics = {
  responseText?: string;
  candidateJson?: string;
  field?: string;
  expected?: string;
};

export class GradingError extends BaseAppError {
  constructor(
    public readonly code: GradingErrorCode,
    message: string,
    public readonly diagnostics: GradingDiagnostics = {},
    fields?: ErrorField[],
  ) {
    super(message, HttpStatus.INTERNAL_SERVER_ERROR, code, fields);
  }
}
