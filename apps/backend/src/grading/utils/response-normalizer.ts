import { GradingError } from '../grading.errors';
import { GradingOutcome, ModelOutcome, ResultSchemaName } from '../grading.types';
import { validateGradingResult } from './schema-validate';

export const UNKNOWN_BLOCK_REASON = 'unknown';

const FENCED_JSON = /```json\s*(\{[\s\S]*?\})\s*```/;

/**
 * Returns the body of the first ```json fence holding a brace-delimited
 * object, or the whole trimmed response when there is none.
 */
export const extractJsonCandidate = (responseText: string): string => {
  const match = FENCED_JSON.exec(responseText);
  return match ? match[1] : responseText.trim();
};

/**
 * Maps one model response onto the schema of its submission category.
 *
 * Pure: every failure is thrown as a {@link GradingError} whose diagnostics
 * carry the raw response and the JSON candidate for the caller to log.
 */
export const normalizeGradingResponse = (
  schema: ResultSchemaName,
  outcome: ModelOutcome,
): GradingOutcome => {
  if (outcome.status === 'blocked') {
    const reason = outcome.reason?.trim() || UNKNOWN_BLOCK_REASON;
    throw new GradingError(
      'MODEL_BLOCKED',
      `The model returned no response; it may have been blocked by safety settings. Reason: ${reason}`,
    );
  }

  const responseText = outcome.status === 'text' ? outcome.text : '';
  if (!responseText) {
    throw new GradingError('EMPTY_RESPONSE', 'The model returned an empty response.', {
      responseText,
    });
  }

  const candidateJson = extractJsonCandidate(responseText);
  const trimmed = candidateJson.trim();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) {
    throw new GradingError(
      'INVALID_JSON_SHAPE',
      'The model returned empty or non-JSON content. Please check the submission and try again.',
      { responseText, candidateJson },
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (error) {
    const parserMessage = error instanceof Error ? error.message : String(error);
    throw new GradingError('MALFORMED_JSON', `The model returned malformed JSON: ${parserMessage}`, {
      responseText,
      candidateJson,
    });
  }

  const validation = validateGradingResult(schema, parsed);
  if (!validation.valid) {
    const [first] = validation.violations;
    throw new GradingError(
      'SCHEMA_VIOLATION',
      `The model output does not match the ${schema} result schema: ${first.field} ${first.message}`,
      { responseText, candidateJson, field: first.field, expected: first.expected },
      validation.violations.map(({ field, message }) => ({ field, message })),
    );
  }

  return validation.outcome;
};
