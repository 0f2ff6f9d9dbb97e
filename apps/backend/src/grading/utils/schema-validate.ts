import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import {
  GradingOutcome,
  ParagraphResult,
  QuizResult,
  ResultSchemaName,
  WorksheetResult,
} from '../grading.types';
import { readGradingJson } from './asset-path';

// Undeclared properties are stripped, the way the result DTOs ignore extras.
const ajv = new Ajv({ allErrors: true, allowUnionTypes: true, removeAdditional: 'all', verbose: true });

const compileSchema = <T>(file: string): ValidateFunction<T> =>
  ajv.compile<T>(readGradingJson(`schemas/${file}`) as object);

const validators = {
  paragraph: compileSchema<ParagraphResult>('paragraphResult.schema.json'),
  quiz: compileSchema<QuizResult>('quizResult.schema.json'),
  worksheet: compileSchema<WorksheetResult>('worksheetResult.schema.json'),
};

export type SchemaViolation = {
  field: string;
  expected: string;
  message: string;
};

export type SchemaValidationResult =
  | { valid: true; outcome: GradingOutcome }
  | { valid: false; violations: SchemaViolation[] };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const describeShape = (schema: unknown): string => {
  if (!isRecord(schema)) {
    return 'value';
  }
  if (schema.type === 'array') {
    return `array of ${describeShape(schema.items)}`;
  }
  if (Array.isArray(schema.type)) {
    return schema.type.map(String).join(' | ');
  }
  return typeof schema.type === 'string' ? schema.type : 'value';
};

export const toFieldPath = (instancePath: string, child?: string): string => {
  const segments = instancePath
    .split('/')
    .filter(Boolean)
    .map((segment) => segment.replace(/~1/g, '/').replace(/~0/g, '~'));
  if (child) {
    segments.push(child);
  }

  const path = segments.reduce((acc, segment) => {
    if (/^\d+$/.test(segment)) {
      return `${acc}[${segment}]`;
    }
    return acc ? `${acc}.${segment}` : segment;
  }, '');
  return path || '(root)';
};

const describeError = (error: ErrorObject): SchemaViolation => {
  if (error.keyword === 'required' && typeof error.params.missingProperty === 'string') {
    const missing = error.params.missingProperty;
    const properties = error.parentSchema?.properties;
    const expected = describeShape(isRecord(properties) ? properties[missing] : undefined);
    return {
      field: toFieldPath(error.instancePath, missing),
      expected,
      message: `is required (${expected})`,
    };
  }

  if (error.keyword === 'type') {
    const expected = describeShape(error.parentSchema);
    return {
      field: toFieldPath(error.instancePath),
      expected,
      message: `must be ${expected}`,
    };
  }

  return {
    field: toFieldPath(error.instancePath),
    expected: error.keyword,
    message: error.message || 'is invalid',
  };
};

const collectViolations = (errors?: ErrorObject[] | null): SchemaViolation[] =>
  errors?.length
    ? errors.map(describeError)
    : [{ field: '(root)', expected: 'object', message: 'Invalid schema' }];

export const validateGradingResult = (
  schema: ResultSchemaName,
  data: unknown,
): SchemaValidationResult => {
  switch (schema) {
    case 'paragraph': {
      const validate = validators.paragraph;
      return validate(data)
        ? { valid: true, outcome: { schema, result: data } }
        : { valid: false, violations: collectViolations(validate.errors) };
    }
    case 'quiz': {
      const validate = validators.quiz;
      return validate(data)
        ? { valid: true, outcome: { schema, result: data } }
        : { valid: false, violations: collectViolations(validate.errors) };
    }
    case 'worksheet': {
      const validate = validators.worksheet;
      return validate(data)
        ? { valid: true, outcome: { schema, result: data } }
        : { valid: false, violations: collectViolations(validate.errors) };
    }
  }
};
