export const PLACEHOLDER_KEYS = [
  'Book',
  'learnsheet',
  'grade_level',
  'submission_type',
  'essay_content',
  'standard_answer_if_any',
  'scoring_instructions_if_any',
  'json_format_example_str',
  'current_lesson_standard_answers_json',
] as const;

export type PlaceholderKey = (typeof PLACEHOLDER_KEYS)[number];

export type PromptSubstitutions = Record<PlaceholderKey, string>;

const TOKEN = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Single-pass placeholder substitution.
 *
 * `{name}` with a known name becomes its value verbatim; inserted values are
 * never scanned again, so braces inside student text stay as typed. Unknown
 * placeholders are left in place and `{{` / `}}` collapse to `{` / `}`.
 */
export const fillTemplate = (template: string, values: Readonly<Record<string, string>>): string =>
  template.replace(TOKEN, (token: string, name: string | undefined) => {
    if (token === '{{') {
      return '{';
    }
    if (token === '}}') {
      return '}';
    }
    if (name !== undefined && Object.prototype.hasOwnProperty.call(values, name)) {
      return values[name];
    }
    return token;
  });
