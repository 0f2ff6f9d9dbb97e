import { BadRequestError } from '../common/errors';
import { GradingRequest, ResultSchemaName, UploadField } from './grading.types';

export enum SubmissionCategory {
  PARAGRAPH_ESSAY = '段落寫作評閱',
  QUIZ_ESSAY = '測驗寫作評改',
  WORKSHEET = '學習單批改',
  READING_WRITING_WORKBOOK = '讀寫習作評分',
}

export const READING_WRITING_ANSWER_KEY = '讀寫習作參考答案';

export type AnswerKeyQuery = {
  categoryKey: string;
  lookupKey: string;
};

export type AnswerKeyFields = Pick<GradingRequest, 'bookrange' | 'learnsheets' | 'worksheetCategory'>;

export interface CategoryProfile {
  category: SubmissionCategory;
  /** Multipart field that holds the student's photographed work. */
  uploadField: UploadField;
  templateFile: string;
  schema: ResultSchemaName;
  formatExample: string;
  /** Whether `standardAnswerText` / `standardAnswerImage` feed the prompt. */
  acceptsReferenceAnswer: boolean;
  selectAnswerKey?: (fields: AnswerKeyFields) => AnswerKeyQuery | null;
}

const present = (value?: string): value is string => Boolean(value?.trim());

const CATEGORY_PROFILES: Record<SubmissionCategory, CategoryProfile> = {
  [SubmissionCategory.PARAGRAPH_ESSAY]: {
    category: SubmissionCategory.PARAGRAPH_ESSAY,
    uploadField: 'essayImage',
    templateFile: `${SubmissionCategory.PARAGRAPH_ESSAY}.txt`,
    schema: 'paragraph',
    formatExample: 'examples/paragraph.example.json',
    acceptsReferenceAnswer: false,
  },
  [SubmissionCategory.QUIZ_ESSAY]: {
    category: SubmissionCategory.QUIZ_ESSAY,
    uploadField: 'essayImage',
    templateFile: `${SubmissionCategory.QUIZ_ESSAY}.txt`,
    schema: 'quiz',
    formatExample: 'examples/quiz.example.json',
    acceptsReferenceAnswer: true,
  },
  [SubmissionCategory.WORKSHEET]: {
    category: SubmissionCategory.WORKSHEET,
    uploadField: 'learningSheetFile',
    templateFile: `${SubmissionCategory.WORKSHEET}.txt`,
    schema: 'worksheet',
    formatExample: 'examples/worksheet.example.json',
    acceptsReferenceAnswer: false,
    selectAnswerKey: ({ learnsheets, worksheetCategory }) =>
      present(learnsheets) && present(worksheetCategory)
        ? { categoryKey: worksheetCategory.trim(), lookupKey: learnsheets.trim() }
        : null,
  },
  [SubmissionCategory.READING_WRITING_WORKBOOK]: {
    category: SubmissionCategory.READING_WRITING_WORKBOOK,
    uploadField: 'readingWritingFile',
    templateFile: `${SubmissionCategory.READING_WRITING_WORKBOOK}.txt`,
    schema: 'worksheet',
    formatExample: 'examples/reading-writing.example.json',
    acceptsReferenceAnswer: false,
    selectAnswerKey: ({ bookrange }) =>
      present(bookrange)
        ? { categoryKey: READING_WRITING_ANSWER_KEY, lookupKey: bookrange.trim() }
        : null,
  },
};

export const SUBMISSION_CATEGORIES = Object.values(SubmissionCategory);

export const isSubmissionCategory = (value: string): value is SubmissionCategory =>
  SUBMISSION_CATEGORIES.some((category) => category === value);

export const getCategoryProfile = (submissionType: string): CategoryProfile => {
  if (!isSubmissionCategory(submissionType)) {
    throw new BadRequestError(`Unsupported submission type: ${submissionType}`, 'UNSUPPORTED_CATEGORY');
  }
  return CATEGORY_PROFILES[submissionType];
};
