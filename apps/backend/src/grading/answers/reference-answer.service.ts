import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { StorageService } from '../../storage/storage.service';
import { AnswerKeyQuery, SubmissionCategory } from '../submission-categories';
import { readGradingJson } from '../utils/asset-path';

type AnswerKeyTable = Map<string, Map<string, string>>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const loadAnswerKeyTable = (): AnswerKeyTable => {
  const raw = readGradingJson('answer-keys.json');
  if (!isRecord(raw)) {
    throw new Error('answer-keys.json must be an object');
  }

  const table: AnswerKeyTable = new Map();
  for (const [category, entries] of Object.entries(raw)) {
    if (!isRecord(entries)) {
      throw new Error(`answer-keys.json: ${category} must map keys to filenames`);
    }
    const files = new Map<string, string>();
    for (const [key, filename] of Object.entries(entries)) {
      if (typeof filename !== 'string') {
        throw new Error(`answer-keys.json: ${category}.${key} must be a filename`);
      }
      files.set(key, filename);
    }
    table.set(category, files);
  }
  return table;
};

const isEmptyAnswer = (value: unknown) =>
  !value ||
  (Array.isArray(value) && value.length === 0) ||
  (isRecord(value) && Object.keys(value).length === 0);

/**
 * Looks up the published standard answers for a worksheet or workbook lesson.
 * Every miss is logged and reported as null; grading continues without them.
 */
@Injectable()
export class ReferenceAnswerService {
  private readonly logger = new Logger(ReferenceAnswerService.name);
  private readonly answerKeys = loadAnswerKeyTable();
  private readonly pathPrefix: string;
  private readonly bucket: string;

  constructor(
    private readonly storageService: StorageService,
    configService: ConfigService,
  ) {
    this.pathPrefix = configService.get<string>('ANSWER_KEY_PATH_PREFIX') ?? 'ai_english_file/';
    this.bucket = configService.get<string>('GCS_PROMPT_BUCKET_NAME') || '';
  }

  async resolve(
    category: SubmissionCategory,
    gradeLevel: string,
    query: AnswerKeyQuery,
  ): Promise<string | null> {
    const fileKey = `${gradeLevel}${query.categoryKey}`;
    const filename = this.answerKeys.get(category)?.get(fileKey);
    if (!filename) {
      this.logger.warn(`No answer key file mapped for '${fileKey}'`);
      return null;
    }

    const path = `${this.pathPrefix}${filename}`;
    let content: string | null;
    try {
      content = await this.storageService.readText(path, this.bucket);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(`Failed to read answer key ${path}: ${message}`);
      return null;
    }

    if (!content) {
      this.logger.warn(`Answer key ${path} is missing or empty`);
      return null;
    }

    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(`Answer key ${path} is not valid JSON: ${message}`);
      return null;
    }

    if (!isRecord(document)) {
      this.logger.warn(`Answer key ${path} is not a JSON object`);
      return null;
    }

    const answers = Object.prototype.hasOwnProperty.call(document, query.lookupKey)
      ? document[query.lookupKey]
      : undefined;
    if (isEmptyAnswer(answers)) {
      this.logger.warn(`Answer key ${path} has no answers for '${query.lookupKey}'`);
      return null;
    }

    this.logger.log(`Loaded standard answers for '${query.lookupKey}' from ${filename}`);
    return JSON.stringify(answers, null, 2);
  }
}
