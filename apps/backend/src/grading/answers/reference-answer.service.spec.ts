import { ConfigService } from '@nestjs/config';
import { StorageService } from '../../storage/storage.service';
import { READING_WRITING_ANSWER_KEY, SubmissionCategory } from '../submission-categories';
import { ReferenceAnswerService } from './reference-answer.service';

describe('ReferenceAnswerService', () => {
  let referenceAnswers: ReferenceAnswerService;
  let storageService: jest.Mocked<StorageService>;

  const answerFile = JSON.stringify({
    'Lesson 1': { 'Pre-reading Questions': ['I usually get up at six.'] },
    'Lesson 2': [],
    'Lesson 3': {},
    'Lesson 4': '',
  });

  beforeEach(() => {
    storageService = {
      readText: jest.fn(),
    } as unknown as jest.Mocked<StorageService>;

    referenceAnswers = new ReferenceAnswerService(
      storageService,
      new ConfigService({ GCS_PROMPT_BUCKET_NAME: 'prompt-bucket' }),
    );
  });

  it('should return the lesson answers as indented JSON', async () => {
    storageService.readText.mockResolvedValue(answerFile);

    const answers = await referenceAnswers.resolve(SubmissionCategory.WORKSHEET, '七年級', {
      categoryKey: '全英提問學習單參考答案',
      lookupKey: 'Lesson 1',
    });

    expect(answers).toBe(
      JSON.stringify({ 'Pre-reading Questions': ['I usually get up at six.'] }, null, 2),
    );
    expect(storageService.readText).toHaveBeenCalledWith(
      'ai_english_file/全英提問學習單參考答案(01_1下).txt',
      'prompt-bucket',
    );
  });

  it('should resolve workbook answers by grade', async () => {
    storageService.readText.mockResolvedValue(JSON.stringify({ 'Book 5': { L1: ['tiring'] } }));

    const answers = await referenceAnswers.resolve(
      SubmissionCategory.READING_WRITING_WORKBOOK,
      '八年級',
      { categoryKey: READING_WRITING_ANSWER_KEY, lookupKey: 'Book 5' },
    );

    expect(answers).toBe(JSON.stringify({ L1: ['tiring'] }, null, 2));
    expect(storageService.readText).toHaveBeenCalledWith(
      'ai_english_file/113_2習作標準答案.txt',
      'prompt-bucket',
    );
  });

  it('should return null for an unmapped grade and category', async () => {
    const answers = await referenceAnswers.resolve(SubmissionCategory.WORKSHEET, '十年級', {
      categoryKey: '全英提問學習單參考答案',
      lookupKey: 'Lesson 1',
    });

    expect(answers).toBeNull();
    expect(storageService.readText).not.toHaveBeenCalled();
  });

  it('should not match keys of another category', async () => {
    const answers = await referenceAnswers.resolve(
      SubmissionCategory.READING_WRITING_WORKBOOK,
      '七年級',
      { categoryKey: '全英提問學習單參考答案', lookupKey: 'Lesson 1' },
    );

    expect(answers).toBeNull();
  });

  it('should return null when the file is missing', async () => {
    storageService.readText.mockResolvedValue(null);

    await expect(
      referenceAnswers.resolve(SubmissionCategory.WORKSHEET, '九年級', {
        categoryKey: '差異化學習單參考答案',
        lookupKey: 'Lesson 1',
      }),
    ).resolves.toBeNull();
  });

  it('should return null when storage fails', async () => {
    storageService.readText.mockRejectedValue(new Error('AccessDenied'));

    await expect(
      referenceAnswers.resolve(SubmissionCategory.WORKSHEET, '九年級', {
        categoryKey: '差異化學習單參考答案',
        lookupKey: 'Lesson 1',
      }),
    ).resolves.toBeNull();
  });

  it.each(['not json', '["Lesson 1"]'])('should return null for a non-object file: %s', async (content) => {
    storageService.readText.mockResolvedValue(content);

    await expect(
      referenceAnswers.resolve(SubmissionCategory.WORKSHEET, '七年級', {
        categoryKey: '差異化學習單參考答案',
        lookupKey: 'Lesson 1',
      }),
    ).resolves.toBeNull();
  });

  it.each(['Lesson 2', 'Lesson 3', 'Lesson 4', 'Lesson 9', 'constructor'])(
    'should return null when %s has no answers',
    async (lookupKey) => {
      storageService.readText.mockResolvedValue(answerFile);

      await expect(
        referenceAnswers.resolve(SubmissionCategory.WORKSHEET, '七年級', {
          categoryKey: '全英提問學習單參考答案',
          lookupKey,
        }),
      ).resolves.toBeNull();
    },
  );
});
