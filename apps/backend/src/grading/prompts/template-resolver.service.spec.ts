import { ConfigService } from '@nestjs/config';
import { StorageService } from '../../storage/storage.service';
import { GradingError } from '../grading.errors';
import { getCategoryProfile, SubmissionCategory } from '../submission-categories';
import { readGradingJson } from '../utils/asset-path';
import { TemplateResolverService } from './template-resolver.service';

describe('TemplateResolverService', () => {
  let templateResolver: TemplateResolverService;
  let storageService: jest.Mocked<StorageService>;

  const paragraph = getCategoryProfile(SubmissionCategory.PARAGRAPH_ESSAY);

  beforeEach(() => {
    storageService = {
      readText: jest.fn(),
    } as unknown as jest.Mocked<StorageService>;

    templateResolver = new TemplateResolverService(
      storageService,
      new ConfigService({
        GCS_PROMPT_BUCKET_NAME: 'prompt-bucket',
        PROMPT_PATH_PREFIX: 'prompts/',
      }),
    );
  });

  const substitutions = () =>
    templateResolver.buildSubstitutions({
      profile: paragraph,
      gradeLevel: '七年級',
      essayContent: 'The student wrote this essay.',
      referenceAnswer: '',
      standardAnswersJson: '',
    });

  describe('buildSubstitutions', () => {
    it('should fill every placeholder key', () => {
      expect(substitutions()).toEqual({
        Book: '',
        learnsheet: '',
        grade_level: '七年級',
        submission_type: '段落寫作評閱',
        essay_content: 'The student wrote this essay.',
        standard_answer_if_any: '',
        scoring_instructions_if_any: '',
        json_format_example_str: JSON.stringify(
          readGradingJson('examples/paragraph.example.json'),
          null,
          2,
        ),
        current_lesson_standard_answers_json: '',
      });
    });
  });

  describe('resolve', () => {
    it('should read the category template and fill it', async () => {
      storageService.readText.mockResolvedValue(
        '類型：{submission_type}\n年級：{grade_level}\n作文：{essay_content}',
      );

      const prompt = await templateResolver.resolve(paragraph, substitutions());

      expect(prompt).toBe('類型：段落寫作評閱\n年級：七年級\n作文：The student wrote this essay.');
      expect(storageService.readText).toHaveBeenCalledWith('prompts/段落寫作評閱.txt', 'prompt-bucket');
    });

    it('should fail when the template is missing', async () => {
      storageService.readText.mockResolvedValue(null);

      const error = await templateResolver.resolve(paragraph, substitutions()).catch((e) => e);

      expect(error).toBeInstanceOf(GradingError);
      expect(error.code).toBe('TEMPLATE_UNAVAILABLE');
      expect(error.getStatus()).toBe(500);
    });

    it('should fail when the template is blank', async () => {
      storageService.readText.mockResolvedValue('  \n');

      await expect(templateResolver.resolve(paragraph, substitutions())).rejects.toMatchObject({
        code: 'TEMPLATE_UNAVAILABLE',
      });
    });

    it('should fail when storage errors', async () => {
      storageService.readText.mockRejectedValue(new Error('AccessDenied'));

      await expect(templateResolver.resolve(paragraph, substitutions())).rejects.toMatchObject({
        code: 'TEMPLATE_UNAVAILABLE',
        message: 'Failed to load the prompt template from storage.',
      });
    });
  });
});
