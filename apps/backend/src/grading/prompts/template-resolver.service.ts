import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { StorageService } from '../../storage/storage.service';
import { GradingError } from '../grading.errors';
import { CategoryProfile } from '../submission-categories';
import { readGradingJson } from '../utils/asset-path';
import { fillTemplate, PromptSubstitutions } from './fill-template';

export type SubstitutionInput = {
  profile: CategoryProfile;
  gradeLevel: string;
  essayContent: string;
  bookrange?: string;
  learnsheets?: string;
  referenceAnswer: string;
  scoringInstructions?: string;
  standardAnswersJson: string;
};

@Injectable()
export class TemplateResolverService {
  private readonly logger = new Logger(TemplateResolverService.name);
  private readonly promptPrefix: string;
  private readonly bucket: string;
  private readonly formatExamples = new Map<string, string>();

  constructor(
    private readonly storageService: StorageService,
    configService: ConfigService,
  ) {
    this.promptPrefix = configService.get<string>('PROMPT_PATH_PREFIX') ?? 'ai_english_prompt/';
    this.bucket = configService.get<string>('GCS_PROMPT_BUCKET_NAME') || '';
  }

  buildSubstitutions(input: SubstitutionInput): PromptSubstitutions {
    return {
      Book: input.bookrange || '',
      learnsheet: input.learnsheets || '',
      grade_level: input.gradeLevel,
      submission_type: input.profile.category,
      essay_content: input.essayContent,
      standard_answer_if_any: input.referenceAnswer,
      scoring_instructions_if_any: input.scoringInstructions || '',
      json_format_example_str: this.getFormatExample(input.profile),
      current_lesson_standard_answers_json: input.standardAnswersJson,
    };
  }

  async resolve(profile: CategoryProfile, substitutions: PromptSubstitutions): Promise<string> {
    const key = `${this.promptPrefix}${profile.templateFile}`;

    let template: string | null;
    try {
      template = await this.storageService.readText(key, this.bucket);
    } catch (error) {
      this.logger.error(
        `Failed to read prompt template ${this.bucket}/${key}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new GradingError('TEMPLATE_UNAVAILABLE', 'Failed to load the prompt template from storage.');
    }

    if (!template?.trim()) {
      this.logger.error(`Prompt template ${this.bucket}/${key} is missing or empty`);
      throw new GradingError('TEMPLATE_UNAVAILABLE', 'Failed to load the prompt template from storage.');
    }

    return fillTemplate(template, substitutions);
  }

  private getFormatExample(profile: CategoryProfile) {
    const cached = this.formatExamples.get(profile.formatExample);
    if (cached !== undefined) {
      return cached;
    }
    const example = JSON.stringify(readGradingJson(profile.formatExample), null, 2);
    this.formatExamples.set(profile.formatExample, example);
    return example;
  }
}
