import { Inject, Injectable, Logger } from '@nestjs/common';
import { ReferenceAnswerService } from './answers/reference-answer.service';
import { ContentAcquirerService } from './content/content-acquirer.service';
import { GradingError } from './grading.errors';
import { GradingOutcome, GradingRequest } from './grading.types';
import { buildPromptParts } from './prompts/prompt-parts';
import { TemplateResolverService } from './prompts/template-resolver.service';
import { GRADING_MODEL_PROVIDER, GradingModelProvider } from './providers/provider.interface';
import { CategoryProfile, getCategoryProfile } from './submission-categories';
import { normalizeGradingResponse } from './utils/response-normalizer';

@Injectable()
export class GradingService {
  private readonly logger = new Logger(GradingService.name);

  constructor(
    private readonly contentAcquirer: ContentAcquirerService,
    private readonly referenceAnswers: ReferenceAnswerService,
    private readonly templateResolver: TemplateResolverService,
    @Inject(GRADING_MODEL_PROVIDER) private readonly provider: GradingModelProvider,
  ) {}

  async grade(request: GradingRequest): Promise<GradingOutcome> {
    const profile = getCategoryProfile(request.submissionType);
    this.logger.log(`Grading ${profile.category} submission for ${request.gradeLevel}`);

    const content = await this.contentAcquirer.acquire(profile, request.text, request.uploads);
    this.logger.log(
      `[1/6] Submission text ready: ${content.text.length} chars, ${content.images.length} image(s) attached`,
    );

    const referenceAnswer = profile.acceptsReferenceAnswer
      ? await this.contentAcquirer.acquireReferenceAnswer(
          request.standardAnswerText,
          request.uploads.standardAnswerImage,
        )
      : '';
    this.logger.log(
      `[2/6] Reference answer: ${referenceAnswer ? `${referenceAnswer.length} chars` : 'none'}`,
    );

    const standardAnswersJson = await this.resolveStandardAnswers(profile, request);
    this.logger.log(
      `[3/6] Standard answers: ${standardAnswersJson ? `${standardAnswersJson.length} chars` : 'none'}`,
    );

    const substitutions = this.templateResolver.buildSubstitutions({
      profile,
      gradeLevel: request.gradeLevel,
      essayContent: content.text,
      bookrange: request.bookrange,
      learnsheets: request.learnsheets,
      referenceAnswer,
      scoringInstructions: request.scoringInstructions,
      standardAnswersJson,
    });
    const promptText = await this.templateResolver.resolve(profile, substitutions);
    const parts = buildPromptParts(promptText, content);
    this.logger.log(`[4/6] Prompt assembled: ${promptText.length} chars, ${parts.length} part(s)`);

    const { providerName, model } = this.provider.getProviderInfo();
    this.logger.log(`[5/6] Calling ${providerName} model ${model}`);
    const outcome = await this.provider.generate(parts);

    try {
      const result = normalizeGradingResponse(profile.schema, outcome);
      this.logger.log(`[6/6] Response validated against the ${result.schema} schema`);
      return result;
    } catch (error) {
      if (error instanceof GradingError) {
        this.logFailure(error);
      }
      throw error;
    }
  }

  private async resolveStandardAnswers(profile: CategoryProfile, request: GradingRequest) {
    const query = profile.selectAnswerKey?.(request);
    if (!query) {
      return '';
    }
    const answers = await this.referenceAnswers.resolve(profile.category, request.gradeLevel, query);
    return answers ?? '';
  }

  private logFailure(error: GradingError) {
    const { responseText, candidateJson, field, expected } = error.diagnostics;
    this.logger.error(`Grading failed [${error.code}]: ${error.message}`);
    if (field) {
      this.logger.error(`Failing field: ${field} (expected ${expected ?? 'unknown'})`);
    }
    if (responseText !== undefined) {
      this.logger.error(`Raw model response:\n${responseText}`);
    }
    if (candidateJson !== undefined && candidateJson !== responseText) {
      this.logger.error(`JSON candidate:\n${candidateJson}`);
    }
  }
}
