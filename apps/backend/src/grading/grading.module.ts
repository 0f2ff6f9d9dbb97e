import { Module } from '@nestjs/common';
import { ReferenceAnswerService } from './answers/reference-answer.service';
import { ContentAcquirerService } from './content/content-acquirer.service';
import { GradingController } from './grading.controller';
import { GradingService } from './grading.service';
import { TemplateResolverService } from './prompts/template-resolver.service';
import { GeminiProvider, genAiClientProvider } from './providers/gemini.provider';
import { GRADING_MODEL_PROVIDER } from './providers/provider.interface';

@Module({
  controllers: [GradingController],
  providers: [
    GradingService,
    ContentAcquirerService,
    ReferenceAnswerService,
    TemplateResolverService,
    genAiClientProvider,
    GeminiProvider,
    { provide: GRADING_MODEL_PROVIDER, useExisting: GeminiProvider },
  ],
  exports: [GradingService],
})
export class GradingModule {}
