import {
  GenerateContentConfig,
  GenerateContentResponse,
  GoogleGenAI,
  HarmBlockThreshold,
  HarmCategory,
  Part,
} from '@google/genai';
import { FactoryProvider, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GradingError } from '../grading.errors';
import { ModelOutcome, PromptPart } from '../grading.types';
import { GradingModelProvider, ProviderInfo } from './provider.interface';

export const GENAI_CLIENT = Symbol('GENAI_CLIENT');

export const genAiClientProvider: FactoryProvider<GoogleGenAI> = {
  provide: GENAI_CLIENT,
  inject: [ConfigService],
  useFactory: (configService: ConfigService) =>
    new GoogleGenAI({
      vertexai: true,
      project: configService.get<string>('GCP_PROJECT_ID'),
      location: configService.get<string>('GCP_LOCATION') || 'us-central1',
    }),
};

const SAFETY_CATEGORIES = [
  HarmCategory.HARM_CATEGORY_HARASSMENT,
  HarmCategory.HARM_CATEGORY_HATE_SPEECH,
  HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
  HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
  HarmCategory.HARM_CATEGORY_CIVIC_INTEGRITY,
];

const toGenAiPart = (part: PromptPart): Part =>
  part.type === 'text'
    ? { text: part.text }
    : { inlineData: { mimeType: part.mimeType, data: part.data.toString('base64') } };

/**
 * No candidates means the prompt was blocked. Thought parts are not part of
 * the answer and are left out of the text.
 */
export const readModelOutcome = (
  response: Pick<GenerateContentResponse, 'candidates' | 'promptFeedback'>,
): ModelOutcome => {
  const [candidate] = response.candidates || [];
  if (!candidate) {
    return { status: 'blocked', reason: response.promptFeedback?.blockReason };
  }

  const text = (candidate.content?.parts || [])
    .map((part) => (part.thought ? '' : part.text || ''))
    .join('');
  if (!text) {
    return { status: 'no-text', finishReason: candidate.finishReason };
  }

  return { status: 'text', text };
};

@Injectable()
export class GeminiProvider implements GradingModelProvider {
  private readonly logger = new Logger(GeminiProvider.name);
  private readonly model: string;
  private readonly config: GenerateContentConfig;

  constructor(
    @Inject(GENAI_CLIENT) private readonly client: GoogleGenAI,
    configService: ConfigService,
  ) {
    this.model = configService.get<string>('GEMINI_MODEL_NAME') || '';
    const projectId = configService.get<string>('GCP_PROJECT_ID') || '';
    const datastoreId = configService.get<string>('DATASTORE_ID') || '';
    const timeout = Number(configService.get<string>('GEMINI_TIMEOUT_MS') || '120000');

    this.config = {
      temperature: 0.1,
      topP: 0.5,
      maxOutputTokens: 8192,
      responseMimeType: 'application/json',
      safetySettings: SAFETY_CATEGORIES.map((category) => ({
        category,
        threshold: HarmBlockThreshold.BLOCK_NONE,
      })),
      tools: [
        {
          retrieval: {
            vertexAiSearch: {
              datastore: `projects/${projectId}/locations/global/collections/default_collection/dataStores/${datastoreId}`,
            },
          },
        },
      ],
      httpOptions: { timeout },
    };
  }

  getProviderInfo(): ProviderInfo {
    return { providerName: 'vertex-ai', model: this.model };
  }

  async generate(parts: PromptPart[]): Promise<ModelOutcome> {
    const startedAt = Date.now();

    let response: GenerateContentResponse;
    try {
      response = await this.client.models.generateContent({
        model: this.model,
        contents: [{ role: 'user', parts: parts.map(toGenAiPart) }],
        config: this.config,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(
        `Model call failed after ${Date.now() - startedAt}ms: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new GradingError('MODEL_CALL_FAILED', `Model call failed: ${message}`);
    }

    this.logger.log(`Model ${this.model} responded in ${Date.now() - startedAt}ms`);
    return readModelOutcome(response);
  }
}
