import { ModelOutcome, PromptPart } from '../grading.types';

export const GRADING_MODEL_PROVIDER = Symbol('GRADING_MODEL_PROVIDER');

export type ProviderInfo = {
  providerName: string;
  model: string;
};

export interface GradingModelProvider {
  generate(parts: PromptPart[]): Promise<ModelOutcome>;
  getProviderInfo(): ProviderInfo;
}
