/**
 * Natural-language capabilities and the client that provides them.
 */

import { PipelineConfig } from '../types';
import { AIClient } from './AIClient';
import { TextEvaluator, TextGenerator } from './capabilities';

export {
  AIClient,
  AIClientConfig,
  AIProvider,
  AIResponse,
  AIStats,
  Completion,
  CompletionTransport,
  DEFAULT_MODELS,
  parseDocstringXML,
  parseReviewXML,
  validateConfidence,
  validateReview,
} from './AIClient';
export {
  ElementFacts,
  EvaluationRequest,
  EvaluationResult,
  GenerationRequest,
  TextEvaluator,
  TextGenerator,
  elementFacts,
} from './capabilities';
export { buildEvaluationPrompt, buildGenerationPrompt } from './prompts';

export interface Capabilities {
  generator?: TextGenerator;
  evaluator?: TextEvaluator;
  client?: AIClient;
}

/**
 * Pick the backend for a run. Provider `none` means rule-based
 * generation and objective-only review.
 */
export function createCapabilities(config: PipelineConfig): Capabilities {
  if (config.provider === 'none') {
    return {};
  }
  const client = new AIClient({
    provider: config.provider,
    apiKey: config.apiKey,
    model: config.model,
    baseUrl: config.baseUrl,
    timeoutMs: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
  });
  return { generator: client, evaluator: client, client };
}
