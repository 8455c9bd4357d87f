/**
 * AIClient - Model-backed docstring writer and reviewer.
 *
 * Talks to Groq (groq-sdk) or a local Ollama server. Uses XML output
 * so answers can be pulled out of chatty responses, and validates
 * everything it parses before handing it on.
 */

import Groq from 'groq-sdk';
import { AIValidationError, ConfigError, errorMessage } from '../core/errors';
import {
  EvaluationRequest,
  EvaluationResult,
  GenerationRequest,
  TextEvaluator,
  TextGenerator,
} from './capabilities';
import {
  EVALUATION_SYSTEM_PROMPT,
  GENERATION_SYSTEM_PROMPT,
  buildEvaluationPrompt,
  buildGenerationPrompt,
} from './prompts';

export type AIProvider = 'groq' | 'ollama';

/** Raw completion as returned by a provider */
export interface Completion {
  content: string;
  tokensUsed: number;
}

/** Sends one system/user prompt pair; swapped out in tests */
export type CompletionTransport = (
  systemPrompt: string,
  userPrompt: string,
  signal?: AbortSignal
) => Promise<Completion>;

export interface AIClientConfig {
  provider?: AIProvider;
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  maxTokens?: number;
  temperature?: number;
  /** Request timeout in milliseconds (default: 60000) */
  timeoutMs?: number;
  /** Maximum retries on timeout or rate limiting (default: 2) */
  maxRetries?: number;
  /** First backoff delay; doubles per attempt (default: 1000) */
  retryDelayMs?: number;
  transport?: CompletionTransport;
}

export interface AIResponse<T> {
  data: T;
  tokensUsed: number;
  model: string;
  latencyMs: number;
}

export interface AIStats {
  totalTokensUsed: number;
  callCount: number;
  averageTokensPerCall: number;
}

export const DEFAULT_MODELS: Record<AIProvider, string> = {
  groq: 'llama-3.3-70b-versatile',
  ollama: 'llama3.1:8b',
};

interface ResolvedConfig {
  provider: AIProvider;
  apiKey: string;
  model: string;
  baseUrl: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

const DEFAULT_CONFIG: Omit<ResolvedConfig, 'apiKey' | 'model'> = {
  provider: 'groq',
  baseUrl: 'http://localhost:11434',
  maxTokens: 1024,
  temperature: 0.2,
  timeoutMs: 60000, // 60 seconds
  maxRetries: 2,
  retryDelayMs: 1000,
};

export class AIClient implements TextGenerator, TextEvaluator {
  private config: ResolvedConfig;
  private transport: CompletionTransport;
  private totalTokensUsed: number = 0;
  private callCount: number = 0;

  constructor(config: AIClientConfig = {}) {
    const provider = config.provider ?? DEFAULT_CONFIG.provider;
    this.config = {
      provider,
      apiKey: config.apiKey ?? process.env['GROQ_API_KEY'] ?? '',
      model: config.model ?? DEFAULT_MODELS[provider],
      baseUrl: config.baseUrl ?? DEFAULT_CONFIG.baseUrl,
      maxTokens: config.maxTokens ?? DEFAULT_CONFIG.maxTokens,
      temperature: config.temperature ?? DEFAULT_CONFIG.temperature,
      timeoutMs: config.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
      maxRetries: config.maxRetries ?? DEFAULT_CONFIG.maxRetries,
      retryDelayMs: config.retryDelayMs ?? DEFAULT_CONFIG.retryDelayMs,
    };

    if (config.transport) {
      this.transport = config.transport;
    } else if (provider === 'groq') {
      if (!this.config.apiKey) {
        throw new ConfigError('GROQ_API_KEY is required for the groq provider', 'apiKey', 'environment');
      }
      this.transport = this.groqTransport(new Groq({ apiKey: this.config.apiKey }));
    } else {
      this.transport = this.ollamaTransport();
    }
  }

  get model(): string {
    return this.config.model;
  }

  /**
   * Send a prompt and parse the XML response, with timeout and retry.
   */
  async query<T>(
    systemPrompt: string,
    userPrompt: string,
    parseResponse: (xml: string) => T,
    signal?: AbortSignal
  ): Promise<AIResponse<T>> {
    const startTime = Date.now();
    let completion: Completion | undefined;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      signal?.throwIfAborted();
      try {
        completion = await this.withTimeout(
          this.transport(systemPrompt, userPrompt, signal),
          this.config.timeoutMs
        );
        break;
      } catch (error) {
        const message = errorMessage(error).toLowerCase();
        const isRetryable =
          !signal?.aborted &&
          (message.includes('timeout') || message.includes('rate limit') || message.includes('429'));

        if (!isRetryable || attempt === this.config.maxRetries) {
          throw error;
        }

        // Exponential backoff: 1s, 2s, 4s
        const backoffMs = Math.pow(2, attempt) * this.config.retryDelayMs;
        console.warn(`AI request attempt ${attempt + 1} failed (${errorMessage(error)}), retrying in ${backoffMs}ms...`);
        await this.delay(backoffMs);
      }
    }

    const content = completion?.content ?? '';
    const tokensUsed = completion?.tokensUsed ?? 0;
    this.totalTokensUsed += tokensUsed;
    this.callCount++;

    let data: T;
    try {
      data = parseResponse(content);
    } catch (parseError) {
      throw new AIValidationError(`Failed to parse AI response: ${errorMessage(parseError)}`, content);
    }

    return {
      data,
      tokensUsed,
      model: this.config.model,
      latencyMs: Date.now() - startTime,
    };
  }

  /**
   * Write a docstring body for the element facts.
   */
  async complete(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    const response = await this.query(
      GENERATION_SYSTEM_PROMPT,
      buildGenerationPrompt(request),
      parseDocstringXML,
      signal
    );
    return response.data;
  }

  /**
   * Review a candidate docstring against the code.
   */
  async evaluate(request: EvaluationRequest, signal?: AbortSignal): Promise<EvaluationResult> {
    const response = await this.query(
      EVALUATION_SYSTEM_PROMPT,
      buildEvaluationPrompt(request),
      parseReviewXML,
      signal
    );
    return validateReview(response.data);
  }

  getStats(): AIStats {
    return {
      totalTokensUsed: this.totalTokensUsed,
      callCount: this.callCount,
      averageTokensPerCall: this.callCount > 0 ? this.totalTokensUsed / this.callCount : 0,
    };
  }

  resetStats(): void {
    this.totalTokensUsed = 0;
    this.callCount = 0;
  }

  private groqTransport(client: Groq): CompletionTransport {
    return async (systemPrompt, userPrompt, signal) => {
      const response = await client.chat.completions.create(
        {
          model: this.config.model,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt },
          ],
          max_tokens: this.config.maxTokens,
          temperature: this.config.temperature,
        },
        { signal, maxRetries: 0 }
      );
      return {
        content: response.choices[0]?.message?.content || '',
        tokensUsed: response.usage?.total_tokens || 0,
      };
    };
  }

  private ollamaTransport(): CompletionTransport {
    return async (systemPrompt, userPrompt, signal) => {
      const response = await fetch(`${this.config.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.config.model,
          system: systemPrompt,
          prompt: userPrompt,
          stream: false,
          options: {
            temperature: this.config.temperature,
            num_predict: this.config.maxTokens,
          },
        }),
        signal,
      });

      if (!response.ok) {
        throw new Error(`Ollama API error: ${response.status}`);
      }

      const data: unknown = await response.json();
      if (!isOllamaResponse(data)) {
        throw new AIValidationError('Ollama response has no text', JSON.stringify(data));
      }
      return {
        content: data.response,
        tokensUsed: (data.prompt_eval_count ?? 0) + (data.eval_count ?? 0),
      };
    };
  }

  /**
   * Wrap a promise with timeout protection.
   */
  private async withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
    let timeoutId: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        reject(new Error(`AI request timeout after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      return await Promise.race([promise, timeoutPromise]);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

interface OllamaResponse {
  response: string;
  prompt_eval_count?: number;
  eval_count?: number;
}

function isOllamaResponse(value: unknown): value is OllamaResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'response' in value &&
    typeof value.response === 'string'
  );
}

// ============================================================================
// XML Parsers
// ============================================================================

function extractXMLTag(xml: string, tag: string): string | undefined {
  const regex = new RegExp(`<${tag}>([\\s\\S]*?)<\\/${tag}>`);
  const match = xml.match(regex);
  return match?.[1]?.trim();
}

function extractXMLList(xml: string, tag: string): string[] {
  const items: string[] = [];
  for (const match of xml.matchAll(new RegExp(`<${tag}>([\\s\\S]*?)<\\/${tag}>`, 'g'))) {
    const item = match[1]?.trim();
    if (item) items.push(item);
  }
  return items;
}

/**
 * Docstring body from a `<docstring>` envelope. Surrounding quotes the
 * model may have added are removed.
 */
export function parseDocstringXML(xml: string): string {
  const body = extractXMLTag(xml, 'docstring');
  if (body === undefined) {
    throw new Error('missing <docstring> element');
  }
  const unquoted = body.replace(/^[rRuU]?"""/, '').replace(/"""$/, '').trim();
  if (unquoted === '') {
    throw new Error('empty <docstring> element');
  }
  return unquoted;
}

export function parseReviewXML(xml: string): EvaluationResult {
  const review = extractXMLTag(xml, 'review');
  if (review === undefined) {
    throw new Error('missing <review> element');
  }
  const scoreText = extractXMLTag(review, 'score');
  if (scoreText === undefined) {
    throw new Error('missing <score> element');
  }
  return {
    score: parseFloat(scoreText),
    issues: extractXMLList(review, 'issue'),
    suggestions: extractXMLList(review, 'suggestion'),
  };
}

// ============================================================================
// Runtime Validators
// ============================================================================

/**
 * Clamp a confidence-like value into [0, 1]; NaN becomes 0.
 */
export function validateConfidence(value: number): number {
  if (isNaN(value) || value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

export function validateReview(result: EvaluationResult): EvaluationResult {
  return {
    score: validateConfidence(result.score),
    issues: result.issues.filter((i) => i.trim() !== ''),
    suggestions: result.suggestions.filter((s) => s.trim() !== ''),
  };
}
