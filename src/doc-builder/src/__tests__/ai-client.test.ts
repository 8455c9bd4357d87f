/**
 * Tests for AIClient, its XML parsers and backend selection.
 * No request leaves the process: every client gets a stub transport.
 */

import { ElementExtractor } from '../core/ElementExtractor';
import { augmentElements } from '../analysis';
import { AIValidationError, ConfigError } from '../core/errors';
import {
  AIClient,
  Completion,
  CompletionTransport,
  GenerationRequest,
  buildEvaluationPrompt,
  buildGenerationPrompt,
  createCapabilities,
  elementFacts,
  parseDocstringXML,
  parseReviewXML,
  validateConfidence,
  validateReview,
} from '../ai';
import { DEFAULT_PIPELINE_CONFIG } from '../config/ConfigResolver';
import { getTemplate } from '../generation/StyleTemplates';
import { CodeElement } from '../types';

function elementOf(source: string): CodeElement {
  const [element] = augmentElements(new ElementExtractor().extract(source));
  if (!element) {
    throw new Error('no element extracted');
  }
  return element;
}

const ADD = elementOf('def add(a, b):\n    return a + b\n');

function generationRequest(): GenerationRequest {
  return { facts: elementFacts(ADD), style: 'google', template: getTemplate('google') };
}

/** Transport that replays a list of outcomes */
function scriptedTransport(outcomes: Array<Completion | Error>): CompletionTransport & { calls: number } {
  let calls = 0;
  const transport = async (): Promise<Completion> => {
    const outcome = outcomes[Math.min(calls, outcomes.length - 1)];
    calls++;
    transport.calls = calls;
    if (!outcome) throw new Error('no scripted outcome');
    if (outcome instanceof Error) throw outcome;
    return outcome;
  };
  transport.calls = 0;
  return transport;
}

describe('XML parsers', () => {
  it('pulls the docstring body out of a chatty answer', () => {
    expect(parseDocstringXML('Sure!\n<docstring>\n"""Add a and b."""\n</docstring>\nDone.')).toBe('Add a and b.');
  });

  it('rejects answers without a docstring', () => {
    expect(() => parseDocstringXML('Add a and b.')).toThrow('missing <docstring> element');
    expect(() => parseDocstringXML('<docstring>  </docstring>')).toThrow('empty <docstring> element');
  });

  it('reads reviews', () => {
    const xml =
      '<review><score>0.7</score><issues><issue>Vague</issue><issue> </issue></issues>' +
      '<suggestions><suggestion>Be specific</suggestion></suggestions></review>';

    expect(parseReviewXML(xml)).toEqual({ score: 0.7, issues: ['Vague'], suggestions: ['Be specific'] });
    expect(() => parseReviewXML('<review></review>')).toThrow('missing <score> element');
  });

  it('clamps review scores', () => {
    expect(validateConfidence(Number.NaN)).toBe(0);
    expect(validateConfidence(-0.2)).toBe(0);
    expect(validateConfidence(1.4)).toBe(1);
    expect(validateReview({ score: 2, issues: ['a', ' '], suggestions: [''] })).toEqual({
      score: 1,
      issues: ['a'],
      suggestions: [],
    });
  });
});

describe('prompts', () => {
  it('describes the element facts', () => {
    const prompt = buildGenerationPrompt(generationRequest());

    expect(prompt).toContain('Element: function add\nParameters:\n- a (float)\n- b (float)\nReturns: float\n');
    expect(prompt).toContain('Raises: nothing\nCyclomatic complexity: 1');
    expect(prompt).toContain('Style: Google (labeled sections) (template 1.0.0)');
  });

  it('adds the previous review when there is one', () => {
    const prompt = buildGenerationPrompt({
      ...generationRequest(),
      priorReview: { score: 0.4, issues: ['Too short'], suggestions: ['Describe b'], evaluator: 'objective' },
    });

    expect(prompt).toContain('The previous attempt scored 0.40. Fix these problems:\n- Too short\n- Describe b\n');
  });

  it('shows the code to the reviewer', () => {
    const prompt = buildEvaluationPrompt({
      code: ADD.sourceText,
      candidate: '"""Add."""',
      facts: elementFacts(ADD),
      style: 'google',
    });

    expect(prompt).toContain('```python\ndef add(a, b):\n    return a + b\n```');
    expect(prompt.endsWith('Docstring (google style):\n"""Add."""\n\nReview this docstring.')).toBe(true);
  });
});

describe('AIClient', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns the parsed docstring and counts usage', async () => {
    const transport = scriptedTransport([{ content: '<docstring>Add a and b.</docstring>', tokensUsed: 42 }]);
    const client = new AIClient({ provider: 'ollama', transport });

    expect(await client.complete(generationRequest())).toBe('Add a and b.');
    expect(client.getStats()).toEqual({ totalTokensUsed: 42, callCount: 1, averageTokensPerCall: 42 });

    client.resetStats();
    expect(client.getStats().callCount).toBe(0);
  });

  it('uses the provider default model', () => {
    const transport = scriptedTransport([]);
    expect(new AIClient({ provider: 'ollama', transport }).model).toBe('llama3.1:8b');
    expect(new AIClient({ provider: 'groq', apiKey: 'test-key', transport }).model).toBe('llama-3.3-70b-versatile');
  });

  it('retries rate-limited requests', async () => {
    const transport = scriptedTransport([
      new Error('429 rate limit exceeded'),
      { content: '<docstring>Add a and b.</docstring>', tokensUsed: 10 },
    ]);
    const client = new AIClient({ provider: 'ollama', transport, retryDelayMs: 0 });

    expect(await client.complete(generationRequest())).toBe('Add a and b.');
    expect(transport.calls).toBe(2);
  });

  it('gives up after the retry budget', async () => {
    const transport = scriptedTransport([new Error('request timeout')]);
    const client = new AIClient({ provider: 'ollama', transport, retryDelayMs: 0, maxRetries: 1 });

    await expect(client.complete(generationRequest())).rejects.toThrow('request timeout');
    expect(transport.calls).toBe(2);
  });

  it('does not retry other failures', async () => {
    const transport = scriptedTransport([new Error('invalid request')]);
    const client = new AIClient({ provider: 'ollama', transport, retryDelayMs: 0 });

    await expect(client.complete(generationRequest())).rejects.toThrow('invalid request');
    expect(transport.calls).toBe(1);
  });

  it('wraps unparseable answers', async () => {
    const transport = scriptedTransport([{ content: 'no xml here', tokensUsed: 1 }]);
    const client = new AIClient({ provider: 'ollama', transport });

    const failure = await client.complete(generationRequest()).catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(AIValidationError);
    if (failure instanceof AIValidationError) {
      expect(failure.message).toBe('Failed to parse AI response: missing <docstring> element');
      expect(failure.rawResponse).toBe('no xml here');
    }
  });

  it('validates reviews', async () => {
    const transport = scriptedTransport([
      { content: '<review><score>1.4</score><issue>Vague</issue></review>', tokensUsed: 5 },
    ]);
    const client = new AIClient({ provider: 'ollama', transport });
    const review = await client.evaluate({
      code: ADD.sourceText,
      candidate: '"""Add."""',
      facts: elementFacts(ADD),
      style: 'google',
    });

    expect(review).toEqual({ score: 1, issues: ['Vague'], suggestions: [] });
  });

  it('requires an API key for groq', () => {
    expect(() => new AIClient({ provider: 'groq', apiKey: '' })).toThrow(ConfigError);
  });
});

describe('createCapabilities', () => {
  it('provides nothing for provider none', () => {
    expect(createCapabilities(DEFAULT_PIPELINE_CONFIG)).toEqual({});
  });

  it('uses one client for generation and review', () => {
    const capabilities = createCapabilities({ ...DEFAULT_PIPELINE_CONFIG, provider: 'ollama', model: 'qwen2.5' });

    expect(capabilities.client).toBeInstanceOf(AIClient);
    expect(capabilities.generator).toBe(capabilities.client);
    expect(capabilities.evaluator).toBe(capabilities.client);
    expect(capabilities.client?.model).toBe('qwen2.5');
  });
});
