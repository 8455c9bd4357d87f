/**
 * Tests for DocstringCritic, ConfidenceScorer and RefinementOrchestrator.
 */

import { ElementExtractor } from '../core/ElementExtractor';
import { augmentElements } from '../analysis';
import { DocstringGenerator } from '../generation/DocstringGenerator';
import { DocstringCritic, isTrivialElement } from '../generation/DocstringCritic';
import { ConfidenceScorer } from '../generation/ConfidenceScorer';
import { RefinementOrchestrator } from '../refinement/RefinementOrchestrator';
import { EvaluationRequest, EvaluationResult, GenerationRequest, TextEvaluator, TextGenerator } from '../ai';
import { CodeElement } from '../types';

function elementOf(source: string): CodeElement {
  const [element] = augmentElements(new ElementExtractor().extract(source));
  if (!element) {
    throw new Error('no element extracted');
  }
  return element;
}

const ADD = elementOf('def add(a, b):\n    return a + b\n');
const PING = elementOf('def ping():\n    pass\n');
const CHECK = elementOf(
  [
    'def check(value):',
    '    if value is None:',
    '        raise ValueError("missing")',
    '    return value',
    '',
  ].join('\n')
);

const FULL_ADD = '"""Add two numbers.\n\nArgs:\n    a (float): First.\n    b (float): Second.\n\nReturns:\n    float: The sum.\n"""';
const SHORT_ADD = '"""Add a and b."""';

class ScriptedGenerator implements TextGenerator {
  readonly requests: GenerationRequest[] = [];

  constructor(private readonly answers: string[]) {}

  async complete(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    return this.answers[this.requests.length - 1] ?? this.answers[this.answers.length - 1] ?? '';
  }
}

class FixedEvaluator implements TextEvaluator {
  readonly requests: EvaluationRequest[] = [];

  constructor(private readonly result: EvaluationResult | Error) {}

  async evaluate(request: EvaluationRequest): Promise<EvaluationResult> {
    this.requests.push(request);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

describe('DocstringCritic', () => {
  const critic = new DocstringCritic();

  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('passes a complete docstring', async () => {
    expect(await critic.review(ADD, FULL_ADD, 'google')).toEqual({
      score: 1,
      issues: [],
      suggestions: [],
      evaluator: 'objective',
    });
  });

  it('lists missing sections and coverage', () => {
    const review = critic.objectiveReview(ADD, SHORT_ADD, 'google');

    expect(review.score).toBeCloseTo(6 / 9, 10);
    expect(review.issues).toEqual([
      "Missing section header 'Args:'",
      "Missing section header 'Returns:'",
      'Missing returns section',
    ]);
    expect(review.suggestions).toEqual([
      "Add a 'Args:' section",
      "Add a 'Returns:' section",
      'Describe the return value',
    ]);
  });

  it('flags undocumented parameters and exceptions', () => {
    const review = critic.objectiveReview(CHECK, '"""Check the input.\n\nReturns:\n    The input.\n"""', 'google');

    expect(review.issues).toEqual([
      "Missing section header 'Args:'",
      "Missing section header 'Raises:'",
      "Parameter 'value' not documented",
      "Exception 'ValueError' not documented",
    ]);
    expect(review.suggestions).toEqual([
      "Add a 'Args:' section",
      "Add a 'Raises:' section",
      "Describe parameter 'value'",
      'Explain when ValueError is raised',
    ]);
    expect(review.score).toBeCloseTo(6 / 10, 10);
  });

  it('flags empty, undelimited and unexpected returns', () => {
    const review = critic.objectiveReview(PING, 'Returns:\n    nothing', 'google');

    expect(review.issues).toEqual([
      'Docstring is not properly delimited',
      'Unexpected returns section',
    ]);
    expect(review.score).toBeCloseTo(3 / 5, 10);

    const empty = critic.objectiveReview(PING, '""""""', 'google');
    expect(empty.issues).toEqual(['Docstring is empty', 'Word count 0 outside 2-250']);
    expect(empty.suggestions).toEqual([]);
  });

  it('blends the evaluator score for non-trivial elements', async () => {
    const evaluator = new FixedEvaluator({ score: 0.5, issues: ['Too vague'], suggestions: ['Say more'] });
    const review = await new DocstringCritic(evaluator).review(ADD, FULL_ADD, 'google');

    expect(review).toEqual({
      score: 0.75,
      issues: ['Too vague'],
      suggestions: ['Say more'],
      evaluator: 'blended',
    });
    expect(evaluator.requests[0]?.code).toBe('def add(a, b):\n    return a + b');
    expect(evaluator.requests[0]?.candidate).toBe(FULL_ADD);
  });

  it('honours the evaluator weight', async () => {
    const evaluator = new FixedEvaluator({ score: 0, issues: [], suggestions: [] });
    const review = await new DocstringCritic(evaluator, { evaluatorWeight: 0.25 }).review(ADD, FULL_ADD, 'google');
    expect(review.score).toBe(0.75);
  });

  it('skips the evaluator for trivial elements', async () => {
    const evaluator = new FixedEvaluator({ score: 0, issues: ['Bad'], suggestions: [] });
    const review = await new DocstringCritic(evaluator).review(PING, '"""ping function."""', 'google');

    expect(isTrivialElement(PING)).toBe(true);
    expect(isTrivialElement(ADD)).toBe(false);
    expect(evaluator.requests).toHaveLength(0);
    expect(review.score).toBe(1);
    expect(review.evaluator).toBe('objective');
  });

  it('keeps the objective review when the evaluator fails', async () => {
    const evaluator = new FixedEvaluator(new Error('bad gateway'));
    const review = await new DocstringCritic(evaluator).review(ADD, SHORT_ADD, 'google');

    expect(review).toEqual(critic.objectiveReview(ADD, SHORT_ADD, 'google'));
    expect(console.warn).toHaveBeenCalledWith(
      '[critic] add: evaluation failed: bad gateway, using objective checks only'
    );
  });
});

describe('ConfidenceScorer', () => {
  const critic = new DocstringCritic();
  const scorer = new ConfidenceScorer();

  it('gives a complete docstring full confidence', () => {
    const review = critic.objectiveReview(ADD, FULL_ADD, 'google');
    expect(scorer.score(ADD, FULL_ADD, review, 'google')).toBe(1);
  });

  it('gives a trivial element full confidence for its one-line docstring', () => {
    const text = '"""ping function."""';
    expect(scorer.score(PING, text, critic.objectiveReview(PING, text, 'google'), 'google')).toBe(1);
  });

  it('breaks the score into its parts', () => {
    const review = critic.objectiveReview(ADD, SHORT_ADD, 'google');
    const breakdown = scorer.breakdown(ADD, SHORT_ADD, review, 'google');

    expect(breakdown.critic).toBeCloseTo(6 / 9, 10);
    expect(breakdown.parameterCoverage).toBe(1);
    expect(breakdown.returnCoverage).toBe(0);
    expect(breakdown.exceptionCoverage).toBe(1);
    expect(breakdown.clarity).toBeCloseTo(2 / 3, 10);
    expect(breakdown.confidence).toBe(0.6667);
  });

  it('clamps the critic score', () => {
    const review = { score: 3, issues: [], suggestions: [], evaluator: 'blended' as const };
    expect(scorer.breakdown(ADD, FULL_ADD, review, 'google').critic).toBe(1);
  });

  it('is pure', () => {
    const review = critic.objectiveReview(CHECK, SHORT_ADD, 'rst');
    expect(scorer.score(CHECK, SHORT_ADD, review, 'rst')).toBe(scorer.score(CHECK, SHORT_ADD, review, 'rst'));
  });
});

describe('RefinementOrchestrator', () => {
  function orchestrator(
    config: { threshold: number; maxIterations?: number },
    textGenerator?: TextGenerator
  ): { orchestrator: RefinementOrchestrator; generator: DocstringGenerator } {
    const generator = new DocstringGenerator(textGenerator);
    return {
      generator,
      orchestrator: new RefinementOrchestrator(generator, new DocstringCritic(), new ConfidenceScorer(), {
        style: 'google',
        ...config,
      }),
    };
  }

  it('accepts at the first iteration when the threshold is zero', async () => {
    const { orchestrator: o } = orchestrator({ threshold: 0 });
    const result = await o.refine(ADD);

    expect(result.outcome).toBe('accepted');
    expect(result.iterationsUsed).toBe(1);
    expect(result.history).toHaveLength(1);
    expect(result.confidenceScore).toBe(1);
    expect(result.warnings).toEqual([]);
    expect(result.spanKey).toBe('0:31');
  });

  it('calls the generator exactly maxIterations times before giving up', async () => {
    const { orchestrator: o, generator } = orchestrator({ threshold: 1.01, maxIterations: 3 });
    const generate = jest.spyOn(generator, 'generate');
    const result = await o.refine(ADD);

    expect(generate).toHaveBeenCalledTimes(3);
    expect(result.outcome).toBe('exhausted');
    expect(result.iterationsUsed).toBe(3);
    expect(result.confidenceScore).toBe(1);
    expect(result.warnings).toEqual(['Confidence threshold 1.01 not reached after 3 iterations (best 1.00)']);
  });

  it('keeps the best candidate when the budget runs out', async () => {
    const model = new ScriptedGenerator([
      'Add a and b.',
      'Add two numbers.\n\nArgs:\n    a (float): First.\n    b (float): Second.\n\nReturns:\n    float: The sum.',
      'Add a and b.',
    ]);
    const { orchestrator: o } = orchestrator({ threshold: 1.01, maxIterations: 3 }, model);
    const result = await o.refine(ADD);

    expect(result.history.map((step) => step.confidence)).toEqual([0.6667, 1, 0.6667]);
    expect(result.text).toBe(FULL_ADD);
    expect(result.confidenceScore).toBe(1);
    expect(result.warnings).toEqual(['Confidence threshold 1.01 not reached after 3 iterations (best 1.00)']);
  });

  it('feeds each review into the next generation', async () => {
    const model = new ScriptedGenerator(['Add a and b.']);
    const { orchestrator: o } = orchestrator({ threshold: 0.9, maxIterations: 2 }, model);
    await o.refine(ADD);

    expect(model.requests).toHaveLength(2);
    expect(model.requests[0]?.priorReview).toBeUndefined();
    expect(model.requests[1]?.priorReview?.issues).toEqual([
      "Missing section header 'Args:'",
      "Missing section header 'Returns:'",
      'Missing returns section',
    ]);
  });

  it('keeps the earlier candidate on a tie', async () => {
    const model = new ScriptedGenerator(['Add a and b.', 'Sum of a and b.']);
    const { orchestrator: o } = orchestrator({ threshold: 0.9, maxIterations: 2 }, model);
    const result = await o.refine(ADD);

    expect(result.outcome).toBe('exhausted');
    expect(result.text).toBe(SHORT_ADD);
    expect(result.warnings).toEqual(['Confidence threshold 0.9 not reached after 2 iterations (best 0.67)']);
  });

  it('reports inference gaps and fallbacks as warnings', async () => {
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    const failing: TextGenerator = {
      complete: async () => {
        throw new Error('offline');
      },
    };
    const { orchestrator: o } = orchestrator({ threshold: 0 }, failing);
    const result = await o.refine(CHECK);
    jest.restoreAllMocks();

    expect(result.outcome).toBe('accepted');
    expect(result.warnings).toEqual([
      "Type of parameter 'value' could not be inferred (no-evidence)",
      'Return type could not be inferred (no-evidence)',
      'generation failed: offline',
    ]);
  });

  it('refines every element in order', async () => {
    const { orchestrator: o } = orchestrator({ threshold: 0 });
    const results = await o.refineAll([PING, ADD]);
    expect(results.map((r) => r.qualifiedName)).toEqual(['ping', 'add']);
  });

  it('rejects a non-positive iteration budget', () => {
    expect(() => orchestrator({ threshold: 0.8, maxIterations: 0 })).toThrow(RangeError);
  });

  it('stops when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stop'));
    const { orchestrator: o } = orchestrator({ threshold: 0 });

    await expect(o.refine(ADD, controller.signal)).rejects.toThrow('stop');
  });
});
