/**
 * RefinementOrchestrator - Bounded generate / review / score loop.
 *
 * Per element:
 *   init -> generated -> reviewed -> accepted
 *                 ^          |
 *                 +----------+ (below threshold, budget left)
 *                            |
 *                            +-> exhausted (budget spent; best candidate wins)
 *
 * The generator is called at most `maxIterations` times per element.
 */

import {
  CodeElement,
  DocstringResult,
  DocstringStyle,
  GeneratedCandidate,
  RefinementState,
  spanKey,
} from '../types';
import { DocstringGenerator } from '../generation/DocstringGenerator';
import { DocstringCritic } from '../generation/DocstringCritic';
import { ConfidenceScorer } from '../generation/ConfidenceScorer';
import { mapInChunks } from '../utils/concurrency';

export interface RefinementConfig {
  style: DocstringStyle;
  threshold: number;
  maxIterations: number;
  /** Elements refined at once */
  elementConcurrency: number;
}

const DEFAULT_CONFIG: RefinementConfig = {
  style: 'google',
  threshold: 0.8,
  maxIterations: 3,
  elementConcurrency: 1,
};

export class RefinementOrchestrator {
  private config: RefinementConfig;

  constructor(
    private readonly generator: DocstringGenerator,
    private readonly critic: DocstringCritic,
    private readonly scorer: ConfidenceScorer,
    config: Partial<RefinementConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (!Number.isInteger(this.config.maxIterations) || this.config.maxIterations < 1) {
      throw new RangeError(`maxIterations must be a positive integer, got ${this.config.maxIterations}`);
    }
  }

  /**
   * Drive one element to a terminal state.
   */
  async refine(element: CodeElement, signal?: AbortSignal): Promise<DocstringResult> {
    const { style, threshold, maxIterations } = this.config;
    const state: RefinementState = {
      phase: 'init',
      iteration: 0,
      bestScore: -1,
      history: [],
    };
    let candidate: GeneratedCandidate | undefined;

    while (state.phase !== 'accepted' && state.phase !== 'exhausted') {
      signal?.throwIfAborted();

      switch (state.phase) {
        case 'init':
        case 'reviewed': {
          if (state.phase === 'reviewed') {
            const last = state.history[state.history.length - 1];
            if (last && last.confidence >= threshold) {
              state.phase = 'accepted';
              break;
            }
            if (state.iteration >= maxIterations) {
              state.phase = 'exhausted';
              break;
            }
          }
          state.iteration++;
          const priorReview = state.history[state.history.length - 1]?.review;
          candidate = await this.generator.generate(element, style, priorReview, signal);
          state.phase = 'generated';
          break;
        }

        case 'generated': {
          if (!candidate) {
            throw new Error(`no candidate generated for ${element.qualifiedName}`);
          }
          const review = await this.critic.review(element, candidate.text, style, signal);
          const confidence = this.scorer.score(element, candidate.text, review, style);
          state.history.push({ iteration: state.iteration, candidate, review, confidence });

          // Ties keep the earlier candidate
          if (confidence > state.bestScore) {
            state.bestScore = confidence;
            state.bestCandidate = candidate;
          }
          state.phase = 'reviewed';
          break;
        }
      }
    }

    return this.toResult(element, state);
  }

  /**
   * Refine every element; results keep the element order.
   */
  async refineAll(elements: readonly CodeElement[], signal?: AbortSignal): Promise<DocstringResult[]> {
    return mapInChunks(elements, this.config.elementConcurrency, (element) => this.refine(element, signal));
  }

  private toResult(element: CodeElement, state: RefinementState): DocstringResult {
    const accepted = state.phase === 'accepted';
    const last = state.history[state.history.length - 1];
    const chosen = accepted ? last : state.history.find((step) => step.candidate === state.bestCandidate);
    if (!chosen) {
      throw new Error(`refinement of ${element.qualifiedName} ended without a candidate`);
    }

    const warnings: string[] = element.ambiguities.map((a) =>
      a.target === 'parameter'
        ? `Type of parameter '${a.name}' could not be inferred (${a.reason})`
        : `Return type could not be inferred (${a.reason})`
    );
    for (const step of state.history) {
      const reason = step.candidate.fallbackReason;
      if (reason && !warnings.includes(reason)) {
        warnings.push(reason);
      }
    }
    if (!accepted) {
      warnings.push(
        `Confidence threshold ${this.config.threshold} not reached after ${state.iteration} iterations (best ${chosen.confidence.toFixed(2)})`
      );
    }

    return {
      elementName: element.name,
      qualifiedName: element.qualifiedName,
      spanKey: spanKey(element.sourceSpan),
      text: chosen.candidate.text,
      confidenceScore: chosen.confidence,
      style: this.config.style,
      iterationsUsed: state.iteration,
      outcome: accepted ? 'accepted' : 'exhausted',
      warnings,
      history: state.history,
    };
  }
}
