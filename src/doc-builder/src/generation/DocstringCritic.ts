/**
 * DocstringCritic - Judges a candidate against the element it documents.
 *
 * Objective checks run locally and always. When an evaluator is
 * configured, its score is blended in for non-trivial elements; if it
 * fails, the objective score stands on its own.
 */

import { CodeElement, CriticReview, DocstringStyle } from '../types';
import { TextEvaluator, elementFacts } from '../ai/capabilities';
import { EvaluationFailure, errorMessage } from '../core/errors';
import {
  MAX_DOC_LINES,
  WORD_BAND,
  countLines,
  countWords,
  docstringBody,
  isDelimited,
  mentions,
} from './DocstringText';
import { getTemplate } from './StyleTemplates';

export interface CriticConfig {
  /** Share of the final score taken from the evaluator (default: 0.5) */
  evaluatorWeight: number;
}

const DEFAULT_CONFIG: CriticConfig = {
  evaluatorWeight: 0.5,
};

interface Check {
  passed: boolean;
  issue: string;
  suggestion?: string;
}

/**
 * No parameters, no exceptions and no value produced.
 */
export function isTrivialElement(element: CodeElement): boolean {
  return element.parameters.length === 0 && element.raises.length === 0 && !element.returns;
}

export class DocstringCritic {
  private config: CriticConfig;

  constructor(
    private readonly evaluator?: TextEvaluator,
    config: Partial<CriticConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async review(
    element: CodeElement,
    candidateText: string,
    style: DocstringStyle,
    signal?: AbortSignal
  ): Promise<CriticReview> {
    const objective = this.objectiveReview(element, candidateText, style);
    if (!this.evaluator || isTrivialElement(element)) {
      return objective;
    }

    try {
      const evaluation = await this.evaluator.evaluate(
        {
          code: element.sourceText,
          candidate: candidateText,
          facts: elementFacts(element),
          style,
        },
        signal
      );
      const weight = this.config.evaluatorWeight;
      return {
        score: clamp(objective.score * (1 - weight) + evaluation.score * weight),
        issues: [...objective.issues, ...evaluation.issues],
        suggestions: [...objective.suggestions, ...evaluation.suggestions],
        evaluator: 'blended',
      };
    } catch (error) {
      signal?.throwIfAborted();
      const failure = new EvaluationFailure(`evaluation failed: ${errorMessage(error)}`, error);
      console.warn(`[critic] ${element.qualifiedName}: ${failure.message}, using objective checks only`);
      return objective;
    }
  }

  /**
   * Score from the local checks alone; each check carries an equal share.
   */
  objectiveReview(element: CodeElement, candidateText: string, style: DocstringStyle): CriticReview {
    const checks = this.runChecks(element, candidateText, style);
    const passed = checks.filter((c) => c.passed).length;
    const failed = checks.filter((c) => !c.passed);

    return {
      score: checks.length > 0 ? passed / checks.length : 1,
      issues: failed.map((c) => c.issue),
      suggestions: failed.flatMap((c) => (c.suggestion ? [c.suggestion] : [])),
      evaluator: 'objective',
    };
  }

  private runChecks(element: CodeElement, candidateText: string, style: DocstringStyle): Check[] {
    const template = getTemplate(style);
    const body = docstringBody(candidateText);
    const words = countWords(candidateText);
    const checks: Check[] = [
      { passed: body.trim() !== '', issue: 'Docstring is empty' },
      {
        passed: countLines(candidateText) <= MAX_DOC_LINES,
        issue: `Docstring exceeds ${MAX_DOC_LINES} lines`,
        suggestion: 'Shorten the docstring',
      },
      {
        passed: isDelimited(candidateText),
        issue: 'Docstring is not properly delimited',
        suggestion: 'Wrap the docstring in triple double quotes',
      },
      {
        passed: words >= WORD_BAND.min && words <= WORD_BAND.max,
        issue: `Word count ${words} outside ${WORD_BAND.min}-${WORD_BAND.max}`,
      },
    ];

    for (const header of template.requiredHeaders(element)) {
      checks.push({
        passed: template.hasHeader(body, header),
        issue: `Missing section header '${header}'`,
        suggestion: `Add a '${header}' section`,
      });
    }

    for (const parameter of element.parameters) {
      checks.push({
        passed: mentions(body, parameter.name),
        issue: `Parameter '${parameter.name}' not documented`,
        suggestion: `Describe parameter '${parameter.name}'`,
      });
    }

    const hasReturns = template.hasReturnsSection(body);
    const needsReturns = element.returns !== undefined;
    checks.push({
      passed: hasReturns === needsReturns,
      issue: needsReturns ? 'Missing returns section' : 'Unexpected returns section',
      suggestion: needsReturns ? 'Describe the return value' : 'Remove the returns section',
    });

    for (const exception of element.raises) {
      checks.push({
        passed: mentions(body, exception.kind),
        issue: `Exception '${exception.kind}' not documented`,
        suggestion: `Explain when ${exception.kind} is raised`,
      });
    }

    return checks;
  }
}

function clamp(value: number): number {
  if (isNaN(value) || value < 0) return 0;
  return value > 1 ? 1 : value;
}
