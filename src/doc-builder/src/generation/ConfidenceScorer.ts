/**
 * ConfidenceScorer - Folds a critic review and coverage checks into one
 * value in [0, 1]. Pure: identical inputs give identical scores.
 */

import { CodeElement, CriticReview, DocstringStyle } from '../types';
import { WORD_BAND, countWords, docstringBody, isDelimited, mentions } from './DocstringText';
import { getTemplate } from './StyleTemplates';

export const CONFIDENCE_WEIGHTS = {
  critic: 0.4,
  parameters: 0.2,
  returns: 0.15,
  exceptions: 0.1,
  clarity: 0.15,
} as const;

export interface ConfidenceBreakdown {
  critic: number;
  parameterCoverage: number;
  returnCoverage: number;
  exceptionCoverage: number;
  clarity: number;
  confidence: number;
}

export class ConfidenceScorer {
  score(element: CodeElement, candidateText: string, review: CriticReview, style: DocstringStyle): number {
    return this.breakdown(element, candidateText, review, style).confidence;
  }

  breakdown(
    element: CodeElement,
    candidateText: string,
    review: CriticReview,
    style: DocstringStyle
  ): ConfidenceBreakdown {
    const template = getTemplate(style);
    const body = docstringBody(candidateText);

    const parameterCoverage = coverage(element.parameters.map((p) => p.name), body);
    const exceptionCoverage = coverage(element.raises.map((e) => e.kind), body);
    const returnCoverage = template.hasReturnsSection(body) === (element.returns !== undefined) ? 1 : 0;

    const words = countWords(candidateText);
    const clarityChecks = [
      words >= WORD_BAND.min && words <= WORD_BAND.max,
      template.requiredHeaders(element).every((h) => template.hasHeader(body, h)),
      isDelimited(candidateText),
    ];
    const clarity = clarityChecks.filter(Boolean).length / clarityChecks.length;

    const critic = Math.min(1, Math.max(0, review.score));
    const weighted =
      critic * CONFIDENCE_WEIGHTS.critic +
      parameterCoverage * CONFIDENCE_WEIGHTS.parameters +
      returnCoverage * CONFIDENCE_WEIGHTS.returns +
      exceptionCoverage * CONFIDENCE_WEIGHTS.exceptions +
      clarity * CONFIDENCE_WEIGHTS.clarity;

    return {
      critic,
      parameterCoverage,
      returnCoverage,
      exceptionCoverage,
      clarity,
      // Rounded so float noise never decides a threshold comparison
      confidence: Math.round(Math.min(1, Math.max(0, weighted)) * 10000) / 10000,
    };
  }
}

function coverage(names: string[], body: string): number {
  if (names.length === 0) return 1;
  return names.filter((n) => mentions(body, n)).length / names.length;
}
