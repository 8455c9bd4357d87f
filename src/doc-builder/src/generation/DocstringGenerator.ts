/**
 * DocstringGenerator - Produces one candidate docstring per call.
 *
 * With a text generator configured, the model writes the prose and the
 * result is checked before use. Without one, or whenever the model
 * fails or its text does not pass, the rule-based renderer is used.
 * The rule-based path never fails and never leaves the process.
 */

import { CodeElement, CriticReview, DocstringStyle, GeneratedCandidate } from '../types';
import { TextGenerator, elementFacts } from '../ai/capabilities';
import { GenerationFailure, errorMessage } from '../core/errors';
import { QUOTE, isDelimited, mentions, wrapDocstring } from './DocstringText';
import { getTemplate, placeholderSections, renderDocstring } from './StyleTemplates';

export class DocstringGenerator {
  constructor(private readonly textGenerator?: TextGenerator) {}

  get usesModel(): boolean {
    return this.textGenerator !== undefined;
  }

  async generate(
    element: CodeElement,
    style: DocstringStyle,
    priorReview?: CriticReview,
    signal?: AbortSignal
  ): Promise<GeneratedCandidate> {
    if (!this.textGenerator) {
      return this.generateRuleBased(element, style);
    }

    let body: string;
    try {
      body = await this.textGenerator.complete(
        {
          facts: elementFacts(element),
          style,
          template: getTemplate(style),
          priorReview,
        },
        signal
      );
    } catch (error) {
      // A cancelled file is not a generation failure; let it unwind
      signal?.throwIfAborted();
      const failure = new GenerationFailure(`generation failed: ${errorMessage(error)}`, error);
      console.warn(`[generator] ${element.qualifiedName}: ${failure.message}, using rule-based docstring`);
      return { ...this.generateRuleBased(element, style), fallbackReason: failure.message };
    }

    const problem = validateModelText(element, body);
    if (problem) {
      const reason = `model output rejected: ${problem}`;
      console.warn(`[generator] ${element.qualifiedName}: ${reason}, using rule-based docstring`);
      return { ...this.generateRuleBased(element, style), fallbackReason: reason };
    }

    return { text: wrapDocstring(body.split(/\r\n|\r|\n/)), source: 'model' };
  }

  /**
   * Deterministic placeholder docstring built from the element facts.
   */
  generateRuleBased(element: CodeElement, style: DocstringStyle): GeneratedCandidate {
    return {
      text: renderDocstring(style, placeholderSections(element)),
      source: 'rule-based',
    };
  }
}

/**
 * Reason the model body cannot be used, or undefined when it can.
 */
export function validateModelText(element: CodeElement, body: string): string | undefined {
  if (body.trim() === '') {
    return 'empty text';
  }
  if (body.includes(QUOTE)) {
    return 'text contains a triple quote';
  }
  if (!isDelimited(wrapDocstring(body.split(/\r\n|\r|\n/)))) {
    return 'text cannot be embedded in a docstring literal';
  }
  for (const parameter of element.parameters) {
    if (!mentions(body, parameter.name)) {
      return `parameter '${parameter.name}' not mentioned`;
    }
  }
  for (const exception of element.raises) {
    if (!mentions(body, exception.kind)) {
      return `exception '${exception.kind}' not mentioned`;
    }
  }
  return undefined;
}
