/**
 * Natural-language capabilities consumed by the generator and critic.
 *
 * Both are optional and fallible. A run selects one backend (or none)
 * from configuration; nothing checks for them at runtime.
 */

import { CodeElement, CriticReview, DocstringStyle } from '../types';
import { StyleTemplate, displayName, displayType } from '../generation/StyleTemplates';

/** Structured facts about an element, as handed to a model */
export interface ElementFacts {
  kind: CodeElement['kind'];
  name: string;
  qualifiedName: string;
  parameters: Array<{ name: string; display: string; type?: string; defaultValue?: string }>;
  returns?: { type?: string; isGenerator: boolean; isMultiValue: boolean };
  raises: string[];
  complexity: number;
  modifiers: string[];
  digest: string;
}

export interface GenerationRequest {
  facts: ElementFacts;
  style: DocstringStyle;
  template: StyleTemplate;
  /** Review of the previous candidate, on refinement iterations */
  priorReview?: CriticReview;
}

export interface EvaluationRequest {
  code: string;
  candidate: string;
  facts: ElementFacts;
  style: DocstringStyle;
}

export interface EvaluationResult {
  /** 0.0 - 1.0 */
  score: number;
  issues: string[];
  suggestions: string[];
}

export interface TextGenerator {
  /** Docstring body text (without quotes); rejects on failure */
  complete(request: GenerationRequest, signal?: AbortSignal): Promise<string>;
}

export interface TextEvaluator {
  evaluate(request: EvaluationRequest, signal?: AbortSignal): Promise<EvaluationResult>;
}

export function elementFacts(element: CodeElement): ElementFacts {
  const returns = element.returns;
  return {
    kind: element.kind,
    name: element.name,
    qualifiedName: element.qualifiedName,
    parameters: element.parameters.map((p) => ({
      name: p.name,
      display: displayName(p),
      type: displayType(p.declaredType, p.inferredType),
      defaultValue: p.defaultValue,
    })),
    returns: returns
      ? {
          type: displayType(returns.declaredType, returns.inferredType),
          isGenerator: returns.isGenerator,
          isMultiValue: returns.isMultiValue,
        }
      : undefined,
    raises: element.raises.map((e) => e.kind),
    complexity: element.complexityScore,
    modifiers: [...element.modifiers],
    digest: element.bodyDigest,
  };
}
