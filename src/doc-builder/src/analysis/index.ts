/**
 * Static analysis of extracted elements: inferred types and complexity.
 */

import { CodeElement } from '../types';
import { ComplexityCalculator } from './ComplexityCalculator';
import { TypeInferencer } from './TypeInferencer';

export { ComplexityCalculator } from './ComplexityCalculator';
export {
  TypeInferencer,
  resolveEvidence,
  collectEvidence,
  classifyExpression,
  classifyLiteral,
  mergeTypes,
} from './TypeInferencer';

const inferencer = new TypeInferencer();
const complexity = new ComplexityCalculator();

/**
 * Augmented copies of the elements. Spans and existing docs are carried
 * over unchanged.
 */
export function augmentElements(elements: readonly CodeElement[]): CodeElement[] {
  return elements.map((element) => ({
    ...inferencer.infer(element),
    complexityScore: complexity.calculate(element.body),
  }));
}
