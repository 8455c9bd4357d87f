/**
 * ComplexityCalculator - McCabe cyclomatic complexity over the statement tree.
 *
 * One for entry, plus one per decision point: if/elif, loops, except
 * and case clauses, boolean operators, conditional expressions and
 * comprehension clauses. Nested def/class bodies are scored on their own.
 */

import { BlockStatement, walkStatements } from '../core/SyntaxTree';
import { Token } from '../core/Tokenizer';

const BRANCH_KEYWORDS = new Set(['if', 'elif', 'for', 'while', 'except', 'case']);

/** Expression-level names that open another path */
const EXPRESSION_DECISIONS = new Set(['and', 'or', 'if', 'for']);

export class ComplexityCalculator {
  calculate(body: BlockStatement): number {
    let complexity = 1;

    walkStatements(body, (statement) => {
      if (statement.type === 'simple') {
        complexity += countExpressionDecisions(statement.tokens);
        return true;
      }
      if (statement.keyword === 'def' || statement.keyword === 'class') {
        return false;
      }
      if (BRANCH_KEYWORDS.has(statement.keyword)) {
        complexity++;
      }
      complexity += countExpressionDecisions(statement.header);
      return true;
    });

    return complexity;
  }
}

function countExpressionDecisions(tokens: readonly Token[]): number {
  let count = 0;
  for (const token of tokens) {
    if (token.type === 'name' && EXPRESSION_DECISIONS.has(token.value)) count++;
  }
  return count;
}
