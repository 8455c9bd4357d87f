/**
 * Helpers for reading expressions as token runs.
 */

import { Token } from './Tokenizer';

const OPENERS = new Set(['(', '[', '{']);
const CLOSERS = new Set([')', ']', '}']);

export function isOp(token: Token | undefined, value: string): boolean {
  return token !== undefined && token.type === 'op' && token.value === value;
}

export function isName(token: Token | undefined, value?: string): boolean {
  return token !== undefined && token.type === 'name' && (value === undefined || token.value === value);
}

/**
 * Split on a separator that sits outside every bracket. Empty runs
 * (a trailing comma) are dropped.
 */
export function splitTopLevel(tokens: readonly Token[], separator: string): Token[][] {
  const parts: Token[][] = [];
  let current: Token[] = [];
  let depth = 0;
  for (const token of tokens) {
    if (token.type === 'op') {
      if (OPENERS.has(token.value)) depth++;
      else if (CLOSERS.has(token.value)) depth--;
      else if (token.value === separator && depth === 0) {
        if (current.length > 0) parts.push(current);
        current = [];
        continue;
      }
    }
    current.push(token);
  }
  if (current.length > 0) parts.push(current);
  return parts;
}

/** Index of the first top-level op with the given value, or -1 */
export function indexOfTopLevel(tokens: readonly Token[], value: string): number {
  let depth = 0;
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token || token.type !== 'op') continue;
    if (OPENERS.has(token.value)) depth++;
    else if (CLOSERS.has(token.value)) depth--;
    else if (token.value === value && depth === 0) return i;
  }
  return -1;
}

/** Index of the bracket closing the opener at `openIndex`, or -1 */
export function matchingClose(tokens: readonly Token[], openIndex: number): number {
  let depth = 0;
  for (let i = openIndex; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token || token.type !== 'op') continue;
    if (OPENERS.has(token.value)) depth++;
    else if (CLOSERS.has(token.value)) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** True when the run is wrapped by a single pair of parentheses */
export function isParenthesized(tokens: readonly Token[]): boolean {
  return isOp(tokens[0], '(') && matchingClose(tokens, 0) === tokens.length - 1;
}

/**
 * A bare or parenthesized tuple display: `a, b` or `(a, b)` or `(a,)`.
 */
export function isTupleExpression(tokens: readonly Token[]): boolean {
  if (tokens.length === 0) return false;
  if (indexOfTopLevel(tokens, ',') >= 0) return true;
  if (isParenthesized(tokens)) {
    const inner = tokens.slice(1, -1);
    return inner.length > 0 && indexOfTopLevel(inner, ',') >= 0;
  }
  return false;
}

/** Source text covered by a token run, as written */
export function sliceSource(source: string, tokens: readonly Token[]): string {
  const first = tokens[0];
  const last = tokens[tokens.length - 1];
  if (!first || !last) return '';
  return source.slice(first.start, last.end);
}

/** Source text with runs of whitespace collapsed to one space */
export function compactSource(source: string, tokens: readonly Token[]): string {
  return sliceSource(source, tokens).replace(/\s+/g, ' ').trim();
}

/**
 * Dotted name starting at `index` (`a`, `a.b.c`), or undefined.
 */
export function readDottedName(
  tokens: readonly Token[],
  index: number
): { name: string; end: number } | undefined {
  const first = tokens[index];
  if (!first || first.type !== 'name') return undefined;
  let name = first.value;
  let i = index + 1;
  while (isOp(tokens[i], '.') && tokens[i + 1]?.type === 'name') {
    name += '.' + (tokens[i + 1]?.value ?? '');
    i += 2;
  }
  return { name, end: i };
}
