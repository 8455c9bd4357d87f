/**
 * Structural checks on a candidate docstring literal.
 *
 * Candidates are unindented literals: `"""` + body + `"""`, lines joined
 * with '\n'. Everything here is pure and deterministic.
 */

export const QUOTE = '"""';

/** Accepted word count for a candidate (inclusive) */
export const WORD_BAND = { min: 2, max: 250 } as const;

/** Sanity bound on candidate length */
export const MAX_DOC_LINES = 100;

/**
 * True when the literal opens and closes with triple quotes and its body
 * can neither end it early (a stray triple quote, a trailing `"`) nor
 * escape the closing quote.
 */
export function isDelimited(text: string): boolean {
  const literal = text.trim();
  const body = literal.replace(/^[rRuU]?/, '');
  if (body.length < QUOTE.length * 2) return false;
  if (!body.startsWith(QUOTE) || !body.endsWith(QUOTE)) return false;
  const inner = body.slice(QUOTE.length, -QUOTE.length);
  return !inner.includes(QUOTE) && !inner.endsWith('"') && !hasTrailingEscape(inner);
}

/** Odd run of backslashes at the end escapes the closing quote */
function hasTrailingEscape(inner: string): boolean {
  const run = inner.match(/\\+$/)?.[0].length ?? 0;
  return run % 2 === 1;
}

/** Body of the literal without its quotes (or the text itself if undelimited) */
export function docstringBody(text: string): string {
  const literal = text.trim().replace(/^[rRuU]?(?=""")/, '');
  if (literal.startsWith(QUOTE) && literal.endsWith(QUOTE) && literal.length >= QUOTE.length * 2) {
    return literal.slice(QUOTE.length, -QUOTE.length);
  }
  return literal;
}

export function countWords(text: string): number {
  return docstringBody(text).match(/[A-Za-z0-9_]+(?:'[A-Za-z]+)?/g)?.length ?? 0;
}

export function countLines(text: string): number {
  return text.split(/\r\n|\r|\n/).length;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word mention of a parameter or exception name.
 */
export function mentions(text: string, name: string): boolean {
  if (name === '') return false;
  return new RegExp(`(^|[^A-Za-z0-9_])${escapeRegExp(name)}(?![A-Za-z0-9_])`).test(text);
}

/** Wrap a body in triple quotes, closing on its own line when multi-line */
export function wrapDocstring(lines: readonly string[]): string {
  if (lines.length <= 1) {
    return `${QUOTE}${lines[0] ?? ''}${QUOTE}`;
  }
  return [`${QUOTE}${lines[0] ?? ''}`, ...lines.slice(1), QUOTE].join('\n');
}
