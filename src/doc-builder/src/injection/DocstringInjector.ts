/**
 * DocstringInjector - Writes accepted docstrings back into source text.
 *
 * Existing docstrings are replaced in place; otherwise the new block goes
 * right after the header line, at the body's indentation. Elements are
 * applied in descending start offset so pending spans stay valid. Text
 * outside the edited ranges is copied through byte for byte.
 */

import { CodeElement, DocstringResult, InjectionEdit, SpanKey, spanKey } from '../types';
import { LineEnding, LineIndex, dominantLineEnding } from '../core/SourceText';

export interface InjectorConfig {
  /** Replace docstrings that are already present (default: false) */
  overwrite: boolean;
}

const DEFAULT_CONFIG: InjectorConfig = {
  overwrite: false,
};

export interface InjectionResult {
  text: string;
  /** In application order (descending offset) */
  edits: InjectionEdit[];
}

export class DocstringInjector {
  private config: InjectorConfig;

  constructor(config: Partial<InjectorConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  inject(
    source: string,
    elements: readonly CodeElement[],
    results: readonly DocstringResult[]
  ): InjectionResult {
    const bySpan = new Map<SpanKey, DocstringResult>();
    for (const result of results) {
      bySpan.set(result.spanKey, result);
    }

    const pending = elements
      .filter((element) => bySpan.has(spanKey(element.sourceSpan)))
      .filter((element) => this.config.overwrite || !hasContent(element))
      .sort((a, b) => b.sourceSpan.startOffset - a.sourceSpan.startOffset);

    if (pending.length === 0) {
      return { text: source, edits: [] };
    }

    const lines = new LineIndex(source);
    const fallbackEnding = dominantLineEnding(source);
    const edits: InjectionEdit[] = [];
    let text = source;

    for (const element of pending) {
      const result = bySpan.get(spanKey(element.sourceSpan));
      if (!result) continue;

      const existing = element.existingDoc;
      if (existing) {
        const eol = lines.terminatorOf(existing.span.startLine) ?? fallbackEnding;
        const block = indentBlock(result.text, element.header.bodyIndent, eol);
        text = text.slice(0, existing.span.startOffset) + block + text.slice(existing.span.endOffset);
        edits.push({
          qualifiedName: element.qualifiedName,
          action: 'replaced',
          line: existing.span.startLine,
          text: result.text,
        });
        continue;
      }

      const { header } = element;
      const headerLine = lines.lineAt(header.colonOffset - 1);
      const eol = lines.terminatorOf(headerLine) ?? fallbackEnding;
      const block = header.bodyIndent + indentBlock(result.text, header.bodyIndent, eol);

      if (header.inlineBody) {
        // `def f(): return 1` becomes a header line plus an indented body
        text =
          text.slice(0, header.colonOffset) +
          eol +
          block +
          eol +
          header.bodyIndent +
          text.slice(header.bodyStartOffset);
      } else {
        text = text.slice(0, header.lineEndOffset) + block + eol + text.slice(header.lineEndOffset);
      }
      edits.push({
        qualifiedName: element.qualifiedName,
        action: 'inserted',
        line: headerLine + 1,
        text: result.text,
      });
    }

    return { text, edits };
  }

  /**
   * Elements the injector will leave alone because they already carry
   * a docstring and overwriting is off.
   */
  protectedElements(elements: readonly CodeElement[]): CodeElement[] {
    return this.config.overwrite ? [] : elements.filter(hasContent);
  }
}

const STRING_LITERAL = /[rRuU]?("""[\s\S]*?"""|'''[\s\S]*?'''|"(?:\\.|[^"\\])*"|'(?:\\.|[^'\\])*')/g;

/** Existing docstring with any non-whitespace text inside its quotes */
function hasContent(element: CodeElement): boolean {
  const text = element.existingDoc?.text;
  if (text === undefined) return false;
  for (const match of text.matchAll(STRING_LITERAL)) {
    const literal = match[1] ?? '';
    const quote = literal.startsWith('"""') || literal.startsWith("'''") ? 3 : 1;
    if (literal.slice(quote, -quote).trim() !== '') return true;
  }
  return false;
}

/** Re-indent continuation lines and apply the file's line ending */
function indentBlock(docstring: string, indent: string, eol: LineEnding): string {
  return docstring
    .split('\n')
    .map((line, i) => (i === 0 || line === '' ? line : indent + line))
    .join(eol);
}
