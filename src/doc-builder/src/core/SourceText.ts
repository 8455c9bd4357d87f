/**
 * Line bookkeeping over raw source text.
 *
 * Recognises LF, CRLF and lone CR terminators so offsets computed here
 * agree with the tokenizer regardless of the file's line-ending style.
 */

export type LineEnding = '\n' | '\r\n' | '\r';

export class LineIndex {
  /** Offset of the first character of each line */
  private readonly lineStarts: number[];

  constructor(private readonly text: string) {
    this.lineStarts = [0];
    for (let i = 0; i < text.length; i++) {
      const ch = text[i];
      if (ch === '\r') {
        if (text[i + 1] === '\n') i++;
        this.lineStarts.push(i + 1);
      } else if (ch === '\n') {
        this.lineStarts.push(i + 1);
      }
    }
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  /** 1-based line containing the offset */
  lineAt(offset: number): number {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.lineStarts[mid] ?? 0) <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low + 1;
  }

  /** 1-based column of the offset */
  columnAt(offset: number): number {
    return offset - this.lineStart(this.lineAt(offset)) + 1;
  }

  /** Offset where the given 1-based line begins */
  lineStart(line: number): number {
    return this.lineStarts[line - 1] ?? this.text.length;
  }

  /** Offset just past the line terminator of the given line (or end of text) */
  lineEnd(line: number): number {
    return this.lineStarts[line] ?? this.text.length;
  }

  /** Leading whitespace of the line holding the offset, up to the offset */
  indentBefore(offset: number): string {
    const start = this.lineStart(this.lineAt(offset));
    const prefix = this.text.slice(start, offset);
    return prefix.match(/^[ \t\f]*/)?.[0] ?? '';
  }

  /** Terminator that ends the given line, if any */
  terminatorOf(line: number): LineEnding | undefined {
    const end = this.lineEnd(line);
    if (end === this.text.length && line >= this.lineStarts.length) {
      return undefined;
    }
    if (this.text[end - 2] === '\r' && this.text[end - 1] === '\n') return '\r\n';
    const last = this.text[end - 1];
    if (last === '\n') return '\n';
    if (last === '\r') return '\r';
    return undefined;
  }
}

/**
 * Most frequent line ending in the text; LF when the text has none.
 * Ties resolve in the order LF, CRLF, CR.
 */
export function dominantLineEnding(text: string): LineEnding {
  let lf = 0;
  let crlf = 0;
  let cr = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\r') {
      if (text[i + 1] === '\n') {
        crlf++;
        i++;
      } else {
        cr++;
      }
    } else if (ch === '\n') {
      lf++;
    }
  }
  if (crlf > lf && crlf >= cr) return '\r\n';
  if (cr > lf && cr > crlf) return '\r';
  return '\n';
}

export function isLineBreak(ch: string | undefined): boolean {
  return ch === '\n' || ch === '\r';
}
