/**
 * Tokenizer - Python lexer producing a flat token stream.
 *
 * Emits INDENT/DEDENT the way CPython does (tab stops of 8), joins
 * lines inside brackets and after a backslash, and fails with a
 * ParseError carrying line/column on malformed input.
 */

import { ParseError } from './errors';
import { LineIndex, isLineBreak } from './SourceText';

export type TokenType =
  | 'name'
  | 'number'
  | 'string'
  | 'op'
  | 'newline'
  | 'indent'
  | 'dedent'
  | 'comment'
  | 'nl'
  | 'end';

export interface Token {
  type: TokenType;
  value: string;
  /** Offset of the first character */
  start: number;
  /** Offset just past the last character */
  end: number;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
}

const OPERATORS = [
  '**=', '//=', '>>=', '<<=', '...',
  '->', ':=', '**', '//', '<<', '>>', '<=', '>=', '==', '!=',
  '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '@=',
  '+', '-', '*', '/', '%', '@', '&', '|', '^', '~', '<', '>',
  '(', ')', '[', ']', '{', '}', ',', ':', ';', '.', '=',
];

const CLOSERS: Record<string, string> = { ')': '(', ']': '[', '}': '{' };

const STRING_PREFIXES = new Set(['r', 'u', 'b', 'f', 'br', 'rb', 'fr', 'rf']);

const NUMBER_PATTERN =
  /0[xX][0-9a-fA-F_]+|0[oO][0-7_]+|0[bB][01_]+|(?:\d[\d_]*(?:\.[\d_]*)?|\.\d[\d_]*)(?:[eE][+-]?\d[\d_]*)?[jJ]?/y;

const IDENT_START = /[\p{L}\p{Nl}_]/u;
const IDENT_PART = /[\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}_]/u;

interface OpenBracket {
  char: string;
  offset: number;
}

export interface TokenizeResult {
  tokens: Token[];
  /** Whitespace added by the first indented block, used for new inline bodies */
  indentUnit: string;
  lines: LineIndex;
}

export class Tokenizer {
  private readonly lines: LineIndex;
  private readonly tokens: Token[] = [];
  private readonly indents: Array<{ width: number; text: string }> = [{ width: 0, text: '' }];
  private readonly brackets: OpenBracket[] = [];
  private indentUnit: string | undefined;
  private pos = 0;

  constructor(private readonly source: string) {
    this.lines = new LineIndex(source);
  }

  tokenize(): TokenizeResult {
    const src = this.source;
    let atLineStart = true;

    // Byte order mark; offsets still count it
    if (src.charCodeAt(0) === 0xfeff) {
      this.pos = 1;
    }

    while (this.pos < src.length) {
      if (atLineStart && this.brackets.length === 0) {
        const logicalLine = this.readIndentation();
        if (!logicalLine) continue;
        atLineStart = false;
        continue;
      }

      const ch = src[this.pos] ?? '';

      if (ch === ' ' || ch === '\t' || ch === '\f') {
        this.pos++;
        continue;
      }

      if (isLineBreak(ch)) {
        const width = this.lineBreakWidth(this.pos);
        if (this.brackets.length > 0) {
          this.push('nl', this.pos, this.pos + width);
        } else {
          this.push('newline', this.pos, this.pos + width);
          atLineStart = true;
        }
        this.pos += width;
        continue;
      }

      if (ch === '#') {
        this.readComment();
        continue;
      }

      if (ch === '\\') {
        const next = src[this.pos + 1];
        if (isLineBreak(next)) {
          this.pos += 1 + this.lineBreakWidth(this.pos + 1);
          if (this.pos >= src.length) {
            this.fail('unexpected EOF after line continuation character', this.pos - 1);
          }
          continue;
        }
        this.fail('unexpected character after line continuation character', this.pos);
      }

      if (this.tryReadString()) continue;

      if (IDENT_START.test(ch)) {
        this.readName();
        continue;
      }

      if (/\d/.test(ch) || (ch === '.' && /\d/.test(src[this.pos + 1] ?? ''))) {
        this.readNumber();
        continue;
      }

      if (this.tryReadOperator()) continue;

      this.fail(`invalid character '${ch}'`, this.pos);
    }

    this.finish(atLineStart);

    return {
      tokens: this.tokens,
      indentUnit: this.indentUnit ?? '    ',
      lines: this.lines,
    };
  }

  /**
   * Consume leading whitespace of a physical line. Returns false for
   * blank and comment-only lines, which never affect indentation.
   */
  private readIndentation(): boolean {
    const src = this.source;
    let width = 0;
    let p = this.pos;

    while (p < src.length) {
      const c = src[p];
      if (c === ' ') {
        width++;
      } else if (c === '\t') {
        width = (Math.floor(width / 8) + 1) * 8;
      } else if (c === '\f') {
        width = 0;
      } else {
        break;
      }
      p++;
    }

    const text = src.slice(this.pos, p);
    this.pos = p;

    if (p >= src.length) return false;

    const c = src[p];
    if (isLineBreak(c)) {
      const w = this.lineBreakWidth(p);
      this.push('nl', p, p + w);
      this.pos = p + w;
      return false;
    }
    if (c === '#') {
      this.readComment();
      if (this.pos < src.length && isLineBreak(src[this.pos])) {
        const w = this.lineBreakWidth(this.pos);
        this.push('nl', this.pos, this.pos + w);
        this.pos += w;
      }
      return false;
    }

    const current = this.indents[this.indents.length - 1] ?? { width: 0, text: '' };
    if (width > current.width) {
      if (this.indentUnit === undefined && text.startsWith(current.text)) {
        this.indentUnit = text.slice(current.text.length);
      }
      this.indents.push({ width, text });
      this.push('indent', p - text.length, p, text);
    } else if (width < current.width) {
      while ((this.indents[this.indents.length - 1]?.width ?? 0) > width) {
        this.indents.pop();
        this.push('dedent', p, p, '');
      }
      if ((this.indents[this.indents.length - 1]?.width ?? 0) !== width) {
        this.fail('unindent does not match any outer indentation level', p);
      }
    }
    return true;
  }

  private readComment(): void {
    const src = this.source;
    const start = this.pos;
    while (this.pos < src.length && !isLineBreak(src[this.pos])) {
      this.pos++;
    }
    this.push('comment', start, this.pos);
  }

  private readName(): void {
    const src = this.source;
    const start = this.pos;
    this.pos++;
    while (this.pos < src.length && IDENT_PART.test(src[this.pos] ?? '')) {
      this.pos++;
    }
    this.push('name', start, this.pos);
  }

  private readNumber(): void {
    NUMBER_PATTERN.lastIndex = this.pos;
    const match = NUMBER_PATTERN.exec(this.source);
    const length = match?.[0].length ?? 0;
    if (length === 0) {
      this.fail('invalid decimal literal', this.pos);
    }
    const start = this.pos;
    this.pos += length;
    if (IDENT_START.test(this.source[this.pos] ?? '')) {
      this.fail('invalid decimal literal', start);
    }
    this.push('number', start, this.pos);
  }

  private tryReadOperator(): boolean {
    const src = this.source;
    for (const op of OPERATORS) {
      if (!src.startsWith(op, this.pos)) continue;

      const start = this.pos;
      if (op === '(' || op === '[' || op === '{') {
        this.brackets.push({ char: op, offset: start });
      } else if (op === ')' || op === ']' || op === '}') {
        const open = this.brackets.pop();
        if (!open) {
          this.fail(`unmatched '${op}'`, start);
        }
        if (open.char !== CLOSERS[op]) {
          this.fail(
            `closing parenthesis '${op}' does not match opening parenthesis '${open.char}'`,
            start
          );
        }
      }
      this.pos += op.length;
      this.push('op', start, this.pos);
      return true;
    }
    return false;
  }

  /**
   * Read a string literal (with optional prefix) if one starts here.
   */
  private tryReadString(): boolean {
    const src = this.source;
    let p = this.pos;
    while (p < src.length && p - this.pos < 2 && /[a-zA-Z]/.test(src[p] ?? '')) {
      p++;
    }
    const quote = src[p];
    if (quote !== '"' && quote !== "'") return false;

    const prefix = src.slice(this.pos, p).toLowerCase();
    if (prefix !== '' && !STRING_PREFIXES.has(prefix)) return false;

    const start = this.pos;
    this.pos = this.scanStringBody(p, prefix.includes('f'));
    this.push('string', start, this.pos);
    return true;
  }

  /**
   * Scan from an opening quote and return the offset past the closing one.
   */
  private scanStringBody(quoteOffset: number, formatted: boolean): number {
    const src = this.source;
    const quote = src[quoteOffset] ?? '"';
    const triple = src.startsWith(quote.repeat(3), quoteOffset);
    let i = quoteOffset + (triple ? 3 : 1);
    // Open replacement fields, innermost last
    const fields: Array<{ spec: boolean; nesting: number }> = [];

    while (true) {
      if (i >= src.length) {
        this.fail(
          triple ? 'unterminated triple-quoted string literal' : 'unterminated string literal',
          quoteOffset
        );
      }
      const c = src[i] ?? '';

      if (c === '\\') {
        i += 1 + (isLineBreak(src[i + 1]) ? this.lineBreakWidth(i + 1) : 1);
        continue;
      }

      if (!triple && isLineBreak(c)) {
        this.fail('unterminated string literal', quoteOffset);
      }

      const field = fields[fields.length - 1];
      if (formatted && field === undefined) {
        if ((c === '{' || c === '}') && src[i + 1] === c) {
          i += 2;
          continue;
        }
        if (c === '{') {
          fields.push({ spec: false, nesting: 0 });
          i++;
          continue;
        }
      } else if (formatted && field !== undefined && !field.spec) {
        if (c === '"' || c === "'") {
          // Nested literal inside a replacement field
          i = this.scanStringBody(i, false);
          continue;
        }
        if (c === '(' || c === '[' || c === '{') {
          field.nesting++;
        } else if (field.nesting > 0 && (c === ')' || c === ']' || c === '}')) {
          field.nesting--;
        } else if (c === '}') {
          fields.pop();
        } else if (c === ':' && field.nesting === 0) {
          field.spec = true;
        }
        i++;
        continue;
      } else if (formatted && field !== undefined) {
        // Format spec: quotes are plain text, braces open or close fields
        if (c === '{') {
          fields.push({ spec: false, nesting: 0 });
          i++;
          continue;
        }
        if (c === '}') {
          fields.pop();
          i++;
          continue;
        }
        if (c !== quote) {
          i++;
          continue;
        }
      }

      if (triple) {
        if (src.startsWith(quote.repeat(3), i)) return i + 3;
      } else {
        if (c === quote) return i + 1;
      }
      i++;
    }
  }

  private finish(atLineStart: boolean): void {
    const open = this.brackets[this.brackets.length - 1];
    if (open) {
      this.fail(`'${open.char}' was never closed`, open.offset);
    }

    const end = this.source.length;
    if (!atLineStart) {
      this.push('newline', end, end, '');
    }
    while (this.indents.length > 1) {
      this.indents.pop();
      this.push('dedent', end, end, '');
    }
    this.push('end', end, end, '');
  }

  private lineBreakWidth(offset: number): number {
    return this.source[offset] === '\r' && this.source[offset + 1] === '\n' ? 2 : 1;
  }

  private push(type: TokenType, start: number, end: number, value?: string): void {
    this.tokens.push({
      type,
      value: value ?? this.source.slice(start, end),
      start,
      end,
      line: this.lines.lineAt(start),
      column: this.lines.columnAt(start),
    });
  }

  private fail(diagnostic: string, offset: number): never {
    throw new ParseError(diagnostic, this.lines.lineAt(offset), this.lines.columnAt(offset));
  }
}

export function tokenize(source: string): TokenizeResult {
  return new Tokenizer(source).tokenize();
}
