/**
 * SyntaxTree - indentation-aware statement parser.
 *
 * Builds a shallow statement tree over the token stream: compound
 * statements (def, class, if, for, ...) own a body block, everything
 * else stays a flat token run. Expressions are not parsed; downstream
 * analysis reads them as tokens.
 */

import { ParseError } from './errors';
import { LineIndex } from './SourceText';
import { Token, tokenize } from './Tokenizer';

export interface Decorator {
  /** Tokens after the '@' */
  tokens: Token[];
  start: number;
  end: number;
}

export interface SimpleStatement {
  type: 'simple';
  tokens: Token[];
  start: number;
  end: number;
  line: number;
}

export interface CompoundStatement {
  type: 'compound';
  keyword: string;
  /** `async def`, `async for`, `async with` */
  isAsync: boolean;
  /** First token of the statement (the keyword, or `async`) */
  keywordToken: Token;
  /** The keyword itself; differs from keywordToken after `async` */
  keywordEnd: Token;
  /** Tokens between the keyword and the closing ':' */
  header: Token[];
  colon: Token;
  body: BlockStatement;
  decorators: Decorator[];
  start: number;
  end: number;
  line: number;
}

export type Statement = SimpleStatement | CompoundStatement;

export interface BlockStatement {
  statements: Statement[];
  /** Body written on the header line after the ':' */
  inline: boolean;
  start: number;
  end: number;
}

export interface ParsedModule {
  body: BlockStatement;
  lines: LineIndex;
  indentUnit: string;
}

const COMPOUND_KEYWORDS = new Set([
  'if', 'elif', 'else', 'for', 'while', 'try', 'except', 'finally', 'with', 'def', 'class',
]);

const SOFT_KEYWORDS = new Set(['match', 'case']);

class StatementParser {
  private readonly tokens: Token[];
  private index = 0;

  constructor(allTokens: Token[]) {
    this.tokens = allTokens.filter((t) => t.type !== 'comment' && t.type !== 'nl');
  }

  parseModule(): BlockStatement {
    const statements = this.parseStatements();
    const end = this.peek();
    if (end.type === 'dedent') {
      this.fail('unindent does not match any outer indentation level', end);
    }
    return this.block(statements, false, 0);
  }

  private parseStatements(): Statement[] {
    const statements: Statement[] = [];
    while (true) {
      const token = this.peek();
      if (token.type === 'end' || token.type === 'dedent') break;
      if (token.type === 'newline') {
        this.index++;
        continue;
      }
      if (token.type === 'indent') {
        this.fail('unexpected indent', token);
      }
      statements.push(...this.parseStatement());
    }
    return statements;
  }

  private parseStatement(): Statement[] {
    const decorators = this.parseDecorators();
    const first = this.peek();

    if (this.startsCompound()) {
      return [this.parseCompound(decorators)];
    }
    if (decorators.length > 0) {
      this.fail('expected a function or class definition after decorator', first);
    }
    return this.parseSimpleLine();
  }

  private parseDecorators(): Decorator[] {
    const decorators: Decorator[] = [];
    while (this.isOp(this.peek(), '@')) {
      const at = this.next();
      const tokens: Token[] = [];
      while (this.peek().type !== 'newline' && this.peek().type !== 'end') {
        tokens.push(this.next());
      }
      if (tokens.length === 0) {
        this.fail('invalid syntax', at);
      }
      this.expectNewline();
      const last = tokens[tokens.length - 1] ?? at;
      decorators.push({ tokens, start: at.start, end: last.end });
    }
    return decorators;
  }

  private startsCompound(): boolean {
    const token = this.peek();
    if (token.type !== 'name') return false;
    if (token.value === 'async') {
      const next = this.peek(1);
      return next.type === 'name' && ['def', 'for', 'with'].includes(next.value);
    }
    if (COMPOUND_KEYWORDS.has(token.value)) return true;
    if (SOFT_KEYWORDS.has(token.value)) {
      return this.softKeywordOpensBlock();
    }
    return false;
  }

  /**
   * `match`/`case` are ordinary names unless a top-level ':' follows
   * the subject (a ':' right after the name is an annotation).
   */
  private softKeywordOpensBlock(): boolean {
    let depth = 0;
    let lambdas = 0;
    for (let i = this.index + 1; i < this.tokens.length; i++) {
      const t = this.tokens[i];
      if (!t || t.type === 'newline' || t.type === 'end') return false;
      if (t.type === 'op') {
        if ('([{'.includes(t.value)) depth++;
        else if (')]}'.includes(t.value)) depth--;
        else if (t.value === '=' && depth === 0) return false;
        else if (t.value === ':' && depth === 0) {
          if (lambdas > 0) {
            lambdas--;
            continue;
          }
          return i > this.index + 1;
        }
      } else if (t.type === 'name' && t.value === 'lambda' && depth === 0) {
        lambdas++;
      }
    }
    return false;
  }

  private parseCompound(decorators: Decorator[]): CompoundStatement {
    const keywordToken = this.next();
    const isAsync = keywordToken.value === 'async';
    const keywordEnd = isAsync ? this.next() : keywordToken;
    const keyword = keywordEnd.value;

    const header: Token[] = [];
    let depth = 0;
    let lambdas = 0;
    let colon: Token | undefined;
    while (true) {
      const token = this.peek();
      if (token.type === 'newline' || token.type === 'end') {
        this.fail(`expected ':'`, token);
      }
      this.index++;
      if (token.type === 'op') {
        if ('([{'.includes(token.value)) depth++;
        else if (')]}'.includes(token.value)) depth--;
        else if (token.value === ':' && depth === 0) {
          if (lambdas === 0) {
            colon = token;
            break;
          }
          lambdas--;
        }
      } else if (token.type === 'name' && token.value === 'lambda' && depth === 0) {
        lambdas++;
      }
      header.push(token);
    }

    if ((keyword === 'def' || keyword === 'class') && header.length === 0) {
      this.fail('invalid syntax', colon);
    }

    const body = this.parseBody(keyword, keywordToken, colon);

    return {
      type: 'compound',
      keyword,
      isAsync,
      keywordToken,
      keywordEnd,
      header,
      colon,
      body,
      decorators,
      start: keywordToken.start,
      end: body.end,
      line: keywordToken.line,
    };
  }

  private parseBody(keyword: string, keywordToken: Token, colon: Token): BlockStatement {
    const next = this.peek();

    if (next.type !== 'newline') {
      if (next.type === 'end') {
        this.fail(`expected an indented block after '${keyword}' statement on line ${keywordToken.line}`, next);
      }
      const statements = this.parseSimpleLine();
      return this.block(statements, true, colon.end);
    }

    this.index++;
    const indent = this.peek();
    if (indent.type !== 'indent') {
      this.fail(
        `expected an indented block after '${keyword}' statement on line ${keywordToken.line}`,
        indent
      );
    }
    this.index++;

    const statements = this.parseStatements();
    const closing = this.peek();
    if (closing.type === 'dedent') {
      this.index++;
    }
    return this.block(statements, false, colon.end);
  }

  /** One logical line, split on top-level ';' */
  private parseSimpleLine(): SimpleStatement[] {
    const statements: SimpleStatement[] = [];
    let current: Token[] = [];

    const flush = (): void => {
      const first = current[0];
      const last = current[current.length - 1];
      if (first && last) {
        statements.push({
          type: 'simple',
          tokens: current,
          start: first.start,
          end: last.end,
          line: first.line,
        });
      }
      current = [];
    };

    while (true) {
      const token = this.peek();
      if (token.type === 'newline' || token.type === 'end') break;
      if (token.type === 'indent' || token.type === 'dedent') {
        this.fail('invalid syntax', token);
      }
      this.index++;
      if (this.isOp(token, ';')) {
        flush();
        continue;
      }
      current.push(token);
    }
    flush();
    this.expectNewline();
    return statements;
  }

  private block(statements: Statement[], inline: boolean, fallbackOffset: number): BlockStatement {
    const first = statements[0];
    const last = statements[statements.length - 1];
    return {
      statements,
      inline,
      start: first ? first.start : fallbackOffset,
      end: last ? last.end : fallbackOffset,
    };
  }

  private expectNewline(): void {
    const token = this.peek();
    if (token.type === 'newline') {
      this.index++;
    }
  }

  private isOp(token: Token, value: string): boolean {
    return token.type === 'op' && token.value === value;
  }

  private peek(ahead = 0): Token {
    const token = this.tokens[this.index + ahead] ?? this.tokens[this.tokens.length - 1];
    if (!token) {
      throw new ParseError('empty token stream', 1, 1);
    }
    return token;
  }

  private next(): Token {
    const token = this.peek();
    this.index++;
    return token;
  }

  private fail(diagnostic: string, token: Token): never {
    throw new ParseError(diagnostic, token.line, token.column);
  }
}

/**
 * Tokenize and parse a whole module. Throws ParseError on invalid input.
 */
export function parseModule(source: string): ParsedModule {
  const { tokens, indentUnit, lines } = tokenize(source);
  const body = new StatementParser(tokens).parseModule();
  return { body, lines, indentUnit };
}

export interface CollectOptions {
  /** Leave out nested def/class bodies (and their headers) */
  skipNestedScopes?: boolean;
}

/**
 * Every token of a block in source order, including compound keywords.
 */
export function collectTokens(block: BlockStatement, options: CollectOptions = {}): Token[] {
  const out: Token[] = [];
  for (const statement of block.statements) {
    if (statement.type === 'simple') {
      out.push(...statement.tokens);
      continue;
    }
    if (options.skipNestedScopes && (statement.keyword === 'def' || statement.keyword === 'class')) {
      continue;
    }
    out.push(statement.keywordToken);
    if (statement.keywordEnd !== statement.keywordToken) out.push(statement.keywordEnd);
    out.push(...statement.header);
    out.push(...collectTokens(statement.body, options));
  }
  return out;
}

/**
 * Depth-first walk over every statement under a block.
 * Return false from the visitor to skip a compound statement's body.
 */
export function walkStatements(
  block: BlockStatement,
  visit: (statement: Statement) => boolean | void
): void {
  for (const statement of block.statements) {
    const descend = visit(statement);
    if (statement.type === 'compound' && descend !== false) {
      walkStatements(statement.body, visit);
    }
  }
}
