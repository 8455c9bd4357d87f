/**
 * ElementExtractor - Turns Python source into an ordered list of
 * documentable elements.
 *
 * Elements come out in document pre-order (a class before its methods).
 * Qualified names follow `__qualname__`. Nested def/class bodies are
 * their own elements and never contribute raises, returns or calls to
 * the enclosing element.
 */

import {
  CodeElement,
  ElementKind,
  ElementModifier,
  ExceptionInfo,
  ExistingDoc,
  HeaderInfo,
  Parameter,
  ParameterKind,
  ReturnInfo,
  SourceSpan,
} from '../types';
import { ParseError } from './errors';
import {
  compactSource,
  indexOfTopLevel,
  isName,
  isOp,
  isParenthesized,
  isTupleExpression,
  matchingClose,
  readDottedName,
  splitTopLevel,
} from './expressions';
import { LineIndex } from './SourceText';
import {
  BlockStatement,
  CompoundStatement,
  ParsedModule,
  SimpleStatement,
  parseModule,
  walkStatements,
} from './SyntaxTree';
import { Token } from './Tokenizer';

interface Scope {
  prefix: string;
  kind: 'module' | 'class' | 'function';
  className?: string;
  insideFunction: boolean;
}

export interface ExtractorOptions {
  /** Include elements whose name starts with a single underscore */
  includePrivate: boolean;
  /** Include functions and classes defined inside function bodies */
  includeNested: boolean;
  /** Lines of body kept in the digest excerpt */
  digestLines: number;
}

const DEFAULT_OPTIONS: ExtractorOptions = {
  includePrivate: true,
  includeNested: true,
  digestLines: 8,
};

const PROPERTY_DECORATORS = new Set(['property', 'cached_property', 'functools.cached_property']);

const MAX_DIGEST_CALLS = 8;

export interface ExtractionResult {
  elements: CodeElement[];
  /** Whitespace of one indentation level in this file */
  indentUnit: string;
  lines: LineIndex;
}

export class ElementExtractor {
  private options: ExtractorOptions;

  constructor(options: Partial<ExtractorOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Extract every function, method, constructor and class.
   * Throws ParseError when the text is not valid Python.
   */
  extract(source: string): CodeElement[] {
    return this.extractWithLayout(source).elements;
  }

  extractWithLayout(source: string): ExtractionResult {
    const module = parseModule(source);
    const elements: CodeElement[] = [];
    this.visitBlock(source, module, module.body, { prefix: '', kind: 'module', insideFunction: false }, elements);
    return { elements, indentUnit: module.indentUnit, lines: module.lines };
  }

  private visitBlock(
    source: string,
    module: ParsedModule,
    block: BlockStatement,
    scope: Scope,
    out: CodeElement[]
  ): void {
    for (const statement of block.statements) {
      if (statement.type !== 'compound') continue;

      if (statement.keyword === 'def' || statement.keyword === 'class') {
        const element = this.buildElement(source, module, statement, scope);
        const keep =
          (this.options.includePrivate || !isPrivateName(element.name)) &&
          (this.options.includeNested || !scope.insideFunction);
        if (keep) out.push(element);

        const childScope: Scope =
          statement.keyword === 'class'
            ? {
                prefix: `${element.qualifiedName}.`,
                kind: 'class',
                className: element.name,
                insideFunction: scope.insideFunction,
              }
            : {
                prefix: `${element.qualifiedName}.<locals>.`,
                kind: 'function',
                insideFunction: true,
              };
        this.visitBlock(source, module, statement.body, childScope, out);
        continue;
      }

      // if/for/try/with bodies share the enclosing scope
      this.visitBlock(source, module, statement.body, scope, out);
    }
  }

  private buildElement(
    source: string,
    module: ParsedModule,
    statement: CompoundStatement,
    scope: Scope
  ): CodeElement {
    const { lines } = module;
    const nameToken = statement.header[0];
    if (!nameToken || nameToken.type !== 'name') {
      throw new ParseError('invalid syntax', statement.keywordToken.line, statement.keywordToken.column);
    }
    const name = nameToken.value;
    const isClass = statement.keyword === 'class';

    const decorators = statement.decorators.map((d) => compactSource(source, d.tokens));
    const modifiers = this.modifiersFor(statement, decorators, scope);

    let kind: ElementKind;
    if (isClass) {
      kind = 'class';
    } else if (scope.kind === 'class') {
      kind = name === '__init__' ? 'constructor' : 'method';
    } else {
      kind = 'function';
    }

    let parameters: Parameter[] = [];
    let returnAnnotation: string | undefined;
    if (!isClass) {
      const signature = this.parseSignature(source, statement);
      parameters = signature.parameters;
      returnAnnotation = signature.returnAnnotation;
      if ((kind === 'method' || kind === 'constructor') && !modifiers.includes('staticmethod')) {
        parameters = dropReceiver(parameters);
      }
    }

    const raises = collectRaises(statement.body);
    const returns = isClass || kind === 'constructor'
      ? undefined
      : this.returnInfo(statement.body, returnAnnotation);

    const sourceSpan = this.span(lines, statement.start, statement.end);
    const firstDecorator = statement.decorators[0];
    const lastDecorator = statement.decorators[statement.decorators.length - 1];
    const decoratorSpan =
      firstDecorator && lastDecorator
        ? this.span(lines, firstDecorator.start, lastDecorator.end)
        : undefined;

    const existingDoc = this.findExistingDoc(source, lines, statement.body);
    const header = this.headerInfo(lines, module.indentUnit, statement);

    return {
      kind,
      name,
      qualifiedName: `${scope.prefix}${name}`,
      ownerName: kind === 'method' || kind === 'constructor' ? scope.className : undefined,
      parameters,
      returns,
      raises,
      existingDoc,
      sourceSpan,
      decoratorSpan,
      decorators,
      header,
      complexityScore: 1,
      modifiers,
      bodyDigest: this.digest(source, statement, header, existingDoc, returns),
      sourceText: source.slice(statement.start, statement.end),
      ambiguities: [],
      body: statement.body,
    };
  }

  private modifiersFor(statement: CompoundStatement, decorators: string[], scope: Scope): ElementModifier[] {
    const modifiers: ElementModifier[] = [];
    if (statement.isAsync) modifiers.push('async');
    if (decorators.length > 0) modifiers.push('decorated');

    const names = decorators.map((d) => d.split('(')[0]?.trim() ?? d);
    if (names.includes('classmethod')) modifiers.push('classmethod');
    if (names.includes('staticmethod')) modifiers.push('staticmethod');
    if (names.some((n) => PROPERTY_DECORATORS.has(n) || /\.(setter|getter|deleter)$/.test(n))) {
      modifiers.push('property');
    }
    if (scope.insideFunction) modifiers.push('nested');
    return modifiers;
  }

  /**
   * Parameters and return annotation from a def header:
   * `name [ [type params] ] ( params ) [-> annotation]`
   */
  private parseSignature(
    source: string,
    statement: CompoundStatement
  ): { parameters: Parameter[]; returnAnnotation?: string } {
    const header = statement.header;
    let openIndex = 1;
    if (isOp(header[1], '[')) {
      const typeParamsEnd = matchingClose(header, 1);
      openIndex = typeParamsEnd < 0 ? -1 : typeParamsEnd + 1;
    }
    const open = openIndex < 0 ? undefined : header[openIndex];
    const closeIndex = isOp(open, '(') ? matchingClose(header, openIndex) : -1;
    if (closeIndex < 0) {
      const at = open ?? statement.colon;
      throw new ParseError("expected '(' after function name", at.line, at.column);
    }

    const parameters = this.parseParameters(source, header.slice(openIndex + 1, closeIndex));

    let returnAnnotation: string | undefined;
    const rest = header.slice(closeIndex + 1);
    if (rest.length > 0) {
      if (!isOp(rest[0], '->') || rest.length < 2) {
        const at = rest[0] ?? statement.colon;
        throw new ParseError('invalid syntax', at.line, at.column);
      }
      returnAnnotation = compactSource(source, rest.slice(1));
    }
    return { parameters, returnAnnotation };
  }

  private parseParameters(source: string, tokens: Token[]): Parameter[] {
    const parameters: Parameter[] = [];
    let afterStar = false;

    for (const segment of splitTopLevel(tokens, ',')) {
      const first = segment[0];
      if (!first) continue;

      if (isOp(first, '/') && segment.length === 1) {
        for (const p of parameters) {
          if (p.kind === 'positional') p.kind = 'positionalOnly';
        }
        continue;
      }
      if (isOp(first, '*') && segment.length === 1) {
        afterStar = true;
        continue;
      }

      let kind: ParameterKind = afterStar ? 'keywordOnly' : 'positional';
      let body = segment;
      if (isOp(first, '*')) {
        kind = 'variadic';
        afterStar = true;
        body = segment.slice(1);
      } else if (isOp(first, '**')) {
        kind = 'keywordVariadic';
        body = segment.slice(1);
      }

      const nameToken = body[0];
      if (!nameToken || nameToken.type !== 'name') {
        const at = nameToken ?? first;
        throw new ParseError('invalid syntax', at.line, at.column);
      }

      const eq = indexOfTopLevel(body, '=');
      const annotated = eq >= 0 ? body.slice(0, eq) : body;
      const colon = indexOfTopLevel(annotated, ':');

      const parameter: Parameter = { name: nameToken.value, kind };
      if (colon >= 0) {
        parameter.declaredType = compactSource(source, annotated.slice(colon + 1));
      }
      if (eq >= 0) {
        parameter.defaultValue = compactSource(source, body.slice(eq + 1));
      }
      parameters.push(parameter);
    }
    return parameters;
  }

  private returnInfo(body: BlockStatement, declaredType: string | undefined): ReturnInfo | undefined {
    let hasValueReturn = false;
    let isMultiValue = false;
    let isGenerator = false;

    walkStatements(body, (statement) => {
      if (statement.type === 'compound') {
        if (isScopeStatement(statement)) return false;
        if (statement.header.some((t) => isName(t, 'yield'))) isGenerator = true;
        return true;
      }
      if (statement.tokens.some((t) => isName(t, 'yield'))) {
        isGenerator = true;
      }
      const value = returnValueTokens(statement);
      if (value) {
        hasValueReturn = true;
        if (isTupleExpression(value)) isMultiValue = true;
      }
      return true;
    });

    const declaresValue = declaredType !== undefined && declaredType !== 'None';
    if (!isGenerator && !hasValueReturn && !declaresValue) {
      return undefined;
    }
    return { declaredType, isGenerator, isMultiValue };
  }

  /**
   * Leading string statement of a body. Adjacent literals, optionally
   * parenthesized, count as one docstring.
   */
  private findExistingDoc(source: string, lines: LineIndex, body: BlockStatement): ExistingDoc | undefined {
    const first = body.statements[0];
    if (!first || first.type !== 'simple') return undefined;

    const visible = first.tokens.filter((t) => t.type !== 'nl' && t.type !== 'comment');
    const literals = visible.length > 2 && isParenthesized(visible) ? visible.slice(1, -1) : visible;
    if (literals.length === 0) return undefined;
    if (!literals.every((t) => t.type === 'string' && isDocstringLiteral(t.value))) return undefined;

    const start = visible[0]?.start ?? first.start;
    const end = visible[visible.length - 1]?.end ?? first.end;
    return {
      text: source.slice(start, end),
      span: this.span(lines, start, end),
    };
  }

  private headerInfo(lines: LineIndex, indentUnit: string, statement: CompoundStatement): HeaderInfo {
    const colonLine = lines.lineAt(statement.colon.start);
    const indent = lines.indentBefore(statement.keywordToken.start);
    const inlineBody = statement.body.inline;
    const bodyIndent = inlineBody
      ? indent + indentUnit
      : lines.indentBefore(statement.body.start);

    return {
      colonOffset: statement.colon.end,
      lineEndOffset: lines.lineEnd(colonLine),
      indent,
      bodyIndent,
      inlineBody,
      bodyStartOffset: statement.body.start,
    };
  }

  /**
   * Short summary of the body used to seed generation: returned
   * expressions, calls, raised kinds and the first lines of code.
   */
  private digest(
    source: string,
    statement: CompoundStatement,
    header: HeaderInfo,
    existingDoc: ExistingDoc | undefined,
    returns: ReturnInfo | undefined
  ): string {
    const returned: string[] = [];
    const calls: string[] = [];
    const raised: string[] = [];

    walkStatements(statement.body, (s) => {
      if (s.type === 'compound') {
        if (isScopeStatement(s)) return false;
        collectCalls(s.header, calls);
        return true;
      }
      const value = returnValueTokens(s);
      if (value) pushUnique(returned, compactSource(source, value));
      if (isName(s.tokens[0], 'raise')) {
        const raisedName = readDottedName(s.tokens, 1);
        if (raisedName) pushUnique(raised, raisedName.name);
      }
      collectCalls(s.tokens, calls);
      return true;
    });

    const parts: string[] = [];
    if (returned.length > 0) parts.push(`returns: ${returned.join(' | ')}`);
    if (returns?.isGenerator) parts.push('yields: true');
    if (calls.length > 0) parts.push(`calls: ${calls.slice(0, MAX_DIGEST_CALLS).join(', ')}`);
    if (raised.length > 0) parts.push(`raises: ${raised.join(', ')}`);

    const excerpt = this.excerpt(source, statement, header, existingDoc);
    if (excerpt) parts.push('---', excerpt);
    return parts.join('\n');
  }

  private excerpt(
    source: string,
    statement: CompoundStatement,
    header: HeaderInfo,
    existingDoc: ExistingDoc | undefined
  ): string {
    const statements = statement.body.statements;
    const start = existingDoc ? statements[1]?.start : statements[0]?.start;
    if (start === undefined) return '';

    return source
      .slice(start, statement.body.end)
      .split(/\r\n|\r|\n/)
      .map((line) => (line.startsWith(header.bodyIndent) ? line.slice(header.bodyIndent.length) : line.trimStart()))
      .filter((line) => line.trim() !== '')
      .slice(0, this.options.digestLines)
      .join('\n');
  }

  private span(lines: LineIndex, startOffset: number, endOffset: number): SourceSpan {
    return {
      startOffset,
      endOffset,
      startLine: lines.lineAt(startOffset),
      endLine: lines.lineAt(Math.max(startOffset, endOffset - 1)),
    };
  }
}

function isPrivateName(name: string): boolean {
  return name.startsWith('_') && !(name.startsWith('__') && name.endsWith('__'));
}

function isScopeStatement(statement: CompoundStatement): boolean {
  return statement.keyword === 'def' || statement.keyword === 'class';
}

function dropReceiver(parameters: Parameter[]): Parameter[] {
  const first = parameters[0];
  if (first && (first.kind === 'positional' || first.kind === 'positionalOnly')) {
    return parameters.slice(1);
  }
  return parameters;
}

/** Plain (non-bytes, non-f) string literal */
function isDocstringLiteral(literal: string): boolean {
  const prefix = literal.slice(0, literal.search(/["']/)).toLowerCase();
  return !prefix.includes('b') && !prefix.includes('f');
}

/** Expression of `return <expr>`, unless it is absent or a bare None */
export function returnValueTokens(statement: SimpleStatement): Token[] | undefined {
  if (!isName(statement.tokens[0], 'return')) return undefined;
  const value = statement.tokens.slice(1);
  if (value.length === 0) return undefined;
  if (value.length === 1 && isName(value[0], 'None')) return undefined;
  return value;
}

/**
 * Exception kinds from explicit raise sites, first appearance first.
 * Bare re-raises and lowercase names (`raise err`) are skipped.
 */
export function collectRaises(body: BlockStatement): ExceptionInfo[] {
  const kinds: string[] = [];
  walkStatements(body, (statement) => {
    if (statement.type === 'compound') return !isScopeStatement(statement);
    if (!isName(statement.tokens[0], 'raise')) return true;
    const raised = readDottedName(statement.tokens, 1);
    if (!raised) return true;
    const last = raised.name.split('.').pop() ?? '';
    if (/^[A-Z]/.test(last)) pushUnique(kinds, raised.name);
    return true;
  });
  return kinds.map((kind) => ({ kind }));
}

function collectCalls(tokens: readonly Token[], out: string[]): void {
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token || token.type !== 'name' || isOp(tokens[i - 1], '.')) continue;
    const dotted = readDottedName(tokens, i);
    if (dotted && isOp(tokens[dotted.end], '(') && !KEYWORDS.has(token.value)) {
      pushUnique(out, dotted.name);
    }
  }
}

const KEYWORDS = new Set([
  'if', 'elif', 'while', 'for', 'in', 'not', 'and', 'or', 'return', 'yield', 'await',
  'lambda', 'assert', 'del', 'raise', 'with', 'is', 'else', 'from', 'import',
]);

function pushUnique(list: string[], value: string): void {
  if (!list.includes(value)) list.push(value);
}
