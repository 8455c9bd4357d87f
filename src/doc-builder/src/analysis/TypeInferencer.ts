/**
 * TypeInferencer - Heuristic types for unannotated parameters and returns.
 *
 * Parameter usage is reduced to a finite set of evidence tags. Each tag
 * implies one type in a small lattice; the result is the implied type
 * that is a subtype of every other implied type. Anything else is the
 * explicit `unknown` marker, which callers surface as a warning.
 */

import {
  CodeElement,
  EvidenceTag,
  InferenceAmbiguity,
  InferredType,
  Parameter,
  ReturnInfo,
} from '../types';
import {
  indexOfTopLevel,
  isName,
  isOp,
  isParenthesized,
  isTupleExpression,
  matchingClose,
} from '../core/expressions';
import { BlockStatement, collectTokens, walkStatements } from '../core/SyntaxTree';
import { Token, tokenize } from '../core/Tokenizer';

// ============================================================================
// TYPE LATTICE
// ============================================================================

type LatticeType =
  | 'object'
  | 'float'
  | 'Callable'
  | 'Iterable'
  | 'Sequence'
  | 'Mapping'
  | 'set'
  | 'str'
  | 'list'
  | 'dict';

const PARENT: Record<LatticeType, LatticeType | null> = {
  object: null,
  float: 'object',
  Callable: 'object',
  Iterable: 'object',
  Sequence: 'Iterable',
  Mapping: 'Iterable',
  set: 'Iterable',
  str: 'Sequence',
  list: 'Sequence',
  dict: 'Mapping',
};

const TAG_TYPES: Record<EvidenceTag, LatticeType> = {
  arithmetic: 'float',
  stringConcat: 'str',
  stringMethod: 'str',
  indexed: 'Sequence',
  keyAccess: 'Mapping',
  mappingMethod: 'Mapping',
  iterated: 'Iterable',
  membership: 'Iterable',
  sized: 'Iterable',
  attributeAccess: 'object',
  called: 'Callable',
  listMethod: 'list',
  setMethod: 'set',
};

/** Canonical tag order, so evidence lists never depend on visit order */
const TAG_ORDER: readonly EvidenceTag[] = [
  'arithmetic',
  'stringConcat',
  'stringMethod',
  'indexed',
  'keyAccess',
  'mappingMethod',
  'iterated',
  'membership',
  'sized',
  'attributeAccess',
  'called',
  'listMethod',
  'setMethod',
];

function isSubtype(type: LatticeType, ancestor: LatticeType): boolean {
  let current: LatticeType | null = type;
  while (current) {
    if (current === ancestor) return true;
    current = PARENT[current];
  }
  return false;
}

/**
 * Most specific type consistent with every tag, or the unknown marker.
 */
export function resolveEvidence(tags: Iterable<EvidenceTag>): InferredType {
  const seen = new Set(tags);
  const evidence = TAG_ORDER.filter((tag) => seen.has(tag));
  if (evidence.length === 0) {
    return { kind: 'unknown', reason: 'no-evidence', evidence };
  }

  const implied: LatticeType[] = [];
  for (const tag of evidence) {
    const type = TAG_TYPES[tag];
    if (!implied.includes(type)) implied.push(type);
  }

  const best = implied.find((candidate) => implied.every((other) => isSubtype(candidate, other)));
  if (!best) {
    return { kind: 'unknown', reason: 'conflicting-evidence', evidence };
  }
  return { kind: 'known', name: best, evidence };
}

// ============================================================================
// USAGE EVIDENCE
// ============================================================================

const STRING_METHODS = new Set([
  'lower', 'upper', 'strip', 'lstrip', 'rstrip', 'split', 'rsplit', 'splitlines', 'startswith',
  'endswith', 'replace', 'format', 'encode', 'capitalize', 'title', 'casefold', 'zfill',
  'isdigit', 'isalpha', 'isalnum', 'isspace', 'isupper', 'islower', 'partition', 'rpartition',
  'center', 'ljust', 'rjust', 'expandtabs', 'removeprefix', 'removesuffix',
]);
const LIST_METHODS = new Set(['append', 'extend', 'insert', 'sort', 'reverse']);
const SET_METHODS = new Set([
  'add', 'discard', 'union', 'intersection', 'difference', 'symmetric_difference',
  'issubset', 'issuperset', 'isdisjoint',
]);
const MAPPING_METHODS = new Set(['get', 'keys', 'values', 'items', 'setdefault']);

const ARITHMETIC_OPS = new Set([
  '+', '-', '*', '/', '//', '%', '**', '+=', '-=', '*=', '/=', '//=', '%=', '**=',
]);

/** Builtins whose sole argument must be iterable */
const ITERATING_BUILTINS = new Set([
  'sorted', 'sum', 'list', 'tuple', 'set', 'frozenset', 'enumerate', 'reversed', 'iter',
  'any', 'all', 'min', 'max', 'zip',
]);

/** Expression boundaries after which a '*' is unpacking, not multiplication */
const UNPACK_CONTEXT = new Set(['(', '[', '{', ',', '=']);

/**
 * Evidence tags for every non-shadowed use of `name` in the body.
 */
export function collectEvidence(body: BlockStatement, name: string): Set<EvidenceTag> {
  const tokens = collectTokens(body, { skipNestedScopes: true });
  const tags = new Set<EvidenceTag>();

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!isName(token, name)) continue;
    const prev = tokens[i - 1];
    const next = tokens[i + 1];

    // `obj.name` and `f(name=...)` are not uses of the parameter
    if (isOp(prev, '.')) continue;
    if (isOp(next, '=') && (isOp(prev, '(') || isOp(prev, ','))) continue;

    addFollowingEvidence(tokens, i, tags);
    addPrecedingEvidence(tokens, i, tags);
  }
  return tags;
}

function addFollowingEvidence(tokens: Token[], i: number, tags: Set<EvidenceTag>): void {
  const next = tokens[i + 1];
  if (!next || next.type !== 'op') return;

  if (next.value === '[') {
    const close = matchingClose(tokens, i + 1);
    const inside = tokens.slice(i + 2, close < 0 ? i + 2 : close);
    const only = inside[0];
    tags.add(inside.length === 1 && only?.type === 'string' ? 'keyAccess' : 'indexed');
    return;
  }

  if (next.value === '.') {
    const member = tokens[i + 2];
    if (!member || member.type !== 'name') return;
    if (STRING_METHODS.has(member.value)) tags.add('stringMethod');
    else if (LIST_METHODS.has(member.value)) tags.add('listMethod');
    else if (SET_METHODS.has(member.value)) tags.add('setMethod');
    else if (MAPPING_METHODS.has(member.value)) tags.add('mappingMethod');
    else tags.add('attributeAccess');
    return;
  }

  if (next.value === '(') {
    tags.add('called');
    return;
  }

  if (ARITHMETIC_OPS.has(next.value)) {
    const operand = tokens[i + 2];
    tags.add(next.value.startsWith('+') && operand?.type === 'string' ? 'stringConcat' : 'arithmetic');
  }
}

function addPrecedingEvidence(tokens: Token[], i: number, tags: Set<EvidenceTag>): void {
  const prev = tokens[i - 1];
  const before = tokens[i - 2];
  if (!prev) return;

  if (prev.type === 'op') {
    if (prev.value === '*' && (!before || (before.type === 'op' && UNPACK_CONTEXT.has(before.value)))) {
      tags.add('iterated');
      return;
    }
    if (prev.value === '(' && before?.type === 'name' && isOp(tokens[i + 1], ')')) {
      if (before.value === 'len') tags.add('sized');
      else if (ITERATING_BUILTINS.has(before.value)) tags.add('iterated');
      return;
    }
    if (ARITHMETIC_OPS.has(prev.value)) {
      if (prev.value === '**' && (!before || before.type === 'op')) return;
      const operandIsString = before?.type === 'string';
      if (prev.value.startsWith('+') && operandIsString) {
        tags.add('stringConcat');
      } else if (before && (before.type !== 'op' || /^[)\]}]$/.test(before.value))) {
        tags.add('arithmetic');
      } else if (prev.value === '-') {
        // unary minus
        tags.add('arithmetic');
      }
    }
    return;
  }

  if (isName(prev, 'in')) {
    if (isName(before, 'not')) {
      tags.add('membership');
      return;
    }
    tags.add(isLoopTarget(tokens, i - 1) ? 'iterated' : 'membership');
  }
}

/**
 * Whether the `in` at `inIndex` belongs to a `for ... in` clause: walk
 * back over the loop target until reaching `for`.
 */
function isLoopTarget(tokens: Token[], inIndex: number): boolean {
  for (let j = inIndex - 1; j >= 0; j--) {
    const token = tokens[j];
    if (!token) return false;
    if (isName(token, 'for')) return true;
    if (token.type === 'name' && !RESERVED.has(token.value)) continue;
    if (token.type === 'op' && ['(', ')', '[', ']', ',', '*'].includes(token.value)) continue;
    return false;
  }
  return false;
}

const RESERVED = new Set([
  'for', 'in', 'if', 'else', 'and', 'or', 'not', 'is', 'return', 'yield', 'lambda', 'while',
  'async', 'await',
]);

// ============================================================================
// EXPRESSION CLASSIFICATION
// ============================================================================

const BUILTIN_RESULTS: Record<string, string> = {
  len: 'int',
  int: 'int',
  round: 'int',
  ord: 'int',
  hash: 'int',
  float: 'float',
  str: 'str',
  repr: 'str',
  chr: 'str',
  format: 'str',
  bool: 'bool',
  isinstance: 'bool',
  issubclass: 'bool',
  hasattr: 'bool',
  callable: 'bool',
  any: 'bool',
  all: 'bool',
  list: 'list',
  sorted: 'list',
  dict: 'dict',
  set: 'set',
  frozenset: 'frozenset',
  tuple: 'tuple',
  bytes: 'bytes',
};

const COMPARISON_OPS = new Set(['==', '!=', '<', '>', '<=', '>=']);

/**
 * Static type of an expression, or undefined when it cannot be told
 * from the tokens alone. Parameter references resolve through `scope`.
 */
export function classifyExpression(
  tokens: readonly Token[],
  scope: ReadonlyMap<string, string> = new Map()
): string | undefined {
  if (tokens.length === 0) return undefined;
  const first = tokens[0];
  if (!first) return undefined;

  if (isName(first, 'await')) return undefined;
  if (isName(first, 'lambda')) return 'Callable';

  if (indexOfTopLevelName(tokens, 'if') >= 0) {
    const ifIndex = indexOfTopLevelName(tokens, 'if');
    const elseIndex = indexOfTopLevelName(tokens, 'else');
    if (elseIndex < 0) return undefined;
    const left = classifyExpression(tokens.slice(0, ifIndex), scope);
    const right = classifyExpression(tokens.slice(elseIndex + 1), scope);
    return left !== undefined && left === right ? left : undefined;
  }

  if (indexOfTopLevelName(tokens, 'and') >= 0 || indexOfTopLevelName(tokens, 'or') >= 0) {
    return undefined;
  }
  if (isName(first, 'not')) return 'bool';
  if (hasTopLevelComparison(tokens)) return 'bool';

  if (isTupleExpression(tokens)) return 'tuple';

  const arithmetic = classifyArithmetic(tokens, scope);
  if (arithmetic !== null) return arithmetic;

  return classifyAtom(tokens, scope);
}

function indexOfTopLevelName(tokens: readonly Token[], value: string): number {
  let depth = 0;
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token) continue;
    if (token.type === 'op') {
      if ('([{'.includes(token.value)) depth++;
      else if (')]}'.includes(token.value)) depth--;
    } else if (depth === 0 && isName(token, value)) {
      return i;
    }
  }
  return -1;
}

function hasTopLevelComparison(tokens: readonly Token[]): boolean {
  for (const op of COMPARISON_OPS) {
    if (indexOfTopLevel(tokens, op) >= 0) return true;
  }
  return indexOfTopLevelName(tokens, 'in') >= 0 || indexOfTopLevelName(tokens, 'is') >= 0;
}

/**
 * null when the expression has no top-level binary arithmetic,
 * otherwise the result type (undefined if mixed beyond recognition).
 */
function classifyArithmetic(
  tokens: readonly Token[],
  scope: ReadonlyMap<string, string>
): string | undefined | null {
  const operands: Token[][] = [];
  const operators: string[] = [];
  let depth = 0;
  let current: Token[] = [];

  for (const token of tokens) {
    if (token.type === 'op') {
      if ('([{'.includes(token.value)) depth++;
      else if (')]}'.includes(token.value)) depth--;
      else if (depth === 0 && ARITHMETIC_OPS.has(token.value) && current.length > 0) {
        operands.push(current);
        operators.push(token.value);
        current = [];
        continue;
      }
    }
    current.push(token);
  }
  if (operators.length === 0) return null;
  operands.push(current);

  const types = operands.map((operand) => classifyAtom(operand, scope));
  // printf-style formatting
  if (types[0] === 'str' && operators.length === 1 && operators[0] === '%') return 'str';
  if (types.every((t) => t === 'str') && operators.every((op) => op === '+')) return 'str';
  if (types.some((t) => t === 'str' || t === 'list' || t === 'tuple')) {
    const known = types.find((t) => t === 'str' || t === 'list' || t === 'tuple');
    return operators.every((op) => op === '+' || op === '*') ? known : undefined;
  }
  if (types.every((t) => t === 'int') && !operators.includes('/')) return 'int';
  return 'float';
}

function classifyAtom(tokens: readonly Token[], scope: ReadonlyMap<string, string>): string | undefined {
  const first = tokens[0];
  if (!first) return undefined;

  if (tokens.length === 1) {
    if (first.type === 'number') return classifyNumber(first.value);
    if (first.type === 'string') return classifyString(first.value);
    if (first.type === 'name') {
      if (first.value === 'True' || first.value === 'False') return 'bool';
      if (first.value === 'None') return 'None';
      return scope.get(first.value);
    }
    return undefined;
  }

  if (isOp(first, '-') || isOp(first, '+')) {
    const inner = classifyAtom(tokens.slice(1), scope);
    return inner === 'int' || inner === 'float' ? inner : undefined;
  }

  // Implicitly concatenated literals
  if (tokens.every((t) => t.type === 'string')) return classifyString(first.value);

  const close = isOp(first, '(') || isOp(first, '[') || isOp(first, '{') ? matchingClose(tokens, 0) : -1;
  if (close === tokens.length - 1) {
    const inner = tokens.slice(1, -1);
    if (first.value === '[') return 'list';
    if (first.value === '{') {
      if (inner.length === 0) return 'dict';
      if (indexOfTopLevel(inner, ':') >= 0 || isOp(inner[0], '**')) return 'dict';
      return 'set';
    }
    if (isParenthesized(tokens)) {
      if (inner.length === 0) return 'tuple';
      if (indexOfTopLevelName(inner, 'for') >= 0) return 'Generator';
      return classifyExpression(inner, scope);
    }
  }

  // name(...) where the call spans the whole expression
  if (first.type === 'name' && isOp(tokens[1], '(') && matchingClose(tokens, 1) === tokens.length - 1) {
    return BUILTIN_RESULTS[first.value];
  }

  // 'sep'.join(...) and other methods on a string literal
  if (first.type === 'string' && isOp(tokens[1], '.') && tokens[2]?.type === 'name') {
    const method = tokens[2].value;
    if (method === 'join' || method === 'format' || STRING_METHODS.has(method)) {
      return method.startsWith('is') || method === 'startswith' || method === 'endswith' ? 'bool' : 'str';
    }
  }
  return undefined;
}

function classifyNumber(literal: string): string {
  if (/[jJ]$/.test(literal)) return 'complex';
  if (/^0[xXoObB]/.test(literal)) return 'int';
  return /[.eE]/.test(literal) ? 'float' : 'int';
}

function classifyString(literal: string): string {
  const prefix = literal.slice(0, literal.search(/["']/)).toLowerCase();
  return prefix.includes('b') ? 'bytes' : 'str';
}

/**
 * Merge the types of several return sites.
 * `{T, None}` is Optional[T] and `{int, float}` widens to float.
 */
export function mergeTypes(types: readonly string[]): InferredType {
  const unique = [...new Set(types)];
  const hasNone = unique.includes('None');
  let values = unique.filter((t) => t !== 'None');

  if (values.length === 2 && values.includes('int') && values.includes('float')) {
    values = ['float'];
  }

  if (values.length === 0) {
    return hasNone
      ? { kind: 'known', name: 'None', evidence: [] }
      : { kind: 'unknown', reason: 'no-evidence', evidence: [] };
  }
  if (values.length > 1) {
    return { kind: 'unknown', reason: 'conflicting-evidence', evidence: [] };
  }
  const [single] = values;
  if (single === undefined) {
    return { kind: 'unknown', reason: 'no-evidence', evidence: [] };
  }
  return { kind: 'known', name: hasNone ? `Optional[${single}]` : single, evidence: [] };
}

// ============================================================================
// INFERENCER
// ============================================================================

export class TypeInferencer {
  /**
   * A copy of the element with inferred parameter and return types and
   * the ambiguities found along the way. The input is left untouched.
   */
  infer(element: CodeElement): CodeElement {
    if (element.kind === 'class') return element;

    const ambiguities: InferenceAmbiguity[] = [];
    const parameters = element.parameters.map((parameter) => {
      const inferred = this.inferParameter(element.body, parameter);
      if (!inferred) return { ...parameter };
      if (inferred.kind === 'unknown') {
        ambiguities.push({
          target: 'parameter',
          name: parameter.name,
          reason: inferred.reason,
          evidence: inferred.evidence,
        });
      }
      return { ...parameter, inferredType: inferred };
    });

    let returns: ReturnInfo | undefined = element.returns;
    if (returns && returns.declaredType === undefined) {
      const inferred = this.inferReturn(element, parameters);
      returns = { ...returns, inferredType: inferred };
      if (inferred.kind === 'unknown') {
        ambiguities.push({
          target: 'return',
          name: 'return',
          reason: inferred.reason,
          evidence: inferred.evidence,
        });
      }
    }

    return { ...element, parameters, returns, ambiguities };
  }

  /**
   * undefined when no inference applies (annotated or variadic).
   */
  inferParameter(body: BlockStatement, parameter: Parameter): InferredType | undefined {
    if (parameter.declaredType !== undefined) return undefined;
    if (parameter.kind === 'variadic' || parameter.kind === 'keywordVariadic') return undefined;

    const resolved = resolveEvidence(collectEvidence(body, parameter.name));
    const defaultType = parameter.defaultValue !== undefined ? classifyLiteral(parameter.defaultValue) : undefined;

    if (resolved.kind === 'known') {
      if (defaultType === 'None') {
        return { ...resolved, name: `Optional[${resolved.name}]` };
      }
      return resolved;
    }
    if (resolved.reason === 'no-evidence' && defaultType !== undefined && defaultType !== 'None') {
      return { kind: 'known', name: defaultType, evidence: [] };
    }
    return resolved;
  }

  inferReturn(element: CodeElement, parameters: readonly Parameter[]): InferredType {
    const scope = new Map<string, string>();
    for (const p of parameters) {
      const type = p.declaredType ?? (p.inferredType?.kind === 'known' ? p.inferredType.name : undefined);
      if (type !== undefined) scope.set(p.name, type);
    }

    const isGenerator = element.returns?.isGenerator === true;
    const types: string[] = [];
    let unclassified = false;

    walkStatements(element.body, (statement) => {
      if (statement.type === 'compound') {
        return statement.keyword !== 'def' && statement.keyword !== 'class';
      }
      const keyword = isGenerator ? 'yield' : 'return';
      const at = statement.tokens.findIndex((t) => isName(t, keyword));
      if (at < 0 || (!isGenerator && at !== 0)) return true;

      const value = statement.tokens.slice(at + 1);
      if (isGenerator && isName(value[0], 'from')) {
        unclassified = true;
        return true;
      }
      if (value.length === 0) {
        types.push('None');
        return true;
      }
      const type = classifyExpression(value, scope);
      if (type === undefined) unclassified = true;
      else types.push(type);
      return true;
    });

    let merged: InferredType = unclassified
      ? { kind: 'unknown', reason: 'no-evidence', evidence: [] }
      : mergeTypes(types);

    if (isGenerator) {
      const wrapper = element.modifiers.includes('async') ? 'AsyncIterator' : 'Iterator';
      merged = merged.kind === 'known'
        ? { kind: 'known', name: `${wrapper}[${merged.name}]`, evidence: [] }
        : { kind: 'known', name: wrapper, evidence: [] };
    }
    return merged;
  }
}

/**
 * Type of a default value expression written as text.
 */
export function classifyLiteral(expression: string): string | undefined {
  try {
    const tokens = tokenize(expression).tokens.filter(
      (t) => t.type !== 'newline' && t.type !== 'end' && t.type !== 'nl' && t.type !== 'comment'
    );
    return classifyExpression(tokens);
  } catch {
    return undefined;
  }
}
