/**
 * Tests for TypeInferencer and ComplexityCalculator.
 */

import { ElementExtractor } from '../core/ElementExtractor';
import { tokenize } from '../core/Tokenizer';
import {
  ComplexityCalculator,
  TypeInferencer,
  augmentElements,
  classifyExpression,
  classifyLiteral,
  collectEvidence,
  mergeTypes,
  resolveEvidence,
} from '../analysis';
import { CodeElement } from '../types';

const extractor = new ElementExtractor();
const inferencer = new TypeInferencer();

function inferFirst(source: string): CodeElement {
  const [element] = extractor.extract(source);
  if (!element) {
    throw new Error('no element extracted');
  }
  return inferencer.infer(element);
}

function paramType(element: CodeElement, name: string): string | undefined {
  const inferred = element.parameters.find((p) => p.name === name)?.inferredType;
  return inferred?.kind === 'known' ? inferred.name : inferred?.kind;
}

function expressionTokens(expression: string) {
  return tokenize(expression).tokens.filter((t) => t.type !== 'newline' && t.type !== 'end');
}

describe('resolveEvidence', () => {
  it('returns unknown without evidence', () => {
    expect(resolveEvidence([])).toEqual({ kind: 'unknown', reason: 'no-evidence', evidence: [] });
  });

  it('picks the most specific compatible type', () => {
    expect(resolveEvidence(['indexed', 'iterated', 'stringMethod'])).toEqual({
      kind: 'known',
      name: 'str',
      evidence: ['stringMethod', 'indexed', 'iterated'],
    });
    expect(resolveEvidence(['sized', 'listMethod'])).toEqual({
      kind: 'known',
      name: 'list',
      evidence: ['sized', 'listMethod'],
    });
  });

  it('reports incompatible evidence as a conflict', () => {
    expect(resolveEvidence(['arithmetic', 'keyAccess'])).toEqual({
      kind: 'unknown',
      reason: 'conflicting-evidence',
      evidence: ['arithmetic', 'keyAccess'],
    });
  });
});

describe('TypeInferencer', () => {
  it('infers numbers from arithmetic on both operands', () => {
    const element = inferFirst('def add(a, b):\n    return a + b\n');

    expect(paramType(element, 'a')).toBe('float');
    expect(paramType(element, 'b')).toBe('float');
    expect(element.returns?.inferredType).toEqual({ kind: 'known', name: 'float', evidence: [] });
    expect(element.ambiguities).toEqual([]);
  });

  it('infers strings from concatenation with a literal', () => {
    const element = inferFirst('def greet(name):\n    return "hi " + name\n');

    expect(paramType(element, 'name')).toBe('str');
    expect(element.returns?.inferredType).toEqual({ kind: 'known', name: 'str', evidence: [] });
  });

  it('reads container usage', () => {
    const source = [
      'def collect(items, lookup, tags, callback):',
      '    for item in items:',
      '        tags.add(item)',
      '    callback(lookup["key"])',
      '    return len(items)',
      '',
    ].join('\n');
    const element = inferFirst(source);

    expect(paramType(element, 'items')).toBe('Iterable');
    expect(paramType(element, 'lookup')).toBe('Mapping');
    expect(paramType(element, 'tags')).toBe('set');
    expect(paramType(element, 'callback')).toBe('Callable');
    expect(element.returns?.inferredType).toEqual({ kind: 'known', name: 'int', evidence: [] });
  });

  it('treats the target of an async for as iterated', () => {
    const [element] = extractor.extract('async def drain(xs):\n    async for x in xs:\n        print(x)\n');
    if (!element) throw new Error('no element extracted');

    expect([...collectEvidence(element.body, 'xs')]).toEqual(['iterated']);
  });

  it('marks unused parameters as unknown and records the ambiguity', () => {
    const element = inferFirst('def check(value):\n    if value is None:\n        raise ValueError("missing")\n    return value\n');

    expect(paramType(element, 'value')).toBe('unknown');
    expect(element.ambiguities).toEqual([
      { target: 'parameter', name: 'value', reason: 'no-evidence', evidence: [] },
      { target: 'return', name: 'return', reason: 'no-evidence', evidence: [] },
    ]);
  });

  it('falls back to the type of the default value', () => {
    const element = inferFirst('def pad(text, width=8, fill=None):\n    return text.ljust(width)\n');

    expect(paramType(element, 'text')).toBe('str');
    expect(paramType(element, 'width')).toBe('int');
    expect(paramType(element, 'fill')).toBe('unknown');
  });

  it('wraps a type in Optional when the default is None', () => {
    const element = inferFirst('def head(items=None):\n    return items[0]\n');
    expect(paramType(element, 'items')).toBe('Optional[Sequence]');
  });

  it('leaves annotated and variadic parameters alone', () => {
    const element = inferFirst('def f(x: int, *args, **kwargs) -> int:\n    return x + len(args)\n');

    expect(element.parameters.map((p) => p.inferredType)).toEqual([undefined, undefined, undefined]);
    expect(element.returns?.inferredType).toBeUndefined();
    expect(element.ambiguities).toEqual([]);
  });

  it('merges return sites', () => {
    const element = inferFirst('def find(flag):\n    if flag:\n        return 1\n    return None\n');
    expect(element.returns?.inferredType).toEqual({ kind: 'known', name: 'Optional[int]', evidence: [] });
  });

  it('reports conflicting return sites', () => {
    const element = inferFirst('def mixed(flag):\n    if flag:\n        return "a"\n    return 1\n');
    expect(element.returns?.inferredType).toEqual({ kind: 'unknown', reason: 'conflicting-evidence', evidence: [] });
  });

  it('wraps generator element types', () => {
    const element = inferFirst('def count():\n    yield 1\n    yield 2\n');
    expect(element.returns?.inferredType).toEqual({ kind: 'known', name: 'Iterator[int]', evidence: [] });
  });

  it('does not infer anything for classes', () => {
    const [element] = extractor.extract('class A:\n    pass\n');
    if (!element) throw new Error('no element extracted');
    expect(inferencer.infer(element)).toBe(element);
  });
});

describe('classifyExpression', () => {
  it.each([
    ['1', 'int'],
    ['1.5', 'float'],
    ['"a"', 'str'],
    ['b"a"', 'bytes'],
    ['[1, 2]', 'list'],
    ['{"a": 1}', 'dict'],
    ['{1, 2}', 'set'],
    ['()', 'tuple'],
    ['not x', 'bool'],
    ['a == b', 'bool'],
    ['1 + 2', 'int'],
    ['1 / 2', 'float'],
    ['"%s" % name', 'str'],
    ['", ".join(parts)', 'str'],
    ['len(x)', 'int'],
    ['lambda: 0', 'Callable'],
    ['1 if x else 2', 'int'],
  ])('classifies %s as %s', (expression, expected) => {
    expect(classifyExpression(expressionTokens(expression))).toBe(expected);
  });

  it('cannot classify unknown names or boolean chains', () => {
    expect(classifyExpression(expressionTokens('x'))).toBeUndefined();
    expect(classifyExpression(expressionTokens('a or b'))).toBeUndefined();
  });

  it('resolves names through the scope', () => {
    expect(classifyExpression(expressionTokens('x'), new Map([['x', 'str']]))).toBe('str');
  });
});

describe('classifyLiteral', () => {
  it('classifies default value text', () => {
    expect(classifyLiteral('None')).toBe('None');
    expect(classifyLiteral('-1')).toBe('int');
    expect(classifyLiteral('"unterminated')).toBeUndefined();
  });
});

describe('mergeTypes', () => {
  it('widens int and float', () => {
    expect(mergeTypes(['int', 'float'])).toEqual({ kind: 'known', name: 'float', evidence: [] });
  });

  it('returns None when only None is returned', () => {
    expect(mergeTypes(['None'])).toEqual({ kind: 'known', name: 'None', evidence: [] });
  });
});

describe('ComplexityCalculator', () => {
  const calculator = new ComplexityCalculator();

  function complexityOf(source: string): number {
    const [element] = extractor.extract(source);
    if (!element) throw new Error('no element extracted');
    return calculator.calculate(element.body);
  }

  it('starts at one for straight-line code', () => {
    expect(complexityOf('def f():\n    return 1\n')).toBe(1);
  });

  it('counts branches, loops, handlers and boolean operators', () => {
    const source = [
      'def f(items):',
      '    for item in items:',
      '        if item and item.ok:',
      '            continue',
      '        elif item is None or item == 0:',
      '            break',
      '    while False:',
      '        pass',
      '    try:',
      '        pass',
      '    except ValueError:',
      '        pass',
      '    return [i for i in items if i]',
      '',
    ].join('\n');
    // for, if, and, elif, or, while, except, comprehension for and if
    expect(complexityOf(source)).toBe(10);
  });

  it('scores the same code the same however it is laid out', () => {
    const compact = [
      'def f(a, b):',
      '    if a and b or not a:',
      '        return [x for x in a if x]',
      '    while b: b -= 1',
      '    return a if b else None',
      '',
    ].join('\n');
    const spread = [
      'def f(a, b):',
      '    # check both',
      '    if (a',
      '            and b  # second',
      '            or not a):',
      '',
      '        return [',
      '            x',
      '            for x in a  # each',
      '            if x',
      '        ]',
      '',
      '    while b:',
      '        b -= 1',
      '    return (a',
      '            if b',
      '            else None)',
      '',
    ].join('\n');

    // if, and, or, comprehension for and if, while, conditional expression
    expect(complexityOf(compact)).toBe(8);
    expect(complexityOf(spread)).toBe(8);
  });

  it('does not count nested definitions', () => {
    expect(complexityOf('def f():\n    def g(x):\n        if x:\n            return 1\n    return g\n')).toBe(1);
  });

  it('is filled in by augmentElements', () => {
    const [element] = augmentElements(extractor.extract('def f(x):\n    if x:\n        return 1\n    return 2\n'));
    expect(element?.complexityScore).toBe(2);
  });
});
