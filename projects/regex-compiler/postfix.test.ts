import { MalformedExpressionError } from './errors.js';
import { tokenize } from './lexer.js';
import { precedence, toPostfix, toPostfixTrace } from './postfix.js';

describe('toPostfix', () => {
  const cases: { [expr: string]: string } = {
    a: 'a',
    ab: 'ab.',
    'a|bc*': 'abc*.|',
    'a|b|c': 'ab|c|',
    'ab|c': 'ab.c|',
    'a(b|c)': 'abc|.',
    '(a|b)*abb': 'ab|*a.b.b.',
    'a\\*b': 'a\\*.b.',
  };
  for (const [expr, expected] of Object.entries(cases)) {
    test(`${expr} => ${expected}`, () => {
      expect(toPostfix(tokenize(expr)).join('')).toEqual(expected);
    });
  }

  test('escaped pairs stay whole', () => {
    expect(toPostfix(tokenize('\\(\\)'))).toEqual(['\\(', '\\)', '.']);
  });

  test.each([
    [['a', ')'], 'unmatched ) at token 1'],
    [['(', 'a'], 'unclosed ( at end of expression'],
    [['a', '.', '-'], 'unrecognized token "-" at token 2'],
  ])('%p fails with %p', (tokens, message) => {
    expect(() => toPostfix(tokens)).toThrow(MalformedExpressionError);
    expect(() => toPostfix(tokens)).toThrow(message);
  });
});

test('precedence', () => {
  expect(['*', '+', '?', '.', '|', '('].map(precedence)).toEqual([
    3, 3, 3, 2, 1, 0,
  ]);
});

test('toPostfixTrace records every step', () => {
  const { postfix, steps } = toPostfixTrace(tokenize('(a|b)c'));
  expect(postfix).toEqual(['a', 'b', '|', 'c', '.']);
  expect(steps).toEqual([
    { action: 'push (', output: [], stack: ['('] },
    { action: 'operand a', output: ['a'], stack: ['('] },
    { action: 'push op |', output: ['a'], stack: ['(', '|'] },
    { action: 'operand b', output: ['a', 'b'], stack: ['(', '|'] },
    { action: 'pop for ) |', output: ['a', 'b', '|'], stack: ['('] },
    { action: 'pop (', output: ['a', 'b', '|'], stack: [] },
    { action: 'push op .', output: ['a', 'b', '|'], stack: ['.'] },
    { action: 'operand c', output: ['a', 'b', '|', 'c'], stack: ['.'] },
    { action: 'pop end .', output: ['a', 'b', '|', 'c', '.'], stack: [] },
  ]);
});
