import { desugar, isEscapedAt } from './desugar.js';
import { MalformedExpressionError } from './errors.js';

describe('desugar', () => {
  const cases: { [expr: string]: string } = {
    '': '',
    ab: 'ab',
    'a+': 'aa*',
    'a?': '(a|ε)',
    'ab+c': 'abb*c',
    '(ab)+': '(ab)(ab)*',
    '(a|b)?': '((a|b)|ε)',
    '(a+)?': '((aa*)|ε)',
    '\\++': '\\+\\+*',
    'a\\+': 'a\\+',
    'a\\\\+': 'a\\\\\\\\*',
    '\\(a': '\\(a',
  };
  for (const [expr, expected] of Object.entries(cases)) {
    test(`${JSON.stringify(expr)} => ${JSON.stringify(expected)}`, () => {
      expect(desugar(expr)).toEqual(expected);
    });
  }

  test.each([
    ['(ab', 'unclosed ( at position 0'],
    ['a(b(c)', 'unclosed ( at position 1'],
    ['(a(b)', 'unclosed ( at position 0'],
    ['x((y)', 'unclosed ( at position 1'],
    ['\\ε', 'escaped ε at position 0 is not a symbol'],
    ['a(b\\ε)', 'escaped ε at position 3 is not a symbol'],
  ])('%p fails with %p', (expr, message) => {
    expect(() => desugar(expr)).toThrow(MalformedExpressionError);
    expect(() => desugar(expr)).toThrow(message);
  });
});

describe('isEscapedAt', () => {
  test.each([
    ['\\*', 1, true],
    ['\\\\*', 2, false],
    ['\\\\\\*', 3, true],
    ['a*', 1, false],
    ['*', 0, false],
  ])('%p at %p is %p', (expr, pos, expected) => {
    expect(isEscapedAt(expr, pos)).toBe(expected);
  });
});
