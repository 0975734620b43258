import { MalformedExpressionError, StackUnderflowError } from './errors.js';
import { tokenize } from './lexer.js';
import {
  buildTree,
  concatNode,
  leafNode,
  optionalNode,
  orNode,
  plusNode,
  RNode,
  starNode,
} from './parser.js';
import { toPostfix } from './postfix.js';

function parse(expr: string) {
  return buildTree(toPostfix(tokenize(expr)));
}

describe('buildTree', () => {
  const cases: { [index: string]: RNode } = {
    a: leafNode('a'),
    ab: concatNode(leafNode('a'), leafNode('b')),
    '\\*a': concatNode(leafNode('\\*'), leafNode('a')),
    'a|b': orNode(leafNode('a'), leafNode('b')),
    'a*': starNode(leafNode('a')),
    'a+': plusNode(leafNode('a')),
    'a?': optionalNode(leafNode('a')),
    '(a|b)*': starNode(orNode(leafNode('a'), leafNode('b'))),
    abc: concatNode(
      concatNode(leafNode('a'), leafNode('b')),
      leafNode('c')
    ),
    'ab|cd': orNode(
      concatNode(leafNode('a'), leafNode('b')),
      concatNode(leafNode('c'), leafNode('d'))
    ),
    'a|ε': orNode(leafNode('a'), leafNode('ε')),
  };
  for (const [expr, tree] of Object.entries(cases)) {
    test(`builds a tree for ${expr}`, () => {
      expect(parse(expr)).toEqual(tree);
    });
  }

  const failures: [string[], new (...args: never[]) => Error, string][] = [
    [['*'], StackUnderflowError, 'operator * at position 0 needs 1 operand'],
    [
      ['a', '|'],
      StackUnderflowError,
      'operator | at position 1 needs 2 operands',
    ],
    [
      [],
      MalformedExpressionError,
      "Can't build a tree from an empty expression",
    ],
    [
      ['a', 'b'],
      MalformedExpressionError,
      '2 trees left over; missing an operator between them',
    ],
  ];
  test.each(failures)('%p fails', (postfix, errorClass, message) => {
    expect(() => buildTree(postfix)).toThrow(errorClass);
    expect(() => buildTree(postfix)).toThrow(message);
  });
});

describe('RNode', () => {
  test('toDebugStr() prints an indented outline', () => {
    expect(parse('a|bc*').toDebugStr()).toEqual(
      '|\n  a\n  .\n    b\n    *\n      c\n'
    );
  });

  test('toJSON()', () => {
    expect(JSON.parse(JSON.stringify(parse('a*b')))).toEqual({
      kind: 'CONCAT',
      left: { kind: 'STAR', child: { kind: 'LEAF', token: 'a' } },
      right: { kind: 'LEAF', token: 'b' },
    });
  });

  test('leaves know their symbol', () => {
    expect(leafNode('\\*').symbol).toEqual('*');
    expect(leafNode('a').symbol).toEqual('a');
    expect(leafNode('ε').isEpsilon()).toBe(true);
    expect(leafNode('\\*').isEpsilon()).toBe(false);
  });

  test('children()', () => {
    const tree = parse('a|b');
    expect(tree.children()).toEqual([leafNode('a'), leafNode('b')]);
    expect(leafNode('a').children()).toEqual([]);
  });
});
