import { UnsupportedOperatorError } from '../regex-compiler/errors.js';
import {
  concatNode,
  leafNode,
  optionalNode,
  orNode,
  plusNode,
  RNode,
  starNode,
} from '../regex-compiler/parser.js';
import type { Edge } from './nfa.js';
import { compileNFA } from './regex-nfa.js';

const a = leafNode('a');
const b = leafNode('b');

function eps(to: number): Edge {
  return { label: 'ε', to };
}

describe('compileNFA', () => {
  const cases: [
    string,
    RNode,
    { start: number; accept: number; transitions: [number, Edge[]][] }
  ][] = [
    [
      'a',
      a,
      { start: 1, accept: 2, transitions: [[1, [{ label: 'a', to: 2 }]]] },
    ],
    [
      'ab',
      concatNode(a, b),
      {
        start: 1,
        accept: 4,
        transitions: [
          [1, [{ label: 'a', to: 2 }]],
          [3, [{ label: 'b', to: 4 }]],
          [2, [eps(3)]],
        ],
      },
    ],
    [
      'a|b',
      orNode(a, b),
      {
        start: 5,
        accept: 6,
        transitions: [
          [1, [{ label: 'a', to: 2 }]],
          [3, [{ label: 'b', to: 4 }]],
          [5, [eps(1), eps(3)]],
          [2, [eps(6)]],
          [4, [eps(6)]],
        ],
      },
    ],
    [
      'a*',
      starNode(a),
      {
        start: 3,
        accept: 4,
        transitions: [
          [1, [{ label: 'a', to: 2 }]],
          [3, [eps(1), eps(4)]],
          [2, [eps(1), eps(4)]],
        ],
      },
    ],
    [
      'a?',
      optionalNode(a),
      {
        start: 3,
        accept: 4,
        transitions: [
          [1, [{ label: 'a', to: 2 }]],
          [3, [eps(1), eps(4)]],
          [2, [eps(4)]],
        ],
      },
    ],
    [
      'a+',
      plusNode(a),
      {
        start: 1,
        accept: 6,
        transitions: [
          [1, [{ label: 'a', to: 2 }]],
          [3, [{ label: 'a', to: 4 }]],
          [5, [eps(3), eps(6)]],
          [4, [eps(3), eps(6)]],
          [2, [eps(5)]],
        ],
      },
    ],
  ];
  test.each(cases)('%s', (_, tree, { start, accept, transitions }) => {
    const nfa = compileNFA(tree);
    expect(nfa.start).toBe(start);
    expect(nfa.accept).toBe(accept);
    expect([...nfa.transitions]).toEqual(transitions);
  });

  test('escaped leaves match the escaped character', () => {
    const nfa = compileNFA(leafNode('\\*'));
    expect(nfa.getEdges(1)).toEqual([{ label: '*', to: 2 }]);
  });

  test('every compilation numbers its states from 1', () => {
    const first = compileNFA(orNode(a, b));
    const second = compileNFA(orNode(a, b));
    expect(second.start).toBe(first.start);
    expect(second.getStates()).toEqual([1, 2, 3, 4, 5, 6]);
  });

  test('unknown nodes are rejected', () => {
    class BogusNode extends RNode<Record<string, never>> {
      readonly kind = 'BOGUS';
      children() {
        return [];
      }
      label() {
        return '?';
      }
    }
    expect(() => compileNFA(new BogusNode({}))).toThrow(
      UnsupportedOperatorError
    );
    expect(() => compileNFA(concatNode(a, new BogusNode({})))).toThrow(
      'no rule to compile operator BOGUS'
    );
  });
});
