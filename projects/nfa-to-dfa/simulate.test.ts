import { leafNode, orNode, starNode } from '../regex-compiler/parser.js';
import { determinize, DFA } from './dfa.js';
import { minimize } from './minimize.js';
import { compileNFA } from './regex-nfa.js';
import { normalizeWord, simulateDFA, simulateNFA } from './simulate.js';

test('normalizeWord', () => {
  expect(normalizeWord('ε')).toEqual([]);
  expect(normalizeWord('')).toEqual([]);
  expect(normalizeWord('ab')).toEqual(['a', 'b']);
  expect(normalizeWord('aε')).toEqual(['a', 'ε']);
});

describe('simulateNFA', () => {
  const aOrB = compileNFA(orNode(leafNode('a'), leafNode('b')));
  const aStar = compileNFA(starNode(leafNode('a')));

  test.each([
    ['a', true],
    ['b', true],
    ['ab', false],
    ['c', false],
    ['', false],
    ['ε', false],
    ['εa', false],
    ['aε', false],
  ])('a|b on %p is %p', (word, expected) => {
    expect(simulateNFA(aOrB, word)).toBe(expected);
  });

  test.each(['εa', 'aε'])(
    'NFA and DFA agree on %p for a|b',
    (word) => {
      const dfa = determinize(aOrB);
      expect(simulateNFA(aOrB, word)).toBe(false);
      expect(simulateDFA(dfa, word)).toBe(false);
      expect(simulateDFA(minimize(dfa), word)).toBe(false);
    }
  );

  test.each([
    ['', true],
    ['ε', true],
    ['aaaa', true],
    ['aab', false],
  ])('a* on %p is %p', (word, expected) => {
    expect(simulateNFA(aStar, word)).toBe(expected);
  });
});

describe('simulateDFA', () => {
  const dfa = determinize(compileNFA(starNode(leafNode('a'))));

  test.each([
    ['', true],
    ['ε', true],
    ['aaa', true],
    ['ab', false],
    ['b', false],
  ])('a* on %p is %p', (word, expected) => {
    expect(simulateDFA(dfa, word)).toBe(expected);
    expect(simulateDFA(minimize(dfa), word)).toBe(expected);
  });

  test('a DFA without states rejects everything', () => {
    const empty = new DFA<number>({
      states: [],
      alphabet: [],
      transitions: [],
      start: 0,
      acceptStates: [0],
    });
    expect(simulateDFA(empty, '')).toBe(false);
    expect(simulateDFA(empty, 'a')).toBe(false);
  });
});
