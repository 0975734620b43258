import { compileRegexOrThrow } from '../regex-compiler/regex.js';
import { DFA } from './dfa.js';
import { analyzeDFA, simplifyStateNames } from './dfa-analysis.js';

describe('analyzeDFA', () => {
  test('lists the missing edges of a partial DFA', () => {
    const { minDFA } = compileRegexOrThrow('a');
    expect(analyzeDFA(minDFA)).toEqual({
      startIsState: true,
      strayAcceptStates: [],
      missingEdges: [{ state: 1, symbol: 'a' }],
      complete: false,
    });
  });

  test('a complete DFA', () => {
    const { minDFA } = compileRegexOrThrow('(a|b)*abb(a|b)*');
    expect(analyzeDFA(minDFA).complete).toBe(true);
  });

  test('states that are not part of the DFA', () => {
    const dfa = new DFA<string>({
      states: ['x'],
      alphabet: ['a'],
      transitions: [['x', [['a', 'x']]]],
      start: 'w',
      acceptStates: ['y'],
    });
    expect(analyzeDFA(dfa)).toEqual({
      startIsState: false,
      strayAcceptStates: ['y'],
      missingEdges: [],
      complete: true,
    });
  });
});

describe('simplifyStateNames', () => {
  test('renames subset labels', () => {
    const { dfa } = compileRegexOrThrow('a|b');
    const simple = simplifyStateNames(dfa);
    expect([...simple.mapping]).toEqual([
      ['{1,2,3}', 'q0'],
      ['{4,6}', 'q1'],
      ['{5,6}', 'q2'],
    ]);
    expect(simple.dfa.start).toEqual('q0');
    expect(simple.dfa.getNextState('q0', 'a')).toEqual('q1');
    expect(simple.dfa.getNextState('q0', 'b')).toEqual('q2');
    expect([...simple.dfa.acceptStates]).toEqual(['q1', 'q2']);
  });

  test('numeric states sort by value and the start state comes first', () => {
    const dfa = new DFA<number>({
      states: [10, 2, 0],
      alphabet: ['a'],
      transitions: [[2, [['a', 10]]]],
      start: 2,
      acceptStates: [10],
    });
    const simple = simplifyStateNames(dfa);
    expect([...simple.mapping]).toEqual([
      [2, 'q0'],
      [0, 'q1'],
      [10, 'q2'],
    ]);
    expect(simple.dfa.getNextState('q0', 'a')).toEqual('q2');
    expect([...simple.dfa.acceptStates]).toEqual(['q2']);
  });
});
