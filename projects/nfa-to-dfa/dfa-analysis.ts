import { type ConstDFA, DFA, type StateId } from './dfa.js';

export type MissingEdge<S extends StateId> = { state: S; symbol: string };

export type DFAAnalysis<S extends StateId> = {
  startIsState: boolean;
  /**
   * Accept states that are not among the DFA's states.
   */
  strayAcceptStates: S[];
  /**
   * Every (state, symbol) pair without an edge, states in insertion order and
   * symbols in alphabet order.
   */
  missingEdges: MissingEdge<S>[];
  /**
   * True when every state has an edge for every symbol.
   */
  complete: boolean;
};

export function analyzeDFA<S extends StateId>(
  dfa: ConstDFA<S>
): DFAAnalysis<S> {
  const missingEdges: MissingEdge<S>[] = [];
  for (const state of dfa.states) {
    for (const symbol of dfa.alphabet) {
      if (dfa.getNextState(state, symbol) === undefined) {
        missingEdges.push({ state, symbol });
      }
    }
  }
  return {
    startIsState: dfa.states.has(dfa.start),
    strayAcceptStates: [...dfa.acceptStates].filter((s) => !dfa.states.has(s)),
    missingEdges,
    complete: missingEdges.length == 0,
  };
}

function compareStates(a: StateId, b: StateId): number {
  if (typeof a == 'number' && typeof b == 'number') {
    return a - b;
  }
  const [x, y] = [String(a), String(b)];
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Rename the states of a DFA to `q0`, `q1`, ... The start state becomes
 * `q0` and the others follow in sorted order of their old names.
 */
export function simplifyStateNames<S extends StateId>(
  dfa: ConstDFA<S>
): { dfa: DFA<string>; mapping: Map<S, string> } {
  const mapping: Map<S, string> = new Map([[dfa.start, 'q0']]);
  for (const state of [...dfa.states].sort(compareStates)) {
    if (!mapping.has(state)) {
      mapping.set(state, `q${mapping.size}`);
    }
  }
  const rename = (state: S): string => {
    const name = mapping.get(state);
    if (name === undefined) {
      throw new Error(`state ${state} is not a state of the DFA`);
    }
    return name;
  };

  const transitions: [string, [string, string][]][] = [];
  for (const [state, edges] of dfa.transitions) {
    transitions.push([
      rename(state),
      [...edges].map(([symbol, to]): [string, string] => [symbol, rename(to)]),
    ]);
  }
  const simplified = new DFA<string>({
    states: mapping.values(),
    alphabet: dfa.alphabet,
    transitions,
    start: rename(dfa.start),
    acceptStates: [...dfa.acceptStates]
      .filter((s) => mapping.has(s))
      .map(rename),
  });
  return { dfa: simplified, mapping };
}
