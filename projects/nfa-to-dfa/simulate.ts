import { EPSILON } from '../regex-compiler/tokens.js';
import type { ConstDFA, StateId } from './dfa.js';
import { type ConstNFA, epsilonClosure, move } from './nfa.js';

/**
 * Split an input word into the symbols it is made of. The word `ε` on its
 * own is the empty word.
 */
export function normalizeWord(word: string): string[] {
  return word == EPSILON ? [] : [...word];
}

/**
 * Run an NFA over a word by tracking the set of states it could be in.
 */
export function simulateNFA(nfa: ConstNFA, word: string): boolean {
  let current = epsilonClosure(nfa, [nfa.start]);
  for (const symbol of normalizeWord(word)) {
    current = epsilonClosure(nfa, move(nfa, current, symbol));
    if (current.size == 0) {
      return false;
    }
  }
  return current.has(nfa.accept);
}

/**
 * Run a DFA over a word. A symbol with no edge from the current state
 * rejects the word, and so does a DFA without states.
 */
export function simulateDFA<S extends StateId>(
  dfa: ConstDFA<S>,
  word: string
): boolean {
  if (dfa.numStates == 0) {
    return false;
  }
  let current = dfa.start;
  for (const symbol of normalizeWord(word)) {
    const next = dfa.getNextState(current, symbol);
    if (next === undefined) {
      return false;
    }
    current = next;
  }
  return dfa.isAcceptingState(current);
}
