import type { IHaveDebugStr } from '../utils/debug.js';
import { Table } from '../utils/data-structures/table.js';
import { HashMap, NumberSet } from '../utils/sets.js';
import { type ConstNFA, epsilonClosure, move } from './nfa.js';

/**
 * Identifies a DFA state: a canonical label of a set of NFA states for DFAs
 * built by subset construction, a sequential integer for minimized DFAs.
 */
export type StateId = number | string;

export interface ConstDFA<S extends StateId = StateId> extends IHaveDebugStr {
  /**
   * All states, in the order they were added.
   */
  readonly states: ReadonlySet<S>;

  /**
   * The sorted input symbols.
   */
  readonly alphabet: readonly string[];

  readonly transitions: ReadonlyMap<S, ReadonlyMap<string, S>>;

  readonly start: S;

  readonly acceptStates: ReadonlySet<S>;

  readonly numStates: number;

  /**
   * The state reached from the given state by the given symbol, or undefined
   * when the DFA has no such edge.
   */
  getNextState(state: S, symbol: string): S | undefined;

  isAcceptingState(state: S): boolean;
}

/**
 * Everything needed to construct a DFA.
 */
export type DFAParts<S extends StateId> = {
  states: Iterable<S>;
  alphabet: Iterable<string>;
  transitions: Iterable<[S, Iterable<[string, S]>]>;
  start: S;
  acceptStates: Iterable<S>;
};

export class DFA<S extends StateId = StateId> implements ConstDFA<S> {
  readonly states: ReadonlySet<S>;
  readonly alphabet: readonly string[];
  readonly transitions: ReadonlyMap<S, ReadonlyMap<string, S>>;
  readonly start: S;
  readonly acceptStates: ReadonlySet<S>;

  constructor(parts: DFAParts<S>) {
    this.states = new Set(parts.states);
    this.alphabet = Object.freeze([...new Set(parts.alphabet)].sort());
    const transitions: Map<S, ReadonlyMap<string, S>> = new Map();
    for (const [state, edges] of parts.transitions) {
      transitions.set(state, new Map(edges));
    }
    this.transitions = transitions;
    this.start = parts.start;
    this.acceptStates = new Set(parts.acceptStates);
  }

  get numStates() {
    return this.states.size;
  }

  getNextState(state: S, symbol: string): S | undefined {
    return this.transitions.get(state)?.get(symbol);
  }

  isAcceptingState(state: S): boolean {
    return this.acceptStates.has(state);
  }

  /**
   * Transition table with a row per state and a column per symbol. The
   * start state is marked with `>`, accepting states with `*`, and missing
   * edges show as `_`.
   */
  toDebugStr(): string {
    const states = [...this.states];
    const table: Table<string> = Table.init(
      1 + states.length,
      1 + this.alphabet.length,
      () => ''
    );
    table.setCell(0, 0, 'δ');
    this.alphabet.forEach((symbol, ai) => table.setCell(0, ai + 1, symbol));

    const stateLabel = (s: S) => {
      let out = String(s);
      if (this.isAcceptingState(s)) {
        out = '*' + out;
      }
      if (s == this.start) {
        out = '>' + out;
      }
      return out;
    };

    states.forEach((state, si) => {
      table.setCell(si + 1, 0, stateLabel(state) + ':');
      this.alphabet.forEach((symbol, ai) => {
        const next = this.getNextState(state, symbol);
        const label = next === undefined ? '_' : stateLabel(next);
        table.setCell(si + 1, ai + 1, label);
      });
    });
    return table.toDebugStr();
  }
}

/**
 * Collects the states, edges and accepting states of a DFA while it is being
 * assembled.
 */
export class DFABuilder<S extends StateId> {
  private readonly alphabet: string[];
  private readonly states: Set<S> = new Set();
  private readonly transitions: Map<S, Map<string, S>> = new Map();
  private readonly acceptStates: Set<S> = new Set();
  private startState: S | undefined = undefined;

  constructor(alphabet: Iterable<string>) {
    this.alphabet = [...alphabet];
  }

  addState(state: S) {
    this.states.add(state);
  }

  setAccepting(state: S, accepting: boolean) {
    if (accepting) {
      this.acceptStates.add(state);
    } else {
      this.acceptStates.delete(state);
    }
  }

  setStartState(state: S) {
    if (!this.states.has(state)) {
      throw new Error(`IndexError: ${state} is not a valid startState`);
    }
    this.startState = state;
  }

  addEdge(fromState: S, symbol: string, toState: S) {
    this.states.add(fromState);
    this.states.add(toState);
    if (!this.alphabet.includes(symbol)) {
      this.alphabet.push(symbol);
    }
    let edges = this.transitions.get(fromState);
    if (edges === undefined) {
      edges = new Map();
      this.transitions.set(fromState, edges);
    }
    const existing = edges.get(symbol);
    if (existing !== undefined) {
      throw new Error(
        `There is already an edge from ${fromState} to ${existing} via ${symbol}`
      );
    }
    edges.set(symbol, toState);
  }

  parts(): DFAParts<S> {
    if (this.startState === undefined) {
      throw new Error('DFA has no start state');
    }
    return {
      states: this.states,
      alphabet: this.alphabet,
      transitions: this.transitions,
      start: this.startState,
      acceptStates: this.acceptStates,
    };
  }

  build(): DFA<S> {
    return new DFA(this.parts());
  }
}

/**
 * A DFA produced by subset construction. Each state is named by the label of
 * the set of NFA states it stands for.
 */
export class DFAFromNFA extends DFA<string> {
  readonly nfaStateMap: ReadonlyMap<string, NumberSet>;
  constructor(
    parts: DFAParts<string>,
    nfaStateMap: ReadonlyMap<string, NumberSet>
  ) {
    super(parts);
    this.nfaStateMap = nfaStateMap;
  }

  override toDebugStr() {
    let out = 'DFAfromNFA:\n' + super.toDebugStr();
    out += '\n';
    out += 'Mapping from DFA state to source NFA states:\n';
    for (const [state, nfaStates] of this.nfaStateMap.entries()) {
      out += `${state}: ${nfaStates.hash()}\n`;
    }
    return out;
  }
}

/**
 * Convert an NFA to a DFA by the subset construction. See page 47 of
 * Engineering a Compiler (Cooper & Torczon).
 *
 * DFA states are discovered breadth first. A symbol that leads nowhere from
 * a configuration gets no edge, so the result may be partial, and the empty
 * configuration never becomes a state.
 */
export function determinize(nfa: ConstNFA): DFAFromNFA {
  const alphabet = nfa.getAlphabet();
  const dfa = new DFABuilder<string>(alphabet);

  // Configurations the NFA can be in, each keyed by the set itself, along
  // with the name of the DFA state representing it.
  const labels = new HashMap<NumberSet, string>((config) => config.hash());
  const nfaStateMap: Map<string, NumberSet> = new Map();
  const configsToVisit: [string, NumberSet][] = [];

  const addConfig = (config: NumberSet): string => {
    const label = config.label();
    labels.set(config, label);
    nfaStateMap.set(label, config);
    dfa.addState(label);
    if (config.has(nfa.accept)) {
      dfa.setAccepting(label, true);
    }
    configsToVisit.push([label, config]);
    return label;
  };

  // The first configuration holds the states reachable by consuming 0
  // characters.
  const config0 = new NumberSet(epsilonClosure(nfa, [nfa.start]));
  dfa.setStartState(addConfig(config0));

  for (let i = 0; i < configsToVisit.length; i++) {
    const [fromState, nfaConfig] = configsToVisit[i];
    for (const symbol of alphabet) {
      const moved = move(nfa, nfaConfig, symbol);
      if (moved.size == 0) {
        continue;
      }
      const nextConfig = new NumberSet(epsilonClosure(nfa, moved));
      const toState = labels.get(nextConfig) ?? addConfig(nextConfig);
      dfa.addEdge(fromState, symbol, toState);
    }
  }

  return new DFAFromNFA(dfa.parts(), nfaStateMap);
}
