import type { IHaveDebugStr } from '../utils/debug.js';
import { Table } from '../utils/data-structures/table.js';
import { EPSILON } from '../regex-compiler/tokens.js';

/**
 * A labeled edge to another state. The label is an input symbol, or
 * {@link EPSILON} for an edge that consumes nothing.
 */
export type Edge = { readonly label: string; readonly to: number };

export interface ConstNFA extends IHaveDebugStr {
  readonly start: number;
  readonly accept: number;

  /**
   * Outgoing edges of every state that has any, in insertion order.
   */
  readonly transitions: ReadonlyMap<number, readonly Edge[]>;

  /**
   * Get the outgoing edges of the given state.
   */
  getEdges(state: number): readonly Edge[];

  /**
   * Every state that has an edge leading in or out of it, sorted.
   */
  getStates(): number[];

  /**
   * The sorted input symbols that label some edge, excluding epsilon.
   */
  getAlphabet(): string[];

  readonly numStates: number;
}

export class NFA implements ConstNFA {
  readonly start: number;
  readonly accept: number;
  readonly transitions: ReadonlyMap<number, readonly Edge[]>;

  constructor(
    start: number,
    accept: number,
    transitions: Iterable<[number, readonly Edge[]]>
  ) {
    this.start = start;
    this.accept = accept;
    const copy: Map<number, readonly Edge[]> = new Map();
    for (const [state, edges] of transitions) {
      const frozen = edges.map(({ label, to }) => Object.freeze({ label, to }));
      copy.set(state, Object.freeze(frozen));
    }
    this.transitions = copy;
  }

  getEdges(state: number): readonly Edge[] {
    return this.transitions.get(state) ?? [];
  }

  getStates(): number[] {
    const states: Set<number> = new Set();
    for (const [state, edges] of this.transitions) {
      states.add(state);
      for (const edge of edges) {
        states.add(edge.to);
      }
    }
    return [...states].sort((a, b) => a - b);
  }

  get numStates() {
    return this.getStates().length;
  }

  getAlphabet(): string[] {
    const alphabet: Set<string> = new Set();
    for (const edges of this.transitions.values()) {
      for (const { label } of edges) {
        if (label != EPSILON) {
          alphabet.add(label);
        }
      }
    }
    return [...alphabet].sort();
  }

  hasEpsilonEdges(): boolean {
    for (const edges of this.transitions.values()) {
      if (edges.some((edge) => edge.label == EPSILON)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Transition table with a row per state and a column per symbol. The
   * start state is marked with `>` and the accepting state with `*`.
   */
  toDebugStr(): string {
    const states = this.getStates();
    const labels = this.getAlphabet();
    if (this.hasEpsilonEdges()) {
      labels.push(EPSILON);
    }
    const table: Table<string> = Table.init(
      1 + states.length,
      1 + labels.length,
      () => ''
    );
    table.setCell(0, 0, 'δ');
    labels.forEach((label, li) => table.setCell(0, li + 1, label));

    const stateLabel = (s: number) => {
      let out = 's' + s;
      if (s == this.accept) {
        out = '*' + out;
      }
      if (s == this.start) {
        out = '>' + out;
      }
      return out;
    };

    states.forEach((state, si) => {
      table.setCell(si + 1, 0, stateLabel(state) + ':');
      labels.forEach((label, li) => {
        const nextStates = this.getEdges(state)
          .filter((edge) => edge.label == label)
          .map((edge) => stateLabel(edge.to));
        table.setCell(
          si + 1,
          li + 1,
          nextStates.length == 0 ? '_' : nextStates.join(',')
        );
      });
    });
    return table.toDebugStr();
  }
}

/**
 * Allocates states and collects edges while an NFA is being assembled. State
 * ids come from a counter private to the builder, so ids are unique within
 * one build and never shared between builds.
 */
export class NFABuilder {
  private lastState = 0;
  private readonly transitions: Map<number, Edge[]> = new Map();

  /**
   * @returns the id of a new state, one more than the last one allocated.
   */
  addState(): number {
    return ++this.lastState;
  }

  addEdge(fromState: number, label: string, toState: number) {
    let edges = this.transitions.get(fromState);
    if (edges === undefined) {
      edges = [];
      this.transitions.set(fromState, edges);
    }
    edges.push({ label, to: toState });
  }

  build(start: number, accept: number): NFA {
    return new NFA(start, accept, this.transitions);
  }
}

/**
 * compute the closure for an nfa.
 *
 * @param nfa nfa to compute the closure over
 * @param startStates start states to begin the traversal from
 * @param label edge label to follow while traversing
 * @returns the set of states reachable from the given start
 * states by only traversing edges with the given label
 */
export function closure(
  nfa: ConstNFA,
  startStates: Iterable<number>,
  label: string
): Set<number> {
  let visited: Set<number> = new Set();
  let toVisit = new Set([...startStates]);

  while (true) {
    let next = toVisit.values().next();
    if (next.done) {
      break;
    }
    let current: number = next.value;
    toVisit.delete(current);
    visited.add(current);

    for (const edge of nfa.getEdges(current)) {
      if (edge.label == label && !visited.has(edge.to)) {
        toVisit.add(edge.to);
      }
    }
  }
  return visited;
}

/**
 * The states reachable from the given states using only epsilon edges,
 * including the given states themselves.
 */
export function epsilonClosure(
  nfa: ConstNFA,
  startStates: Iterable<number>
): Set<number> {
  return closure(nfa, startStates, EPSILON);
}

/**
 * move(T,a)
 *
 * Set of NFA states to which there is a transition on
 * input symbol a from some state s in T. Epsilon is never
 * an input symbol, so moving on it reaches nothing.
 */
export function move(
  nfa: ConstNFA,
  startStates: Iterable<number>,
  label: string
): Set<number> {
  let set: Set<number> = new Set();
  if (label == EPSILON) {
    return set;
  }
  for (const stateId of startStates) {
    for (const edge of nfa.getEdges(stateId)) {
      if (edge.label == label) {
        set.add(edge.to);
      }
    }
  }
  return set;
}
