import { type ConstNFA, type Edge, NFA } from './nfa.js';

export enum IssueKind {
  START_NOT_REFERENCED = 'START_NOT_REFERENCED',
  ACCEPT_NOT_REFERENCED = 'ACCEPT_NOT_REFERENCED',
  START_HAS_INCOMING = 'START_HAS_INCOMING',
  ACCEPT_HAS_OUTGOING = 'ACCEPT_HAS_OUTGOING',
  UNREACHABLE_STATES = 'UNREACHABLE_STATES',
  ACCEPT_UNREACHABLE = 'ACCEPT_UNREACHABLE',
}

/**
 * A structural problem with an NFA. Issues are diagnostics: they never stop
 * a compilation.
 */
export type NFAIssue = { kind: IssueKind; message: string };

function compareEdges(a: Edge, b: Edge): number {
  if (a.label != b.label) {
    return a.label < b.label ? -1 : 1;
  }
  return a.to - b.to;
}

/**
 * Breadth first traversal from the start state over every edge, epsilon
 * edges included. Each state's edges are visited in (label, destination)
 * order so the visiting order is reproducible.
 */
function breadthFirstOrder(nfa: ConstNFA): number[] {
  const queue = [nfa.start];
  const seen = new Set(queue);
  for (let i = 0; i < queue.length; i++) {
    const state = queue[i];
    for (const edge of [...nfa.getEdges(state)].sort(compareEdges)) {
      if (!seen.has(edge.to)) {
        seen.add(edge.to);
        queue.push(edge.to);
      }
    }
  }
  return queue;
}

export function validateNFA(nfa: ConstNFA): NFAIssue[] {
  const issues: NFAIssue[] = [];
  const { start, accept } = nfa;
  const states = nfa.getStates();

  // step 1: start and accept must show up in the transitions
  if (!states.includes(start)) {
    issues.push({
      kind: IssueKind.START_NOT_REFERENCED,
      message: `start state ${start} does not appear in any transition`,
    });
  }
  if (!states.includes(accept)) {
    issues.push({
      kind: IssueKind.ACCEPT_NOT_REFERENCED,
      message: `accept state ${accept} does not appear in any transition`,
    });
  }

  // step 2: nothing enters the start state, nothing leaves the accept state
  let startInDegree = 0;
  for (const edges of nfa.transitions.values()) {
    startInDegree += edges.filter((edge) => edge.to == start).length;
  }
  if (startInDegree != 0) {
    issues.push({
      kind: IssueKind.START_HAS_INCOMING,
      message: `start state ${start} has in-degree ${startInDegree} (expected 0)`,
    });
  }
  const acceptOutDegree = nfa.getEdges(accept).length;
  if (acceptOutDegree != 0) {
    issues.push({
      kind: IssueKind.ACCEPT_HAS_OUTGOING,
      message: `accept state ${accept} has out-degree ${acceptOutDegree} (expected 0)`,
    });
  }

  // step 3: every state is reachable from the start state
  const reached = new Set(breadthFirstOrder(nfa));
  const unreachable = states.filter((state) => !reached.has(state));
  if (unreachable.length > 0) {
    issues.push({
      kind: IssueKind.UNREACHABLE_STATES,
      message: `states unreachable from ${start}: [${unreachable.join(', ')}]`,
    });
  }

  // step 4: the accept state must be among the reachable ones
  if (!reached.has(accept)) {
    issues.push({
      kind: IssueKind.ACCEPT_UNREACHABLE,
      message: `accept state ${accept} is not reachable from ${start}`,
    });
  }
  return issues;
}

export type RenumberOptions = {
  /**
   * Give the accept state the largest id. Defaults to true.
   */
  acceptLast?: boolean;
};

/**
 * Rename the states of an NFA to 1..N in breadth first order from the start
 * state, so that the start state is always 1 and (by default) the accept
 * state is always N. States the traversal never reaches come after the
 * reachable ones, in order of their old ids.
 */
export function renumberNFA(
  nfa: ConstNFA,
  { acceptLast = true }: RenumberOptions = {}
): NFA {
  let order = breadthFirstOrder(nfa);
  const reached = new Set(order);
  for (const state of nfa.getStates()) {
    if (!reached.has(state)) {
      order.push(state);
    }
  }
  if (!order.includes(nfa.accept)) {
    order.push(nfa.accept);
  }
  if (acceptLast) {
    order = [...order.filter((state) => state != nfa.accept), nfa.accept];
  }

  const mapping: Map<number, number> = new Map(
    order.map((state, i): [number, number] => [state, i + 1])
  );
  const renumber = (state: number): number => {
    const newState = mapping.get(state);
    if (newState === undefined) {
      throw new Error(`state ${state} was not assigned a new id`);
    }
    return newState;
  };

  const transitions: [number, Edge[]][] = [];
  for (const [state, edges] of nfa.transitions) {
    transitions.push([
      renumber(state),
      edges.map(({ label, to }) => ({ label, to: renumber(to) })),
    ]);
  }
  transitions.sort(([a], [b]) => a - b);
  return new NFA(renumber(nfa.start), renumber(nfa.accept), transitions);
}
