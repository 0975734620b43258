import {
  type ConstDFA,
  DFA,
  DFABuilder,
  type DFAParts,
  type StateId,
} from './dfa.js';

/**
 * A minimal DFA. States are numbered from 0 (the start state) in breadth
 * first order, and each one stands for a block of equivalent states of the
 * source DFA.
 */
export class MinimizedDFA<S extends StateId> extends DFA<number> {
  readonly blocks: ReadonlyMap<number, readonly S[]>;
  constructor(
    parts: DFAParts<number>,
    blocks: ReadonlyMap<number, readonly S[]>
  ) {
    super(parts);
    this.blocks = blocks;
  }

  override toDebugStr() {
    let out = 'MinimizedDFA:\n' + super.toDebugStr();
    out += '\n';
    out += 'Mapping from DFA state to source DFA states:\n';
    for (const [state, block] of this.blocks.entries()) {
      out += `${state}: [${block.join(' ')}]\n`;
    }
    return out;
  }
}

/**
 * Drop every state that cannot be reached from the start state by
 * following defined edges.
 */
export function removeUnreachable<S extends StateId>(
  dfa: ConstDFA<S>
): DFA<S> {
  const builder = new DFABuilder<S>(dfa.alphabet);
  const queue = [dfa.start];
  const reached = new Set(queue);
  for (let i = 0; i < queue.length; i++) {
    const state = queue[i];
    builder.addState(state);
    builder.setAccepting(state, dfa.isAcceptingState(state));
    for (const symbol of dfa.alphabet) {
      const next = dfa.getNextState(state, symbol);
      if (next === undefined) {
        continue;
      }
      if (!reached.has(next)) {
        reached.add(next);
        queue.push(next);
      }
      builder.addEdge(state, symbol, next);
    }
  }
  builder.setStartState(dfa.start);
  return builder.build();
}

function blockIndex<S extends StateId>(blocks: S[][]): Map<S, number> {
  const index: Map<S, number> = new Map();
  blocks.forEach((block, i) => block.forEach((state) => index.set(state, i)));
  return index;
}

/**
 * Split every block into groups of states whose edges lead into the same
 * blocks. A missing edge counts as leading to block -1.
 */
function refine<S extends StateId>(dfa: ConstDFA<S>, blocks: S[][]): S[][] {
  const index = blockIndex(blocks);
  const refined: S[][] = [];
  for (const block of blocks) {
    const groups: Map<string, S[]> = new Map();
    for (const state of block) {
      const signature = dfa.alphabet
        .map((symbol) => {
          const next = dfa.getNextState(state, symbol);
          return next === undefined ? -1 : index.get(next) ?? -1;
        })
        .join(',');
      const group = groups.get(signature);
      if (group === undefined) {
        groups.set(signature, [state]);
      } else {
        group.push(state);
      }
    }
    refined.push(...groups.values());
  }
  return refined;
}

/**
 * Minimize a DFA by partition refinement.
 *
 * Starting from the accepting / non-accepting split, blocks are refined until
 * a full pass splits none of them. Each block of the final partition becomes
 * one state whose edges are copied from any member of the block, since all
 * members of a stable block agree on where their edges lead.
 */
export function minimize<S extends StateId>(
  dfa: ConstDFA<S>
): MinimizedDFA<S> {
  if (dfa.numStates == 0) {
    return new MinimizedDFA<S>(
      {
        states: [],
        alphabet: dfa.alphabet,
        transitions: [],
        start: 0,
        acceptStates: [],
      },
      new Map()
    );
  }

  // Step 1: only reachable states take part
  const reachable = removeUnreachable(dfa);

  // Step 2: initialize partitions into non-accepting and accepting states
  const states = [...reachable.states];
  let blocks = [
    states.filter((s) => !reachable.isAcceptingState(s)),
    states.filter((s) => reachable.isAcceptingState(s)),
  ].filter((block) => block.length > 0);

  // Step 3: refine until nothing splits. The number of blocks grows with
  // every pass that changes anything and can't exceed the number of states.
  if (states.length > 1) {
    while (true) {
      const refined = refine(reachable, blocks);
      const changed = refined.length != blocks.length;
      blocks = refined;
      if (!changed) {
        break;
      }
    }
  }

  // Step 4: number the blocks breadth first from the start block
  const index = blockIndex(blocks);
  const blockOf = (state: S): number => {
    const i = index.get(state);
    if (i === undefined) {
      throw new Error(`state ${state} is not in any block`);
    }
    return i;
  };
  const order = [blockOf(reachable.start)];
  const newIds: Map<number, number> = new Map([[order[0], 0]]);
  for (let i = 0; i < order.length; i++) {
    const representative = blocks[order[i]][0];
    for (const symbol of reachable.alphabet) {
      const next = reachable.getNextState(representative, symbol);
      if (next === undefined) {
        continue;
      }
      const nextBlock = blockOf(next);
      if (!newIds.has(nextBlock)) {
        newIds.set(nextBlock, order.length);
        order.push(nextBlock);
      }
    }
  }

  // Step 5: build the minimized dfa
  const minDFA = new DFABuilder<number>(reachable.alphabet);
  const members: Map<number, readonly S[]> = new Map();
  order.forEach((blockI, newId) => {
    const block = blocks[blockI];
    minDFA.addState(newId);
    minDFA.setAccepting(
      newId,
      block.some((state) => reachable.isAcceptingState(state))
    );
    members.set(newId, block);
  });
  minDFA.setStartState(0);
  order.forEach((blockI, newId) => {
    const representative = blocks[blockI][0];
    for (const symbol of reachable.alphabet) {
      const next = reachable.getNextState(representative, symbol);
      if (next !== undefined) {
        const target = newIds.get(blockOf(next));
        if (target !== undefined) {
          minDFA.addEdge(newId, symbol, target);
        }
      }
    }
  });
  return new MinimizedDFA(minDFA.parts(), members);
}
