/**
 * This file implements the McNaughton-Yamada-Thompson algorithm
 * for converting regular expressions to NFAs. You can find a
 * description in Section 3.7.4 of the dragon book (p. 159):
 * "Construction of an NFA from a Regular Expression"
 */

import { UnsupportedOperatorError } from '../regex-compiler/errors.js';
import {
  ConcatNode,
  concatNode,
  LeafNode,
  OptionalNode,
  OrNode,
  PlusNode,
  type RNode,
  StarNode,
  starNode,
} from '../regex-compiler/parser.js';
import { EPSILON } from '../regex-compiler/tokens.js';
import { type NFA, NFABuilder } from './nfa.js';

type Fragment = { start: number; accept: number };

class ThompsonCompiler {
  private readonly builder = new NFABuilder();

  compile(root: RNode): NFA {
    const { start, accept } = this.build(root);
    return this.builder.build(start, accept);
  }

  private build(node: RNode): Fragment {
    if (node instanceof LeafNode) {
      return this.leaf(node.symbol);
    }
    if (node instanceof ConcatNode) {
      return this.concat(node.props.left, node.props.right);
    }
    if (node instanceof OrNode) {
      return this.or(node.props.left, node.props.right);
    }
    if (node instanceof StarNode) {
      return this.star(node.props.child);
    }
    if (node instanceof PlusNode) {
      // A+ is A.(A*); both sides share the same subtree, which gets
      // compiled twice into two disjoint sets of states.
      const child = node.props.child;
      return this.build(concatNode(child, starNode(child)));
    }
    if (node instanceof OptionalNode) {
      return this.optional(node.props.child);
    }
    throw new UnsupportedOperatorError(node.kind);
  }

  private leaf(symbol: string): Fragment {
    const start = this.builder.addState();
    const accept = this.builder.addState();
    this.builder.addEdge(start, symbol, accept);
    return { start, accept };
  }

  private concat(left: RNode, right: RNode): Fragment {
    const a = this.build(left);
    const b = this.build(right);
    this.builder.addEdge(a.accept, EPSILON, b.start);
    return { start: a.start, accept: b.accept };
  }

  private or(left: RNode, right: RNode): Fragment {
    const a = this.build(left);
    const b = this.build(right);
    const start = this.builder.addState();
    const accept = this.builder.addState();
    this.builder.addEdge(start, EPSILON, a.start);
    this.builder.addEdge(start, EPSILON, b.start);
    this.builder.addEdge(a.accept, EPSILON, accept);
    this.builder.addEdge(b.accept, EPSILON, accept);
    return { start, accept };
  }

  private star(child: RNode): Fragment {
    const a = this.build(child);
    const start = this.builder.addState();
    const accept = this.builder.addState();
    this.builder.addEdge(start, EPSILON, a.start);
    this.builder.addEdge(start, EPSILON, accept);
    this.builder.addEdge(a.accept, EPSILON, a.start);
    this.builder.addEdge(a.accept, EPSILON, accept);
    return { start, accept };
  }

  private optional(child: RNode): Fragment {
    const a = this.build(child);
    const start = this.builder.addState();
    const accept = this.builder.addState();
    this.builder.addEdge(start, EPSILON, a.start);
    this.builder.addEdge(start, EPSILON, accept);
    this.builder.addEdge(a.accept, EPSILON, accept);
    return { start, accept };
  }
}

/**
 * Compile a syntax tree into an NFA with a single start state and a single
 * accepting state. State ids start at 1 for every call.
 */
export function compileNFA(tree: RNode): NFA {
  return new ThompsonCompiler().compile(tree);
}
