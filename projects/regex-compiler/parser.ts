import type { IHaveDebugStr } from '../utils/debug.js';
import { MalformedExpressionError, StackUnderflowError } from './errors.js';
import {
  EPSILON,
  isBinaryOp,
  isUnaryOp,
  Op,
  symbolOf,
  type Token,
} from './tokens.js';

export enum NodeKind {
  LEAF = 'LEAF',
  CONCAT = 'CONCAT',
  OR = 'OR',
  STAR = 'STAR',
  PLUS = 'PLUS',
  OPTIONAL = 'OPTIONAL',
}

export abstract class RNode<Props = unknown> implements IHaveDebugStr {
  abstract readonly kind: string;
  readonly props: Readonly<Props>;
  constructor(props: Props) {
    this.props = props;
  }

  abstract children(): readonly RNode[];

  /**
   * Short description of the node itself, without its children.
   */
  abstract label(): string;

  toJSON(): unknown {
    return { kind: this.kind, ...this.props };
  }

  toDebugStr(): string {
    const lines: string[] = [];
    const visit = (node: RNode, depth: number) => {
      lines.push(`${'  '.repeat(depth)}${node.label()}`);
      for (const child of node.children()) {
        visit(child, depth + 1);
      }
    };
    visit(this, 0);
    return lines.join('\n') + '\n';
  }
}

export class LeafNode extends RNode<{ token: Token }> {
  readonly kind = NodeKind.LEAF;
  children() {
    return [];
  }
  label() {
    return this.props.token;
  }
  /**
   * The input symbol this leaf matches, or {@link EPSILON}.
   */
  get symbol(): string {
    return symbolOf(this.props.token);
  }
  isEpsilon() {
    return this.props.token == EPSILON;
  }
}

abstract class BinaryNode extends RNode<{ left: RNode; right: RNode }> {
  children() {
    return [this.props.left, this.props.right];
  }
}

export class ConcatNode extends BinaryNode {
  readonly kind = NodeKind.CONCAT;
  label() {
    return Op.CONCAT;
  }
}

export class OrNode extends BinaryNode {
  readonly kind = NodeKind.OR;
  label() {
    return Op.OR;
  }
}

abstract class UnaryNode extends RNode<{ child: RNode }> {
  children() {
    return [this.props.child];
  }
}

export class StarNode extends UnaryNode {
  readonly kind = NodeKind.STAR;
  label() {
    return Op.STAR;
  }
}

export class PlusNode extends UnaryNode {
  readonly kind = NodeKind.PLUS;
  label() {
    return Op.PLUS;
  }
}

export class OptionalNode extends UnaryNode {
  readonly kind = NodeKind.OPTIONAL;
  label() {
    return Op.OPTIONAL;
  }
}

export function leafNode(token: Token) {
  return new LeafNode({ token });
}
export function concatNode(left: RNode, right: RNode) {
  return new ConcatNode({ left, right });
}
export function orNode(left: RNode, right: RNode) {
  return new OrNode({ left, right });
}
export function starNode(child: RNode) {
  return new StarNode({ child });
}
export function plusNode(child: RNode) {
  return new PlusNode({ child });
}
export function optionalNode(child: RNode) {
  return new OptionalNode({ child });
}

function unaryNode(op: Token, child: RNode): RNode {
  switch (op) {
    case Op.STAR:
      return starNode(child);
    case Op.PLUS:
      return plusNode(child);
    default:
      return optionalNode(child);
  }
}

/**
 * Fold a postfix token sequence into a syntax tree.
 */
export function buildTree(postfix: Token[]): RNode {
  const stack: RNode[] = [];
  for (const [position, token] of postfix.entries()) {
    if (isUnaryOp(token)) {
      const child = stack.pop();
      if (child === undefined) {
        throw new StackUnderflowError(token, position, 1);
      }
      stack.push(unaryNode(token, child));
    } else if (isBinaryOp(token)) {
      const right = stack.pop();
      const left = stack.pop();
      if (left === undefined || right === undefined) {
        throw new StackUnderflowError(token, position, 2);
      }
      stack.push(
        token == Op.OR ? orNode(left, right) : concatNode(left, right)
      );
    } else {
      stack.push(leafNode(token));
    }
  }
  const [root, ...rest] = stack;
  if (root === undefined) {
    throw new MalformedExpressionError(
      "Can't build a tree from an empty expression"
    );
  }
  if (rest.length > 0) {
    throw new MalformedExpressionError(
      `${stack.length} trees left over; missing an operator between them`
    );
  }
  return root;
}
