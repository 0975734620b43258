import { MalformedExpressionError } from './errors.js';
import { isBinaryOp, isOperand, isUnaryOp, Op, type Token } from './tokens.js';

/**
 * Precedence of each operator. Parentheses are 0: they are pushed and
 * matched but never popped by a comparison.
 */
export function precedence(op: Token): number {
  if (isUnaryOp(op)) return 3;
  if (op == Op.CONCAT) return 2;
  if (op == Op.OR) return 1;
  return 0;
}

export type PostfixStep = {
  action: string;
  output: Token[];
  stack: Token[];
};

class ShuntingYard {
  readonly output: Token[] = [];
  readonly stack: Token[] = [];
  readonly steps: PostfixStep[] | null;

  constructor(collectSteps: boolean) {
    this.steps = collectSteps ? [] : null;
  }

  private record(action: string) {
    this.steps?.push({
      action,
      output: [...this.output],
      stack: [...this.stack],
    });
  }

  private top(): Token | undefined {
    return this.stack[this.stack.length - 1];
  }

  private popToOutput(action: string) {
    const op = this.stack.pop();
    if (op !== undefined) {
      this.output.push(op);
      this.record(`${action} ${op}`);
    }
  }

  private closeParen(position: number) {
    for (let top = this.top(); top != Op.OPEN_PAREN; top = this.top()) {
      if (top === undefined) {
        throw new MalformedExpressionError(
          `unmatched ) at token ${position}`
        );
      }
      this.popToOutput('pop for )');
    }
    this.stack.pop();
    this.record('pop (');
  }

  private pushOperator(op: Token) {
    for (
      let top = this.top();
      top !== undefined &&
      top != Op.OPEN_PAREN &&
      precedence(top) >= precedence(op);
      top = this.top()
    ) {
      this.popToOutput('pop op');
    }
    this.stack.push(op);
    this.record(`push op ${op}`);
  }

  run(tokens: Token[]): Token[] {
    for (const [position, token] of tokens.entries()) {
      if (isOperand(token)) {
        this.output.push(token);
        this.record(`operand ${token}`);
      } else if (token == Op.OPEN_PAREN) {
        this.stack.push(token);
        this.record('push (');
      } else if (token == Op.CLOSE_PAREN) {
        this.closeParen(position);
      } else if (isUnaryOp(token) || isBinaryOp(token)) {
        this.pushOperator(token);
      } else {
        throw new MalformedExpressionError(
          `unrecognized token ${JSON.stringify(token)} at token ${position}`
        );
      }
    }
    while (this.stack.length > 0) {
      if (this.top() == Op.OPEN_PAREN) {
        throw new MalformedExpressionError('unclosed ( at end of expression');
      }
      this.popToOutput('pop end');
    }
    return this.output;
  }
}

/**
 * Convert infix tokens (with explicit concatenation) to postfix using the
 * shunting-yard algorithm. All operators are left associative.
 */
export function toPostfix(tokens: Token[]): Token[] {
  return new ShuntingYard(false).run(tokens);
}

/**
 * Same as {@link toPostfix}, also returning a snapshot of the output and the
 * operator stack after every step of the algorithm.
 */
export function toPostfixTrace(tokens: Token[]): {
  postfix: Token[];
  steps: PostfixStep[];
} {
  const shuntingYard = new ShuntingYard(true);
  const postfix = shuntingYard.run(tokens);
  return { postfix, steps: shuntingYard.steps ?? [] };
}
