/**
 * Base class for every error that aborts the compilation of one expression.
 */
export class RegexError extends Error {
  private _message: string;
  expression?: string;

  constructor(message: string) {
    super(message);
    this._message = message;
    this.name = this.constructor.name;
  }

  getMessage() {
    if (this.expression === undefined) {
      return `${this.name}: ${this._message}`;
    }
    return `${this.name} in ${JSON.stringify(this.expression)}: ${
      this._message
    }`;
  }

  attachExpression(expression: string): this {
    this.expression = expression;
    this.message = this.getMessage();
    return this;
  }
}

/**
 * Unbalanced parentheses, stray tokens, or a postfix sequence that does not
 * fold into exactly one tree.
 */
export class MalformedExpressionError extends RegexError {}

/**
 * A syntax tree node whose kind the NFA compiler has no rule for.
 */
export class UnsupportedOperatorError extends RegexError {
  readonly operator: string;
  constructor(operator: string) {
    super(`no rule to compile operator ${operator}`);
    this.operator = operator;
  }
}

/**
 * An operator in a postfix sequence with fewer operands before it than it
 * takes.
 */
export class StackUnderflowError extends RegexError {
  readonly operator: string;
  readonly position: number;
  constructor(operator: string, position: number, needed: number) {
    super(
      `operator ${operator} at position ${position} needs ${needed} operand${
        needed == 1 ? '' : 's'
      }`
    );
    this.operator = operator;
    this.position = position;
  }
}
