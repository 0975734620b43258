import { ESCAPE, Op, type Token } from './tokens.js';

/**
 * Iterates over the atomic tokens of an expression. An escaped pair is a
 * single token; every other character is a token of its own.
 */
export class Lexer implements IterableIterator<Token> {
  private input: string;
  private index: number = 0;

  constructor(input: string) {
    this.input = input;
  }

  next(): IteratorResult<Token> {
    if (this.index >= this.input.length) {
      return { done: true, value: undefined };
    }
    const start = this.index;
    if (this.input[start] == ESCAPE && start + 1 < this.input.length) {
      this.index += 2;
    } else {
      this.index += 1;
    }
    return { done: false, value: this.input.slice(start, this.index) };
  }

  [Symbol.iterator]() {
    return this;
  }
}

const NO_CONCAT_AFTER: readonly string[] = [Op.OR, Op.OPEN_PAREN, Op.CONCAT];
const NO_CONCAT_BEFORE: readonly string[] = [
  Op.OR,
  Op.CONCAT,
  Op.CLOSE_PAREN,
  Op.STAR,
  Op.PLUS,
  Op.OPTIONAL,
];

/**
 * Split the expression into tokens and make concatenation explicit by
 * inserting a `.` between any two tokens that are implicitly concatenated.
 * A `.` already in the expression is kept as it is.
 */
export function tokenize(expr: string): Token[] {
  const tokens = [...new Lexer(expr)];
  const result: Token[] = [];
  for (let j = 0; j < tokens.length; j++) {
    const token = tokens[j];
    if (j > 0) {
      const prev = tokens[j - 1];
      if (
        !NO_CONCAT_AFTER.includes(prev) &&
        !NO_CONCAT_BEFORE.includes(token)
      ) {
        result.push(Op.CONCAT);
      }
    }
    result.push(token);
  }
  return result;
}
