/**
 * One atomic piece of an expression: a literal character, an escaped pair
 * like `\*`, the empty-string symbol, or one of `( ) | . * + ?`.
 */
export type Token = string;

/**
 * Reserved symbol for the empty string. In an expression it compiles to an
 * epsilon edge and matches the empty string; as a whole input word it
 * stands for the empty word. It cannot be escaped into a literal.
 */
export const EPSILON = 'ε';

export const ESCAPE = '\\';

export enum Op {
  CONCAT = '.',
  OR = '|',
  STAR = '*',
  PLUS = '+',
  OPTIONAL = '?',
  OPEN_PAREN = '(',
  CLOSE_PAREN = ')',
}

export const UNARY_OPS: readonly string[] = [Op.STAR, Op.PLUS, Op.OPTIONAL];
export const BINARY_OPS: readonly string[] = [Op.CONCAT, Op.OR];

const BRACKETS = '[]{}';

export function isEscaped(token: Token): boolean {
  return token.length == 2 && token[0] == ESCAPE;
}

export function isUnaryOp(token: Token): boolean {
  return UNARY_OPS.includes(token);
}

export function isBinaryOp(token: Token): boolean {
  return BINARY_OPS.includes(token);
}

/**
 * Whether the token stands for a symbol rather than an operator or a
 * parenthesis.
 */
export function isOperand(token: Token): boolean {
  if (isEscaped(token) || token == EPSILON) {
    return true;
  }
  return (
    token.length == 1 &&
    (/^[\p{L}\p{N}_]$/u.test(token) || BRACKETS.includes(token))
  );
}

/**
 * The input symbol a leaf token matches: the second character of an escaped
 * pair, the token itself otherwise.
 */
export function symbolOf(token: Token): string {
  return isEscaped(token) ? token[1] : token;
}
