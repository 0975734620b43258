import { MalformedExpressionError } from './errors.js';
import { EPSILON, ESCAPE, Op } from './tokens.js';

/**
 * Whether the character at pos is escaped, i.e. preceded by an odd number of
 * consecutive backslashes.
 */
export function isEscapedAt(expr: string, pos: number): boolean {
  let count = 0;
  for (let k = pos - 1; k >= 0 && expr[k] == ESCAPE; k--) {
    count++;
  }
  return count % 2 == 1;
}

function isLive(expr: string, pos: number, char: string) {
  return expr[pos] == char && !isEscapedAt(expr, pos);
}

function desugarFrom(expr: string, offset: number): string {
  const n = expr.length;
  let out = '';
  let i = 0;
  while (i < n) {
    // step 1: find the next unit
    let unit: string;
    if (expr[i] == ESCAPE && i + 1 < n) {
      if (expr[i + 1] == EPSILON) {
        throw new MalformedExpressionError(
          `escaped ${EPSILON} at position ${offset + i} is not a symbol`
        );
      }
      unit = expr.slice(i, i + 2);
      i += 2;
    } else if (isLive(expr, i, Op.OPEN_PAREN)) {
      const start = i;
      let depth = 1;
      i++;
      while (i < n && depth > 0) {
        if (isLive(expr, i, Op.OPEN_PAREN)) {
          depth++;
        } else if (isLive(expr, i, Op.CLOSE_PAREN)) {
          depth--;
        }
        i++;
      }
      if (depth > 0) {
        throw new MalformedExpressionError(
          `unclosed ( at position ${offset + start}`
        );
      }
      const inner = desugarFrom(
        expr.slice(start + 1, i - 1),
        offset + start + 1
      );
      unit = `(${inner})`;
    } else {
      unit = expr[i];
      i++;
    }

    // step 2: expand the sugar operator that follows it, if any
    if (isLive(expr, i, Op.PLUS)) {
      out += `${unit}${unit}${Op.STAR}`;
      i++;
    } else if (isLive(expr, i, Op.OPTIONAL)) {
      out += `(${unit}${Op.OR}${EPSILON})`;
      i++;
    } else {
      out += unit;
    }
  }
  return out;
}

/**
 * Rewrite `+` and `?` in terms of `*` and `|`:
 *
 *   x+  =>  xx*
 *   x?  =>  (x|ε)
 *
 * where x is a literal, an escaped pair, or a parenthesized group (which is
 * desugared recursively).
 */
export function desugar(expr: string): string {
  return desugarFrom(expr, 0);
}
