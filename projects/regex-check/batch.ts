import { err, ok, Result } from 'neverthrow';
import type { RegexError } from '../regex-compiler/errors.js';
import {
  checkWord,
  type CompiledRegex,
  compileRegex,
  type Verdicts,
} from '../regex-compiler/regex.js';

/**
 * Expressions from the lines of a file. Blank lines and lines starting
 * with `#` are skipped.
 */
export function readExpressions(lines: Iterable<string>): string[] {
  const expressions: string[] = [];
  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed.length > 0 && !trimmed.startsWith('#')) {
      expressions.push(trimmed);
    }
  }
  return expressions;
}

/**
 * Words from the lines of a file, one per non-blank line.
 */
export function readWords(lines: Iterable<string>): string[] {
  const words: string[] = [];
  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed.length > 0) {
      words.push(trimmed);
    }
  }
  return words;
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

export type BatchItem = { expression: string; word?: string };

/**
 * Pair the i-th expression with the i-th word. When one list runs out
 * first, its last entry is reused for the rest of the other. Without any
 * words, each expression is paired with no word at all.
 */
export function pairSequential(
  expressions: readonly string[],
  words: readonly string[]
): BatchItem[] {
  if (expressions.length == 0) {
    return [];
  }
  if (words.length == 0) {
    return expressions.map((expression) => ({ expression }));
  }
  const count = Math.max(expressions.length, words.length);
  const items: BatchItem[] = [];
  for (let i = 0; i < count; i++) {
    items.push({
      expression: expressions[Math.min(i, expressions.length - 1)],
      word: words[Math.min(i, words.length - 1)],
    });
  }
  return items;
}

export type BatchSuccess = {
  compiled: CompiledRegex;
  verdicts?: Verdicts;
};

export type BatchOutcome = BatchItem & {
  result: Result<BatchSuccess, RegexError>;
};

export type BatchSummary = {
  outcomes: BatchOutcome[];
  succeeded: number;
  total: number;
};

/**
 * An item succeeds when its expression compiles and, if it has a word, the
 * three automata agree on it.
 */
export function isSuccess(outcome: BatchOutcome): boolean {
  return outcome.result.match(
    ({ verdicts }) => verdicts === undefined || verdicts.equivalent,
    () => false
  );
}

/**
 * Compile and check every item. An expression that fails to compile is
 * recorded with its error and the rest of the batch still runs.
 */
export function runBatch(items: readonly BatchItem[]): BatchSummary {
  const compiled: Map<string, Result<CompiledRegex, RegexError>> = new Map();
  const outcomes: BatchOutcome[] = items.map(({ expression, word }) => {
    let compilation = compiled.get(expression);
    if (compilation === undefined) {
      compilation = compileRegex(expression);
      compiled.set(expression, compilation);
    }
    const result = compilation.map(
      (c): BatchSuccess =>
        word === undefined
          ? { compiled: c }
          : { compiled: c, verdicts: checkWord(c, word) }
    );
    return word === undefined
      ? { expression, result }
      : { expression, word, result };
  });
  return {
    outcomes,
    succeeded: outcomes.filter(isSuccess).length,
    total: outcomes.length,
  };
}

export type CrossTestResult = {
  expressions: string[];
  words: string[];
  /**
   * One row per expression, one cell per word: the NFA verdict, or the
   * error the expression failed to compile with.
   */
  rows: Result<boolean, RegexError>[][];
};

/**
 * Check every word against every expression.
 */
export function crossTest(
  expressions: readonly string[],
  words: readonly string[]
): CrossTestResult {
  const rows = expressions.map((expression) => {
    const compilation = compileRegex(expression);
    return words.map(
      (word): Result<boolean, RegexError> =>
        compilation.isOk()
          ? ok(checkWord(compilation.value, word).accepted)
          : err(compilation.error)
    );
  });
  return { expressions: [...expressions], words: [...words], rows };
}

/**
 * Whether every expression in a cross test compiled.
 */
export function crossTestSucceeded({ rows }: CrossTestResult): boolean {
  return rows.every((row) => row.every((cell) => cell.isOk()));
}
