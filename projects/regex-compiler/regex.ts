import { err, ok, Result } from 'neverthrow';
import { determinize, type DFAFromNFA } from '../nfa-to-dfa/dfa.js';
import { minimize, type MinimizedDFA } from '../nfa-to-dfa/minimize.js';
import type { NFA } from '../nfa-to-dfa/nfa.js';
import {
  type NFAIssue,
  renumberNFA,
  validateNFA,
} from '../nfa-to-dfa/nfa-validation.js';
import { compileNFA } from '../nfa-to-dfa/regex-nfa.js';
import { simulateDFA, simulateNFA } from '../nfa-to-dfa/simulate.js';
import { logger } from '../utils/debug.js';
import { desugar } from './desugar.js';
import { RegexError } from './errors.js';
import { tokenize } from './lexer.js';
import { buildTree, type RNode } from './parser.js';
import { toPostfix } from './postfix.js';
import type { Token } from './tokens.js';

/**
 * Every intermediate product of compiling one expression.
 */
export type CompiledRegex = {
  expression: string;
  desugared: string;
  tokens: Token[];
  postfix: Token[];
  tree: RNode;
  /**
   * The Thompson NFA with its states renumbered breadth first.
   */
  nfa: NFA;
  /**
   * Structural problems found in the Thompson NFA before renumbering.
   */
  issues: NFAIssue[];
  dfa: DFAFromNFA;
  minDFA: MinimizedDFA<string>;
};

export type Verdicts = {
  word: string;
  nfa: boolean;
  dfa: boolean;
  minDFA: boolean;
  /**
   * The NFA's verdict.
   */
  accepted: boolean;
  /**
   * Whether all three automata agree.
   */
  equivalent: boolean;
};

function compile(expression: string): CompiledRegex {
  const desugared = desugar(expression);
  const tokens = tokenize(desugared);
  const postfix = toPostfix(tokens);
  const tree = buildTree(postfix);
  logger.log(`compiling ${JSON.stringify(expression)}`);
  logger.log('desugared:', desugared);
  logger.log('tokens:', tokens.join(' '));
  logger.log('postfix:', postfix.join(' '));

  const thompson = compileNFA(tree);
  const issues = validateNFA(thompson);
  for (const issue of issues) {
    logger.warn(`${JSON.stringify(expression)}: ${issue.message}`);
  }
  const nfa = renumberNFA(thompson);
  const dfa = determinize(nfa);
  const minDFA = minimize(dfa);
  logger.log(
    `nfa: ${nfa.numStates} states, dfa: ${dfa.numStates} states, ` +
      `minimal dfa: ${minDFA.numStates} states`
  );
  return {
    expression,
    desugared,
    tokens,
    postfix,
    tree,
    nfa,
    issues,
    dfa,
    minDFA,
  };
}

/**
 * Compile an expression all the way to its minimal DFA.
 *
 * @throws RegexError with the expression attached when the expression is
 * malformed.
 */
export function compileRegexOrThrow(expression: string): CompiledRegex {
  try {
    return compile(expression);
  } catch (e) {
    if (e instanceof RegexError) {
      throw e.attachExpression(expression);
    }
    throw e;
  }
}

export function compileRegex(
  expression: string
): Result<CompiledRegex, RegexError> {
  try {
    return ok(compileRegexOrThrow(expression));
  } catch (e) {
    if (e instanceof RegexError) {
      return err(e);
    }
    throw e;
  }
}

/**
 * Run a word through the NFA, the DFA and the minimal DFA of a compiled
 * expression.
 */
export function checkWord(compiled: CompiledRegex, word: string): Verdicts {
  const nfa = simulateNFA(compiled.nfa, word);
  const dfa = simulateDFA(compiled.dfa, word);
  const minDFA = simulateDFA(compiled.minDFA, word);
  const equivalent = nfa == dfa && dfa == minDFA;
  if (!equivalent) {
    logger.warn(
      `automata for ${JSON.stringify(compiled.expression)} disagree on ` +
        `${JSON.stringify(word)}: nfa=${nfa} dfa=${dfa} minDFA=${minDFA}`
    );
  }
  return { word, nfa, dfa, minDFA, accepted: nfa, equivalent };
}

export class Regex {
  readonly pattern: string;
  readonly compiled: CompiledRegex;
  constructor(pattern: string) {
    this.pattern = pattern;
    this.compiled = compileRegexOrThrow(pattern);
  }

  /**
   * Whether the whole word matches the pattern.
   */
  test(word: string): boolean {
    return checkWord(this.compiled, word).accepted;
  }
}
