import {
  analyzeDFA,
  simplifyStateNames,
} from '../nfa-to-dfa/dfa-analysis.js';
import { toPostfixTrace } from '../regex-compiler/postfix.js';
import type { CompiledRegex, Verdicts } from '../regex-compiler/regex.js';
import { Table } from '../utils/data-structures/table.js';
import { colors } from '../utils/debug.js';
import type { CrossTestResult } from './batch.js';

function yesNo(verdict: boolean) {
  return verdict ? 'yes' : 'no';
}

/**
 * Describe every stage of a compilation. Verbose reports add the syntax tree
 * and the transition table of each automaton, with the subset DFA's states
 * also given short `q` names.
 */
export function formatCompilation(
  compiled: CompiledRegex,
  { verbose = false }: { verbose?: boolean } = {}
): string {
  const { nfa, dfa, minDFA } = compiled;
  const lines = [
    `regex      : ${compiled.expression}`,
    `desugared  : ${compiled.desugared}`,
    `postfix    : ${compiled.postfix.join(' ')}`,
  ];
  if (compiled.issues.length > 0) {
    lines.push(colors.yellow('nfa issues:'));
    for (const issue of compiled.issues) {
      lines.push(`  - ${issue.message}`);
    }
  }
  lines.push(
    `states     : nfa ${nfa.numStates}, dfa ${dfa.numStates}, ` +
      `minimal dfa ${minDFA.numStates}`
  );
  if (verbose) {
    lines.push('syntax tree:', compiled.tree.toDebugStr());
    lines.push('shunting-yard steps:');
    for (const { action, output, stack } of toPostfixTrace(compiled.tokens)
      .steps) {
      lines.push(`  ${action.padEnd(14)} out: ${output.join(' ')}`);
      lines.push(`  ${''.padEnd(14)} ops: ${stack.join(' ')}`);
    }
    lines.push('nfa:', nfa.toDebugStr());
    lines.push(dfa.toDebugStr());
    const { mapping } = simplifyStateNames(dfa);
    lines.push(
      'dfa states renamed: ' +
        [...mapping].map(([state, name]) => `${name} = ${state}`).join(', ')
    );
    lines.push(minDFA.toDebugStr());
    const { complete, missingEdges } = analyzeDFA(minDFA);
    lines.push(
      complete
        ? 'minimal dfa is complete'
        : 'minimal dfa is missing edges: ' +
            missingEdges
              .map(({ state, symbol }) => `δ(${state}, ${symbol})`)
              .join(', ')
    );
  }
  return lines.join('\n');
}

export function formatVerdicts(compiled: CompiledRegex, v: Verdicts): string {
  const lines = [
    `word       : ${JSON.stringify(v.word)}`,
    `  nfa      : ${yesNo(v.nfa)}`,
    `  dfa      : ${yesNo(v.dfa)}`,
    `  min dfa  : ${yesNo(v.minDFA)}`,
    v.equivalent
      ? colors.green('all automata agree')
      : colors.red('automata disagree'),
  ];
  const verdict = v.accepted ? 'is accepted by' : 'is rejected by';
  const line = `${JSON.stringify(v.word)} ${verdict} ${compiled.expression}`;
  lines.push(v.accepted ? colors.green(line) : colors.red(line));
  return lines.join('\n');
}

/**
 * A table with a row per expression and a column per word.
 */
export function formatCrossTable({
  expressions,
  words,
  rows,
}: CrossTestResult): string {
  const table: Table<string> = Table.init(
    1 + expressions.length,
    1 + words.length,
    () => ''
  );
  words.forEach((word, wi) => table.setCell(0, wi + 1, word));
  expressions.forEach((expression, ei) => {
    table.setCell(ei + 1, 0, expression);
    rows[ei].forEach((cell, wi) =>
      table.setCell(
        ei + 1,
        wi + 1,
        cell.match(yesNo, () => 'error')
      )
    );
  });
  return table.toDebugStr();
}
