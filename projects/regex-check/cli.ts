#!/usr/bin/env node
import fs from 'fs';
import { hideBin } from 'yargs/helpers';
import yargs from 'yargs/yargs';
import { checkWord, compileRegex } from '../regex-compiler/regex.js';
import { colors, logger, useColors } from '../utils/debug.js';
import {
  crossTest,
  crossTestSucceeded,
  isSuccess,
  pairSequential,
  readExpressions,
  readWords,
  runBatch,
  splitLines,
} from './batch.js';
import {
  formatCompilation,
  formatCrossTable,
  formatVerdicts,
} from './report.js';

type CommonArgs = { verbose: boolean; color: boolean };

function setup({ verbose, color }: CommonArgs) {
  useColors(color);
  if (verbose) {
    logger.subscribe((level, line) => {
      if (level == 'warn') {
        console.error(colors.yellow(`warning: ${line}`));
      }
    });
  }
}

function readLines(file: string): string[] {
  return splitLines(fs.readFileSync(file).toString());
}

function check(
  expression: string,
  word: string | undefined,
  verbose: boolean
) {
  const maybeCompiled = compileRegex(expression);
  if (maybeCompiled.isErr()) {
    console.error(colors.red(maybeCompiled.error.message));
    return false;
  }
  const compiled = maybeCompiled.value;
  console.log(formatCompilation(compiled, { verbose }));
  if (word === undefined) {
    return true;
  }
  const verdicts = checkWord(compiled, word);
  console.log(formatVerdicts(compiled, verdicts));
  return verdicts.equivalent;
}

function batch(
  file: string,
  stringsFile: string | undefined,
  cross: boolean,
  verbose: boolean
) {
  const expressions = readExpressions(readLines(file));
  const words =
    stringsFile === undefined ? [] : readWords(readLines(stringsFile));

  if (cross) {
    const result = crossTest(expressions, words);
    console.log(
      `cross test: ${expressions.length} expressions x ${words.length} words`
    );
    console.log(formatCrossTable(result));
    result.rows.forEach((row, ei) => {
      const failed = row.find((cell) => cell.isErr());
      if (failed !== undefined && failed.isErr()) {
        console.error(colors.red(failed.error.message));
      } else if (row.length == 0) {
        console.log(`${expressions[ei]}: no words to check`);
      }
    });
    return crossTestSucceeded(result);
  }

  const { outcomes, succeeded, total } = runBatch(
    pairSequential(expressions, words)
  );
  outcomes.forEach((outcome, i) => {
    console.log(colors.bold(`\n=== #${i + 1} ===`));
    if (outcome.result.isErr()) {
      console.error(colors.red(outcome.result.error.message));
      return;
    }
    const { compiled, verdicts } = outcome.result.value;
    console.log(formatCompilation(compiled, { verbose }));
    if (verdicts !== undefined) {
      console.log(formatVerdicts(compiled, verdicts));
    }
  });
  const summary = `\n${succeeded}/${total} succeeded`;
  console.log(
    succeeded == total ? colors.green(summary) : colors.red(summary)
  );
  return outcomes.every(isSuccess);
}

yargs(hideBin(process.argv))
  .scriptName('regex-check')
  .option('verbose', {
    alias: 'v',
    describe: 'print syntax trees, transition tables and warnings',
    type: 'boolean',
    default: false,
  })
  .option('color', {
    describe: 'colorize output',
    type: 'boolean',
    default: Boolean(process.stdout.isTTY),
  })
  .command(
    'check <regex> [word]',
    'compile an expression and optionally check a word against it',
    (yargs) =>
      yargs
        .positional('regex', {
          describe: 'expression to compile',
          type: 'string',
          demandOption: true,
        })
        .positional('word', {
          describe: 'word to check; ε for the empty word',
          type: 'string',
        }),
    (argv) => {
      setup(argv);
      if (!check(argv.regex, argv.word, argv.verbose)) {
        process.exitCode = 1;
      }
    }
  )
  .command(
    'batch <file>',
    'compile every expression in a file, one per line',
    (yargs) =>
      yargs
        .positional('file', {
          describe: 'file of expressions; # starts a comment line',
          type: 'string',
          demandOption: true,
        })
        .option('strings', {
          describe: 'file of words, one per line',
          type: 'string',
        })
        .option('cross', {
          describe: 'check every word against every expression',
          type: 'boolean',
          default: false,
        }),
    (argv) => {
      setup(argv);
      if (argv.cross && argv.strings === undefined) {
        console.error(colors.red('--cross needs --strings'));
        process.exitCode = 1;
        return;
      }
      if (!batch(argv.file, argv.strings, argv.cross, argv.verbose)) {
        process.exitCode = 1;
      }
    }
  )
  .demandCommand(1)
  .strict()
  .parseSync();
