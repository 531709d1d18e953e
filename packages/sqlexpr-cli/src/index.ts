#!/usr/bin/env node

/**
 * sqlexpr CLI - evaluate and inspect SQL scalar expressions.
 *
 * Provides commands for:
 * - `eval` - Evaluate an expression, optionally against bound columns
 * - `tokens` - Show the token stream
 * - `ast` - Show the parsed tree as JSON or canonical text
 *
 * @module sqlexpr-cli
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';

import { Command } from 'commander';
import { ExpressionEngine } from 'sqlexpr';

import { astCommand, type AstOptions } from './commands/ast.js';
import { evaluateCommand, type EvalOptions } from './commands/eval.js';
import { tokensCommand } from './commands/tokens.js';
import { describeError } from './utils/errors.js';
import { createLogger, type Logger } from './utils/logger.js';

export interface CLIOptions {
  /** Output for results and errors */
  logger?: Logger;
  /** Engine to evaluate with; one is created per command when omitted */
  engine?: ExpressionEngine;
  /** Called with the exit code when a command fails */
  exit?: (code: number) => void;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Creates and configures the sqlexpr CLI program.
 *
 * @example
 * ```typescript
 * const program = createCLI();
 * program.parse(['node', 'sqlexpr', 'eval', 'qty * 2', '--set', 'qty=21']);
 * ```
 */
export function createCLI(options: CLIOptions = {}): Command {
  const program = new Command();
  const logger = options.logger ?? createLogger();
  const exit = options.exit ?? ((code: number) => {
    process.exitCode = code;
  });

  const engine = (): ExpressionEngine => {
    if (options.engine) {
      return options.engine;
    }
    const { verbose } = program.opts<{ verbose?: boolean }>();
    return new ExpressionEngine({ cacheSize: 0, logLevel: verbose ? 'debug' : undefined });
  };

  const run = (action: () => void): void => {
    try {
      action();
    } catch (error) {
      logger.error(describeError(error));
      exit(1);
    }
  };

  program
    .name('sqlexpr')
    .version('0.1.0')
    .description('sqlexpr CLI - evaluate and inspect SQL scalar expressions')
    .option('-v, --verbose', 'Log parser and evaluator activity to stderr', false)
    .hook('preAction', () => {
      if (program.opts<{ verbose?: boolean }>().verbose) {
        logger.setLevel('debug');
      }
    });

  // Eval command
  program
    .command('eval')
    .description('Evaluate an expression')
    .argument('<expression>', 'Expression to evaluate')
    .option('-s, --set <binding>', 'Bind a column, as name=<literal> (repeatable)', collect, [])
    .option('--json', 'Print the result as JSON', false)
    .action((expression: string, opts: EvalOptions) =>
      run(() => {
        logger.debug(`Evaluating with ${opts.set?.length ?? 0} binding(s)`);
        const result = evaluateCommand(expression, opts, engine());
        result.rebound.forEach(name => logger.warn(`Column ${name} bound more than once, using the last value`));
        logger.info(result.output);
      })
    );

  // Tokens command
  program
    .command('tokens')
    .description('Print the token stream of an expression')
    .argument('<expression>', 'Expression to tokenize')
    .action((expression: string) =>
      run(() => {
        logger.lines(tokensCommand(expression));
      })
    );

  // AST command
  program
    .command('ast')
    .description('Print the parsed expression tree')
    .argument('<expression>', 'Expression to parse')
    .option('-f, --format', 'Print canonical expression text instead of JSON', false)
    .action((expression: string, opts: AstOptions) =>
      run(() => {
        logger.info(astCommand(expression, opts, engine()));
      })
    );

  return program;
}

export { evaluateCommand, parseBinding, toJSONValue, type EvalOptions, type EvalResult } from './commands/eval.js';
export { tokensCommand, formatToken } from './commands/tokens.js';
export { astCommand, type AstOptions } from './commands/ast.js';
export { Logger, createLogger, type LoggerOptions } from './utils/logger.js';

// Run CLI if invoked directly
const entry = process.argv[1];
const isMainModule = entry !== undefined && import.meta.url === pathToFileURL(realpathSync(entry)).href;
if (isMainModule) {
  createCLI().parse();
}
