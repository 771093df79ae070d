#!/usr/bin/env node
import { Command } from 'commander';
import * as E from 'fp-ts/Either';
import { pipe } from 'fp-ts/function';
import { renderEvaluation } from '../core/evaluate';
import { CalculatorConfig, ConfigOverrides, loadConfig } from './config';
import { createLogger } from './logger';
import { startRepl } from './repl';

const pkg = {
  name: 'decicalc',
  version: '1.0.0',
  description:
    'Left-to-right arithmetic calculator that prints results as exact decimals',
};

type CliOptions = {
  prompt?: string;
  quiet?: boolean;
  historySize?: string;
  logLevel?: string;
};

export function evaluateOnce(
  expression: string,
  io: { stdout: NodeJS.WritableStream; stderr: NodeJS.WritableStream }
): number {
  return pipe(
    renderEvaluation(expression),
    E.match(
      (message) => {
        io.stderr.write(`${message}\n`);
        return 1;
      },
      (formatted) => {
        io.stdout.write(`${formatted}\n`);
        return 0;
      }
    )
  );
}

async function run(expression: string[], config: CalculatorConfig) {
  const logger = createLogger(pkg.name, { level: config.logLevel });
  logger.debug('configuration loaded', config);

  if (expression.length > 0) {
    process.exitCode = evaluateOnce(expression.join(' '), {
      stdout: process.stdout,
      stderr: process.stderr,
    });
    return;
  }

  await startRepl({
    input: process.stdin,
    output: process.stdout,
    config,
    logger,
  });
}

export const program = new Command()
  .name(pkg.name)
  .description(pkg.description)
  .version(pkg.version)
  .argument('[expression...]', 'expression to evaluate once, then exit')
  .option('-p, --prompt <prompt>', 'REPL prompt')
  .option('-q, --quiet', 'skip the REPL banner')
  .option('--history-size <n>', 'number of lines kept in REPL history')
  .option('--log-level <level>', 'debug, info, warn or error')
  .action(async (expression: string[], options: CliOptions) => {
    const overrides: ConfigOverrides = {
      prompt: options.prompt,
      quiet: options.quiet,
      historySize: options.historySize,
      logLevel: options.logLevel,
    };

    await pipe(
      loadConfig(process.env, overrides),
      E.match(
        async (message) => {
          console.error(message);
          process.exitCode = 1;
        },
        (config) => run(expression, config)
      )
    );
  });

if (require.main === module) {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
