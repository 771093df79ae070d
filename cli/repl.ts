import { once } from 'node:events';
import { createInterface } from 'node:readline';
import * as E from 'fp-ts/Either';
import { pipe } from 'fp-ts/function';
import { renderEvaluation, stripWhitespace } from '../core/evaluate';
import { CalculatorConfig } from './config';
import { Logger } from './logger';

export const BANNER = [
  'decicalc - exact decimal calculator',
  "Enter expressions like '123+456' or '123*1e6'",
  'Press Ctrl+C to exit',
];

export type ReplOptions = {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  config: CalculatorConfig;
  logger: Logger;
};

/**
 * Returns the line to print for one line of input, or `undefined` when the
 * line is blank and should be skipped.
 */
export function evaluateLine(line: string): string | undefined {
  if (!stripWhitespace(line)) {
    return undefined;
  }

  return pipe(
    renderEvaluation(line),
    E.getOrElse((message) => message)
  );
}

/**
 * Reads expressions line by line until the input closes. Every error is
 * reported on its own line and the loop keeps going.
 */
export async function startRepl({
  input,
  output,
  config,
  logger,
}: ReplOptions): Promise<void> {
  const log = logger.child('repl');
  const rl = createInterface({
    input,
    output,
    prompt: config.prompt,
    historySize: config.historySize,
  });

  if (!config.quiet) {
    output.write(BANNER.map((line) => `${line}\n`).join(''));
  }

  rl.on('line', (line) => {
    const rendered = evaluateLine(line);

    if (rendered !== undefined) {
      log.debug('evaluated', { expression: line, output: rendered });
      output.write(`${rendered}\n`);
    }

    rl.prompt();
  });

  const closed = once(rl, 'close');
  rl.prompt();
  await closed;
  log.debug('input closed');
}
