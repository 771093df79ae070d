import * as E from 'fp-ts/Either';
import { z } from 'zod';
import { LOG_LEVELS } from './logger';

const booleanFlag = z.union([
  z.boolean(),
  z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1'),
]);

export const configSchema = z.object({
  prompt: z.string().default('> '),
  historySize: z.coerce.number().int().min(0).default(100),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  quiet: booleanFlag.default(false),
});

export type CalculatorConfig = z.infer<typeof configSchema>;

export type ConfigOverrides = Partial<{
  prompt: string;
  historySize: string | number;
  logLevel: string;
  quiet: boolean;
}>;

type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Builds the front-end configuration from `DECICALC_*` environment variables
 * and command-line overrides. Overrides win over the environment; anything
 * left unset takes the schema default.
 */
export function loadConfig(
  env: Environment,
  overrides: ConfigOverrides = {}
): E.Either<string, CalculatorConfig> {
  const parsed = configSchema.safeParse({
    prompt: overrides.prompt ?? env.DECICALC_PROMPT,
    historySize: overrides.historySize ?? env.DECICALC_HISTORY_SIZE,
    logLevel: overrides.logLevel ?? env.DECICALC_LOG_LEVEL,
    quiet: overrides.quiet ?? env.DECICALC_QUIET,
  });

  return parsed.success
    ? E.right(parsed.data)
    : E.left(
        `Invalid configuration: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ')}`
      );
}
