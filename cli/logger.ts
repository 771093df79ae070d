export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly [LogLevel, ...LogLevel[]] = [
  'debug',
  'info',
  'warn',
  'error',
];

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
  silent?: boolean;
  colors?: boolean;
}

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
};

const labels: Record<LogLevel, string> = {
  debug: colors.gray + '[debug]' + colors.reset,
  info: colors.blue + '[info]' + colors.reset,
  warn: colors.yellow + '[warn]' + colors.reset,
  error: colors.red + '[error]' + colors.reset,
};

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Leveled console logger for the command-line front end.
 *
 * Diagnostics go to stderr so they never interleave with evaluation results
 * on stdout.
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly context: string;
  private readonly silent: boolean;
  private readonly useColors: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.context = options.context ?? '';
    this.silent = options.silent ?? false;
    this.useColors = options.colors ?? process.stderr.isTTY ?? false;
  }

  format(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>
  ): string {
    const label = this.useColors ? labels[level] : `[${level}]`;
    const context = !this.context
      ? ''
      : this.useColors
      ? ` ${colors.dim}(${this.context})${colors.reset}`
      : ` (${this.context})`;

    let output = `${label}${context} ${message}`;

    if (data) {
      output += ` ${JSON.stringify(data)}`;
    }

    return output;
  }

  shouldLog(level: LogLevel): boolean {
    return !this.silent && levelPriority[level] >= levelPriority[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.error(this.format('debug', message, data));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.error(this.format('info', message, data));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.error(this.format('warn', message, data));
    }
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      console.error(this.format('error', message, data));
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      silent: this.silent,
      colors: this.useColors,
    });
  }
}

export function createLogger(
  context?: string,
  options?: Omit<LoggerOptions, 'context'>
): Logger {
  return new Logger({ ...options, context });
}
