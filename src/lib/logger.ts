import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  write?: (line: string) => void;
}

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * Format a log entry
 */
export function formatEntry(level: LogLevel, message: string, data?: unknown): string {
  let entry = `[${level.toUpperCase()}] ${message}`;

  if (data !== undefined) {
    if (data instanceof Error) {
      entry += `\n  Error: ${data.message}`;
    } else if (typeof data === 'object' && data !== null) {
      try {
        entry += `\n  Data: ${JSON.stringify(data, null, 2).split('\n').join('\n  ')}`;
      } catch {
        entry += '\n  Data: [Could not serialize]';
      }
    } else {
      entry += `\n  Data: ${String(data)}`;
    }
  }

  return entry;
}

/**
 * Logger writing coloured lines to stderr. Debug lines only show with `verbose`.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => process.stderr.write(line + '\n'));
  const log = (level: LogLevel) => (message: string, data?: unknown) => {
    if (level === 'debug' && !options.verbose) return;
    write(LEVEL_STYLE[level](formatEntry(level, message, data)));
  };
  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}

/**
 * Prefix every message with `[scope]`
 */
export function createScopedLogger(parent: Logger, scope: string): Logger {
  return {
    debug: (message, data) => parent.debug(`[${scope}] ${message}`, data),
    info: (message, data) => parent.info(`[${scope}] ${message}`, data),
    warn: (message, data) => parent.warn(`[${scope}] ${message}`, data),
    error: (message, data) => parent.error(`[${scope}] ${message}`, data),
  };
}
