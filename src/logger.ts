import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, data?: object): void;
  info(message: string, data?: object): void;
  warn(message: string, data?: object): void;
  error(message: string, error?: unknown): void;
  /** Logger that prefixes every line with a component name. */
  child(scope: string): Logger;
}

export interface LogSink {
  write(chunk: string): unknown;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Defaults to stderr so JSON output on stdout stays clean. */
  stream?: LogSink;
  scope?: string;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * Format one log line: `LEVEL [scope] message {data}`
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  scope?: string,
  extra?: object | unknown,
): string {
  let line = `${LEVEL_STYLE[level](level.toUpperCase().padEnd(5))} `;
  if (scope) line += chalk.dim(`[${scope}] `);
  line += message;

  if (extra instanceof Error) {
    line += chalk.dim(` (${extra.message})`);
  } else if (extra !== undefined && extra !== null) {
    line += chalk.dim(` ${typeof extra === 'object' ? JSON.stringify(extra) : String(extra)}`);
  }

  return line;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'info'];
  const stream = options.stream ?? process.stderr;

  const write = (level: LogLevel, message: string, extra?: unknown) => {
    if (LEVEL_RANK[level] < threshold) return;
    stream.write(formatLogLine(level, message, options.scope, extra) + '\n');
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, error) => write('error', message, error),
    child: (scope) =>
      createConsoleLogger({
        ...options,
        scope: options.scope ? `${options.scope}:${scope}` : scope,
      }),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
