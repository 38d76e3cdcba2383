/**
 * tierdata — Logging
 *
 * Structured logger used by the command-line layer. The resolution core
 * never logs; it reports failures through Result values.
 */

import chalk from 'chalk';

/** Log severity levels, least severe first. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_TAGS: Readonly<Record<LogLevel, (text: string) => string>> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

/** A structured log entry. */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  /** ISO 8601 timestamp. */
  readonly timestamp: string;
  readonly fields?: Readonly<Record<string, unknown>> | undefined;
}

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

export interface ConsoleLoggerOptions {
  /** Entries below this level are dropped. Default: 'info'. */
  readonly minLevel?: LogLevel | undefined;
  /** Write entries to the console as they arrive. Default: true. */
  readonly outputToConsole?: boolean | undefined;
}

/**
 * Console-backed logger.
 * Keeps every accepted entry in `entries` for inspection.
 */
export class ConsoleLogger implements Logger {
  readonly entries: LogEntry[] = [];

  private readonly minLevel: LogLevel;
  private readonly outputToConsole: boolean;

  constructor(options?: ConsoleLoggerOptions) {
    this.minLevel = options?.minLevel ?? 'info';
    this.outputToConsole = options?.outputToConsole ?? true;
  }

  log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      fields: fields === undefined ? undefined : { ...fields },
    };
    this.entries.push(entry);

    if (this.outputToConsole) {
      const line = formatLogLine(entry, LEVEL_TAGS[level]);
      if (level === 'warn' || level === 'error') console.error(line);
      else console.log(line);
    }
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log('debug', message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log('info', message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log('warn', message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log('error', message, fields);
  }
}

/** Render an entry as `[LEVEL] message {fields}`. */
export function formatLogLine(entry: LogEntry, colour: (text: string) => string = (text) => text): string {
  const tag = colour(`[${entry.level.toUpperCase()}]`);
  const fields = entry.fields === undefined ? '' : ` ${JSON.stringify(entry.fields)}`;
  return `${tag} ${entry.message}${fields}`;
}
