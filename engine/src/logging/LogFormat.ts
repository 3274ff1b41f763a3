/**
 * Log entry primitives
 *
 * Levels, entries and the three output formats shared by the engine logger
 * and the CLI.
 *
 * @module logging
 */

import { Chalk, type ChalkInstance } from 'chalk';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
}

/**
 * Numeric severity per level, for threshold comparison
 */
export const LogLevelSeverity: Readonly<Record<LogLevel, number>> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.FATAL]: 4,
};

export type LogFormat = 'text' | 'pretty' | 'json';

export interface LogEntry {
  readonly timestamp: Date;
  readonly level: LogLevel;
  readonly message: string;
  readonly source?: string;
  readonly category?: string;
  readonly context?: Record<string, unknown>;
  readonly error?: {
    readonly name: string;
    readonly message: string;
    readonly stack?: string;
  };
}

export interface LogFormatOptions {
  format: LogFormat;
  colors: boolean;
  timestamp: boolean;
}

/**
 * Whether a message at `level` passes a `threshold`
 */
export function shouldLog(level: LogLevel, threshold: LogLevel): boolean {
  return LogLevelSeverity[level] >= LogLevelSeverity[threshold];
}

export function createLogEntry(
  level: LogLevel,
  message: string,
  details: {
    source?: string;
    category?: string;
    context?: Record<string, unknown>;
    error?: Error;
  } = {}
): LogEntry {
  return {
    timestamp: new Date(),
    level,
    message,
    source: details.source,
    category: details.category,
    context: details.context && Object.keys(details.context).length > 0 ? details.context : undefined,
    error: details.error
      ? { name: details.error.name, message: details.error.message, stack: details.error.stack }
      : undefined,
  };
}

/**
 * Render an entry as a single line (`text`, `json`) or a multi-line block
 * (`pretty`).
 *
 * @example
 * ```typescript
 * formatLog(entry, { format: 'text', colors: false, timestamp: false });
 * // "[INFO] [GraphBuilder] Graph built {"nodes":3}"
 * ```
 */
export function formatLog(entry: LogEntry, options: LogFormatOptions): string {
  if (options.format === 'json') {
    return JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      source: entry.source,
      category: entry.category,
      message: entry.message,
      context: entry.context,
      error: entry.error,
    });
  }

  const c = new Chalk({ level: options.colors ? 1 : 0 });
  const parts: string[] = [];

  if (options.timestamp) {
    parts.push(c.gray(entry.timestamp.toISOString()));
  }
  parts.push(levelColor(entry.level, c)(`[${entry.level.toUpperCase()}]`));
  if (entry.source) {
    parts.push(c.cyan(`[${entry.source}]`));
  }
  parts.push(entry.message);

  if (options.format === 'pretty') {
    const lines = [parts.join(' ')];
    if (entry.context) {
      for (const [key, value] of Object.entries(entry.context)) {
        lines.push(c.dim(`    ${key}: ${JSON.stringify(value)}`));
      }
    }
    if (entry.error) {
      lines.push(c.red(`    ${entry.error.name}: ${entry.error.message}`));
    }
    return lines.join('\n');
  }

  if (entry.context) {
    parts.push(c.dim(JSON.stringify(entry.context)));
  }
  if (entry.error) {
    parts.push(c.red(`(${entry.error.name}: ${entry.error.message})`));
  }
  return parts.join(' ');
}

function levelColor(level: LogLevel, c: ChalkInstance): ChalkInstance {
  switch (level) {
    case LogLevel.DEBUG:
      return c.gray;
    case LogLevel.INFO:
      return c.blue;
    case LogLevel.WARN:
      return c.yellow;
    case LogLevel.ERROR:
    case LogLevel.FATAL:
      return c.red;
  }
}
