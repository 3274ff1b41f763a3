/**
 * Engine Logger
 *
 * Structured logging for the graph engine. Every entry has a level, a
 * source (the component that logged it) and a category (the phase).
 * Entries are kept in memory so tooling can export them after a run.
 *
 * @module logging
 */

import {
  LogLevel,
  createLogEntry,
  formatLog,
  shouldLog,
  type LogEntry,
  type LogFormatOptions,
} from './LogFormat.js';
import type {
  EngineLoggerConfig,
  ExportedLogs,
  LogCategory,
  LogSink,
} from '../types/log-types.js';

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export class EngineLogger {
  private config: Required<Omit<EngineLoggerConfig, 'sink'>>;
  private formatOptions: LogFormatOptions;
  private sink: LogSink;
  private history: LogEntry[] = [];

  constructor(config: EngineLoggerConfig) {
    this.config = {
      level: config.level,
      format: config.format ?? 'text',
      colors: config.colors ?? true,
      timestamp: config.timestamp ?? true,
      source: config.source,
      category: config.category,
    };
    this.sink = config.sink ?? stderrSink;

    this.formatOptions = {
      format: this.config.format,
      colors: this.config.colors,
      timestamp: this.config.timestamp,
    };
  }

  debug(message: string, context?: Record<string, unknown>, category?: LogCategory, source?: string): void {
    this.log(LogLevel.DEBUG, message, { context, category, source });
  }

  info(message: string, context?: Record<string, unknown>, category?: LogCategory, source?: string): void {
    this.log(LogLevel.INFO, message, { context, category, source });
  }

  warn(message: string, context?: Record<string, unknown>, category?: LogCategory, source?: string): void {
    this.log(LogLevel.WARN, message, { context, category, source });
  }

  error(message: string, error?: Error, context?: Record<string, unknown>, category?: LogCategory, source?: string): void {
    this.log(LogLevel.ERROR, message, { context, category, source, error });
  }

  private log(
    level: LogLevel,
    message: string,
    details: {
      context?: Record<string, unknown>;
      category?: LogCategory;
      source?: string;
      error?: Error;
    }
  ): void {
    if (!shouldLog(level, this.config.level)) {
      return;
    }

    const entry = createLogEntry(level, message, {
      source: details.source ?? this.config.source,
      category: details.category ?? this.config.category,
      context: details.context,
      error: details.error,
    });

    this.history.push(entry);
    this.sink(formatLog(entry, this.formatOptions), level);
  }

  /**
   * Logger bound to a component name, so callers don't repeat it
   */
  child(source: string, category: LogCategory): ScopedLogger {
    return new ScopedLogger(this, source, category);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  willLog(level: LogLevel): boolean {
    return shouldLog(level, this.config.level);
  }

  getConfig(): Readonly<Omit<EngineLoggerConfig, 'sink'>> {
    return { ...this.config };
  }

  getHistory(): readonly LogEntry[] {
    return [...this.history];
  }

  /**
   * Counts of recorded entries, grouped for tooling
   */
  exportLogs(): ExportedLogs {
    const byLevel: Record<string, number> = {};
    const byCategory: Record<string, number> = {};

    for (const entry of this.history) {
      byLevel[entry.level] = (byLevel[entry.level] ?? 0) + 1;
      const category = entry.category ?? 'uncategorized';
      byCategory[category] = (byCategory[category] ?? 0) + 1;
    }

    return {
      total: this.history.length,
      byLevel,
      byCategory,
      timeRange: {
        first: this.history[0]?.timestamp,
        last: this.history[this.history.length - 1]?.timestamp,
      },
    };
  }

  getJSONLogs(): string {
    return JSON.stringify(
      this.history.map((entry) => ({ ...entry, timestamp: entry.timestamp.toISOString() })),
      null,
      2
    );
  }
}

/**
 * Thin wrapper fixing source and category
 */
export class ScopedLogger {
  constructor(
    private readonly logger: EngineLogger,
    private readonly source: string,
    private readonly category: LogCategory
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(message, context, this.category, this.source);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(message, context, this.category, this.source);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(message, context, this.category, this.source);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.logger.error(message, error, context, this.category, this.source);
  }
}
