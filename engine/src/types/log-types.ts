import type { LogFormat, LogLevel } from '../logging/LogFormat.js';

/**
 * Log categories (phase-based, not feature-based)
 *
 * - 'system': Engine lifecycle, configuration
 * - 'loading': Reading files, XML/table parsing
 * - 'analysis': Graph building, ordering, container resolution
 *
 * Never add tool-type or business domain categories here.
 */
export enum LogCategoryEnum {
  SYSTEM = 'system',
  LOADING = 'loading',
  ANALYSIS = 'analysis',
}

export type LogCategory = `${LogCategoryEnum}`;

/**
 * Where formatted log lines go
 */
export type LogSink = (line: string, level: LogLevel) => void;

/**
 * Engine logger configuration
 */
export interface EngineLoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  /** Output format */
  format?: LogFormat;
  /** Enable colors in output */
  colors?: boolean;
  /** Include timestamps */
  timestamp?: boolean;
  /** Default source identifier */
  source: string;
  /** Default log category */
  category: LogCategory;
  /** Output target; stderr when omitted */
  sink?: LogSink;
}

/**
 * Logs exported for tooling
 */
export interface ExportedLogs {
  total: number;
  byLevel: Record<string, number>;
  byCategory: Record<string, number>;
  timeRange: { first?: Date; last?: Date };
}
