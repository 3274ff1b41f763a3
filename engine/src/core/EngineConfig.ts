/**
 * Engine Configuration
 *
 * User-facing configuration for GraphEngine.
 * Provides sensible defaults and clear options for engine behavior.
 *
 * @module core
 */

import { ConfigError } from '../errors/WorkflowError.js';
import { DEFAULT_EXCLUDED_CHILD_TYPES } from '../graph/ChildResolver.js';
import { LogLevel, type LogFormat } from '../logging/LogFormat.js';
import type { LogSink } from '../types/log-types.js';

/**
 * Logging level for engine output
 */
export type EngineLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly EngineLogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const LOG_FORMATS: readonly LogFormat[] = ['text', 'pretty', 'json'];

/**
 * Engine configuration options
 *
 * All options are optional with sensible defaults.
 *
 * @example
 * ```ts
 * const engine = new GraphEngine({
 *   logLevel: 'warn',
 *   excludedChildTypes: ['ToolContainer', 'BrowseV2', 'Comment'],
 *   strictScope: true,
 * });
 * ```
 */
export interface GraphEngineConfig {
  // === Logging ===

  /**
   * @default 'info'
   */
  logLevel?: EngineLogLevel;

  /**
   * Enable verbose output (equivalent to logLevel='debug')
   * @default false
   */
  verbose?: boolean;

  /**
   * @default 'text'
   */
  logFormat?: LogFormat;

  /**
   * Colorize log lines
   * @default true
   */
  colors?: boolean;

  /**
   * Where log lines go
   * @default stderr
   */
  logSink?: LogSink;

  // === Analysis ===

  /**
   * Tool types left out of child tool listings
   * @default ['ToolContainer', 'BrowseV2']
   */
  excludedChildTypes?: readonly string[];

  /**
   * Reject scope ids that are not tools instead of ignoring them
   * @default false
   */
  strictScope?: boolean;
}

export type ResolvedEngineConfig = Required<Omit<GraphEngineConfig, 'logSink'>> & Pick<GraphEngineConfig, 'logSink'>;

/**
 * Apply default values to engine configuration
 */
export function applyConfigDefaults(config: GraphEngineConfig = {}): ResolvedEngineConfig {
  return {
    logLevel: config.verbose ? 'debug' : (config.logLevel ?? 'info'),
    verbose: config.verbose ?? false,
    logFormat: config.logFormat ?? 'text',
    colors: config.colors ?? true,
    logSink: config.logSink,
    excludedChildTypes: config.excludedChildTypes ?? DEFAULT_EXCLUDED_CHILD_TYPES,
    strictScope: config.strictScope ?? false,
  };
}

/**
 * Validate engine configuration
 *
 * @throws ConfigError if configuration is invalid
 */
export function validateConfig(config: GraphEngineConfig): void {
  if (config.logLevel !== undefined && !LOG_LEVELS.includes(config.logLevel)) {
    throw new ConfigError(`Invalid logLevel: ${config.logLevel}`, { allowed: [...LOG_LEVELS] });
  }

  if (config.logFormat !== undefined && !LOG_FORMATS.includes(config.logFormat)) {
    throw new ConfigError(`Invalid logFormat: ${config.logFormat}`, { allowed: [...LOG_FORMATS] });
  }

  if (config.excludedChildTypes !== undefined) {
    const blank = config.excludedChildTypes.filter((type) => type.trim() === '');
    if (blank.length > 0) {
      throw new ConfigError('excludedChildTypes must not contain empty tool types');
    }
  }
}

/**
 * Engine log level → logger threshold. `silent` keeps only fatal entries,
 * which the engine never writes.
 */
export function toLoggerLevel(level: EngineLogLevel): LogLevel {
  switch (level) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.FATAL;
  }
}
