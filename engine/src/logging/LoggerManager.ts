import { LogCategoryEnum, type EngineLoggerConfig, type LogCategory } from '../types/log-types.js';
import { EngineLogger, ScopedLogger } from './EngineLogger.js';
import { LogLevel } from './LogFormat.js';

/**
 * Singleton Logger Manager
 *
 * Provides centralized access to the EngineLogger instance without
 * needing to pass it through constructors.
 *
 * Usage:
 * ```typescript
 * // In the entry point (GraphEngine)
 * LoggerManager.initialize({ level: LogLevel.INFO, source: 'GraphEngine', category: 'system' });
 *
 * // Anywhere else
 * const logger = LoggerManager.for('GraphBuilder', 'analysis');
 * logger.debug('Graph built', { nodes: 12 });
 * ```
 *
 * Graph modules log through `LoggerManager.for()`, which returns a no-op
 * logger until initialize() has been called, so the algorithms stay
 * usable as a plain library.
 */
export class LoggerManager {
  private static instance: EngineLogger | null = null;

  /**
   * Install a logger built from `config`. Each call replaces the previous
   * instance, so the most recently constructed engine decides level,
   * format, colors and sink for the graph modules.
   */
  static initialize(config: Partial<EngineLoggerConfig> = {}): EngineLogger {
    const defaultConfig: EngineLoggerConfig = {
      level: LogLevel.INFO,
      format: 'text',
      colors: true,
      timestamp: true,
      source: 'yxgraph',
      category: LogCategoryEnum.SYSTEM,
    };

    const mergedConfig: EngineLoggerConfig = { ...defaultConfig, ...config };
    const replaced = this.instance !== null;
    this.instance = new EngineLogger(mergedConfig);

    this.instance.debug(replaced ? 'LoggerManager reconfigured' : 'LoggerManager initialized', {
      level: mergedConfig.level,
      format: mergedConfig.format,
      source: mergedConfig.source,
    });

    return this.instance;
  }

  /**
   * Get the logger instance
   *
   * @throws Error if logger not initialized
   */
  static getLogger(): EngineLogger {
    if (!this.instance) {
      throw new Error('[LoggerManager] Logger accessed before initialization. Call LoggerManager.initialize() first.');
    }
    return this.instance;
  }

  /**
   * Component-scoped logger; silent until initialize() has run
   */
  static for(source: string, category: LogCategory): ScopedLogger {
    return new ScopedLogger(this.instance ?? silentLogger, source, category);
  }

  static isReady(): boolean {
    return this.instance !== null;
  }

  /**
   * Reset the logger instance (useful for testing)
   */
  static reset(): void {
    this.instance = null;
  }
}

const silentLogger = new EngineLogger({
  level: LogLevel.FATAL,
  source: 'yxgraph',
  category: LogCategoryEnum.SYSTEM,
  sink: () => {},
});
