/**
 * Graph Engine - Main Public API
 *
 * Loads workflows and hands back a WorkflowSession for each one.
 * Every call builds an independent graph; nothing is shared between
 * sessions except configuration and the logger.
 *
 * @example
 * ```ts
 * const engine = new GraphEngine({ logLevel: 'warn' });
 * const session = await engine.open('./sales.yxmd');
 *
 * session.executionOrder();            // ['1', '2', '5', ...]
 * session.childTools('10');            // tools inside container 10
 * session.orderSelection(['7', '3']);  // ['3', '7']
 * ```
 *
 * @module core
 */

import { GraphBuilder } from '../graph/GraphBuilder.js';
import { WorkflowLoader } from '../loader/WorkflowLoader.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import type { EngineLogger } from '../logging/EngineLogger.js';
import { TableParser } from '../parser/TableParser.js';
import { YxmdParser } from '../parser/YxmdParser.js';
import { LogCategoryEnum } from '../types/log-types.js';
import { applyConfigDefaults, toLoggerLevel, validateConfig, type GraphEngineConfig, type ResolvedEngineConfig } from './EngineConfig.js';
import { WorkflowSession } from './WorkflowSession.js';
import type { WorkflowTables } from '../types/graph-types.js';

export class GraphEngine {
  private readonly config: ResolvedEngineConfig;
  private readonly logger: EngineLogger;

  constructor(config: GraphEngineConfig = {}) {
    // Validate and apply defaults
    validateConfig(config);
    this.config = applyConfigDefaults(config);

    this.logger = LoggerManager.initialize({
      level: toLoggerLevel(this.config.logLevel),
      format: this.config.logFormat,
      colors: this.config.colors,
      source: 'GraphEngine',
      category: LogCategoryEnum.SYSTEM,
      sink: this.config.logSink,
    });

    this.logger.debug('GraphEngine created', {
      logLevel: this.config.logLevel,
      strictScope: this.config.strictScope,
      excludedChildTypes: [...this.config.excludedChildTypes],
    });
  }

  /**
   * Load a workflow file (.yxmd, .yxmc, .yxwz, .xml, .json, .yaml, .yml)
   *
   * @throws WorkflowLoadError, WorkflowParseError, DuplicateNodeError, DanglingConnectionError
   */
  async open(filePath: string): Promise<WorkflowSession> {
    const tables = await WorkflowLoader.fromFile(filePath);
    return this.createSession(tables, filePath);
  }

  /**
   * Session from Alteryx XML already in memory
   */
  fromYxmd(xml: string, source?: string): WorkflowSession {
    return this.createSession(YxmdParser.parse(xml, source), source);
  }

  /**
   * Session from a decoded `{ nodes, connections }` table document
   */
  fromTables(value: unknown, source?: string): WorkflowSession {
    return this.createSession(TableParser.parse(value, source), source);
  }

  getConfig(): Readonly<ResolvedEngineConfig> {
    return this.config;
  }

  getLogger(): EngineLogger {
    return this.logger;
  }

  private createSession(tables: WorkflowTables, source?: string): WorkflowSession {
    const graph = GraphBuilder.fromTables(tables);

    this.logger.info('Workflow loaded', {
      ...(source !== undefined && { source }),
      tools: graph.nodes.size,
      connections: graph.connections.length,
    }, LogCategoryEnum.LOADING);

    return new WorkflowSession(graph, this.config, source);
  }
}
