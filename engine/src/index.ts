/**
 * yxgraph engine - Alteryx workflow graph analysis
 *
 * @example
 * ```ts
 * import { GraphEngine } from '@yxgraph/engine';
 *
 * const engine = new GraphEngine();
 * const session = await engine.open('./workflow.yxmd');
 * console.log(session.executionOrder());
 * ```
 */

// ============================================================================
// PRIMARY EXPORT - Start here!
// ============================================================================

export { GraphEngine } from './core/GraphEngine.js';
export { WorkflowSession } from './core/WorkflowSession.js';

// ============================================================================
// TYPES - Essential types for working with the engine
// ============================================================================

export type { WorkflowSummary, ToolContext } from './core/WorkflowSession.js';

export type {
  GraphEngineConfig,
  ResolvedEngineConfig,
  EngineLogLevel,
} from './core/EngineConfig.js';
export { applyConfigDefaults, validateConfig } from './core/EngineConfig.js';

export * from './types/graph-types.js';
export * from './types/log-types.js';

// ============================================================================
// ADVANCED - Graph algorithms, parsers and infrastructure
// ============================================================================

// Graph analysis
export * from './graph/index.js';

// Parsers (for validation and custom tooling)
export * from './parser/index.js';
export * from './loader/index.js';

// Errors
export * from './errors/index.js';

// Logging
export { EngineLogger, ScopedLogger } from './logging/EngineLogger.js';
export { LoggerManager } from './logging/LoggerManager.js';
export * from './logging/LogFormat.js';
