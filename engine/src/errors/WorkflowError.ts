/**
 * Workflow Graph Errors
 *
 * Specific error types raised while reading a workflow and building,
 * ordering or walking its graph. Each one carries the offending ids as
 * typed fields so a UI can highlight them.
 *
 * USAGE:
 * =====
 * ```typescript
 * // ❌ Bad: Generic error
 * throw new Error('duplicate id 7');
 *
 * // ✅ Good: Structured error with diagnostics
 * throw new DuplicateNodeError('7');
 * ```
 *
 * None of these are retryable: they are deterministic structural checks.
 *
 * @module errors
 */

import { GraphError } from './GraphError.js';
import { GraphErrorCode, ErrorSeverity } from './ErrorCodes.js';
import type { Connection, ToolId } from '../types/graph-types.js';

/**
 * Two tools share the same id
 */
export class DuplicateNodeError extends GraphError {
  readonly nodeId: ToolId;

  constructor(nodeId: ToolId) {
    super({
      code: GraphErrorCode.VALIDATION_DUPLICATE_ID,
      message: `Duplicate ToolID "${nodeId}"`,
      severity: ErrorSeverity.ERROR,
      hint: `Each tool must have a unique ToolID; "${nodeId}" appears more than once`,
      toolIds: [nodeId],
    });
    this.nodeId = nodeId;
  }
}

/**
 * A connection references a tool that is not in the workflow.
 * Whether to drop the connection or abort is the caller's decision.
 */
export class DanglingConnectionError extends GraphError {
  readonly missingId: ToolId;
  readonly connection: Connection;

  constructor(missingId: ToolId, connection: Connection) {
    const end = missingId === connection.sourceId ? 'source' : 'target';
    super({
      code: GraphErrorCode.VALIDATION_DANGLING_CONNECTION,
      message: `Connection ${connection.sourceId} → ${connection.targetId} references unknown ToolID "${missingId}"`,
      severity: ErrorSeverity.ERROR,
      hint: `Add tool "${missingId}" or remove the connection`,
      toolIds: [missingId],
      context: {
        end,
        sourceId: connection.sourceId,
        targetId: connection.targetId,
      },
    });
    this.missingId = missingId;
    this.connection = connection;
  }
}

/**
 * Connections form at least one cycle, so no execution order exists
 */
export class CycleDetectedError extends GraphError {
  /** Every id that lies on at least one cycle, ascending */
  readonly nodeIds: ReadonlySet<ToolId>;
  /** One representative cycle, first id repeated at the end */
  readonly cyclePath: readonly ToolId[];

  constructor(nodeIds: readonly ToolId[], cyclePath: readonly ToolId[] = []) {
    const path = cyclePath.length > 0 ? `: ${cyclePath.join(' → ')}` : '';
    super({
      code: GraphErrorCode.VALIDATION_CYCLE_DETECTED,
      message: `Circular connection detected${path}`,
      severity: ErrorSeverity.ERROR,
      hint: `Tools ${nodeIds.join(', ')} are connected in a loop. Remove a connection to break it.`,
      toolIds: nodeIds,
      context: { cyclePath: [...cyclePath] },
    });
    this.nodeIds = new Set(nodeIds);
    this.cyclePath = Object.freeze([...cyclePath]);
  }
}

/**
 * A container is, directly or indirectly, its own ancestor
 */
export class ContainerCycleError extends GraphError {
  readonly containerId: ToolId;
  /** Containment chain ending at the repeated id */
  readonly cyclePath: readonly ToolId[];

  constructor(containerId: ToolId, cyclePath: readonly ToolId[]) {
    super({
      code: GraphErrorCode.VALIDATION_CONTAINER_CYCLE,
      message: `Container "${containerId}" contains itself: ${cyclePath.join(' ⊃ ')}`,
      severity: ErrorSeverity.ERROR,
      toolIds: [...new Set(cyclePath)],
      context: { cyclePath: [...cyclePath] },
    });
    this.containerId = containerId;
    this.cyclePath = Object.freeze([...cyclePath]);
  }
}

/**
 * Scope ids that are not tools of the workflow (only with strictScope)
 */
export class ScopeError extends GraphError {
  readonly unknownIds: readonly ToolId[];

  constructor(unknownIds: readonly ToolId[]) {
    super({
      code: GraphErrorCode.VALIDATION_UNKNOWN_SCOPE_ID,
      message: `Scope contains unknown ToolIDs: ${unknownIds.join(', ')}`,
      severity: ErrorSeverity.ERROR,
      toolIds: unknownIds,
    });
    this.unknownIds = Object.freeze([...unknownIds]);
  }
}

/**
 * Workflow document could not be parsed or has the wrong shape
 */
export class WorkflowParseError extends GraphError {
  constructor(
    message: string,
    options: { source?: string; structural?: boolean; issues?: readonly string[]; cause?: unknown } = {}
  ) {
    super({
      code: options.structural
        ? GraphErrorCode.SCHEMA_INVALID_STRUCTURE
        : GraphErrorCode.SCHEMA_PARSE_ERROR,
      message,
      path: options.source,
      severity: ErrorSeverity.ERROR,
      context: options.issues && options.issues.length > 0 ? { issues: [...options.issues] } : undefined,
    });
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Workflow file could not be located or read
 */
export class WorkflowLoadError extends GraphError {
  static fileNotFound(filePath: string): WorkflowLoadError {
    return new WorkflowLoadError({
      code: GraphErrorCode.RUNTIME_FILE_NOT_FOUND,
      message: `Workflow file not found: ${filePath}`,
      path: filePath,
      severity: ErrorSeverity.ERROR,
    });
  }

  static unsupportedFormat(filePath: string, extension: string, supported: readonly string[]): WorkflowLoadError {
    return new WorkflowLoadError({
      code: GraphErrorCode.RUNTIME_UNSUPPORTED_FORMAT,
      message: `Unsupported workflow format "${extension || '(none)'}"`,
      path: filePath,
      severity: ErrorSeverity.ERROR,
      hint: `Use one of: ${supported.join(', ')}`,
      context: { extension },
    });
  }

  static readFailed(filePath: string, cause: unknown): WorkflowLoadError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const error = new WorkflowLoadError({
      code: GraphErrorCode.RUNTIME_READ_FAILED,
      message: `Failed to read workflow file: ${reason}`,
      path: filePath,
      severity: ErrorSeverity.ERROR,
    });
    error.cause = cause;
    return error;
  }
}

/**
 * Engine configuration is invalid
 */
export class ConfigError extends GraphError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      code: GraphErrorCode.RUNTIME_INVALID_CONFIG,
      message,
      severity: ErrorSeverity.ERROR,
      context,
    });
  }
}
