/**
 * yxgraph Error Codes
 *
 * Structured diagnostic codes for the workflow graph engine, plus the
 * process exit codes the CLI terminates with.
 *
 * TWO-LAYER SYSTEM:
 * ================
 * 1. Exit Codes: process termination status for the CLI and shell scripts
 *    - Example: ExitCodes.CIRCULAR_DEPENDENCY (106) for a cyclic workflow
 *
 * 2. Error Codes: detailed diagnostic codes
 *    - Used internally for precise error identification
 *    - Map onto exit codes through getExitCodeForError()
 *    - Example: YXG-V-003 (cycle detected) → ExitCodes.CIRCULAR_DEPENDENCY
 *
 * Format: YXG-[Category]-[Number]
 *
 * Categories:
 * - S: Schema/Parse errors (malformed XML, invalid tables)
 * - V: Validation errors (duplicate ids, dangling connections, cycles)
 * - R: Runtime errors (file not found, unsupported format)
 *
 * ADDING NEW ERRORS:
 * =================
 * 1. Add error code enum value below
 * 2. Add suggested action in getSuggestedAction()
 * 3. Add exit code mapping in getExitCodeForError() if it needs its own
 * 4. Add an error class in WorkflowError.ts
 *
 * @module errors
 */

/**
 * Process exit codes
 */
export enum ExitCodes {
  SUCCESS = 0,
  GENERAL_ERROR = 1,

  // Input problems (100-199)
  INVALID_FORMAT = 102,
  INVALID_SCHEMA = 103,
  INVALID_FILE = 104,
  VALIDATION_FAILED = 105,
  CIRCULAR_DEPENDENCY = 106,
  INVALID_CONFIG = 107,

  // System problems (200-254; shells only see the low byte)
  INTERNAL_ERROR = 200,
  FILESYSTEM_ERROR = 206,
}

export enum GraphErrorCode {
  // ============================================================================
  // SCHEMA ERRORS (S) - Input could not be read as a workflow
  // Exit Code: ExitCodes.INVALID_SCHEMA (103)
  // ============================================================================

  /** Malformed XML/JSON/YAML syntax */
  SCHEMA_PARSE_ERROR = 'YXG-S-001',

  /** Document parsed but does not have the workflow shape */
  SCHEMA_INVALID_STRUCTURE = 'YXG-S-002',

  // ============================================================================
  // VALIDATION ERRORS (V) - Graph structure problems
  // Exit Code: ExitCodes.VALIDATION_FAILED (105)
  // ============================================================================

  /** Two tools share an id */
  VALIDATION_DUPLICATE_ID = 'YXG-V-001',

  /** Connection references a tool that does not exist */
  VALIDATION_DANGLING_CONNECTION = 'YXG-V-002',

  /** Connections form a cycle */
  VALIDATION_CYCLE_DETECTED = 'YXG-V-003',

  /** Containers nest inside each other in a loop */
  VALIDATION_CONTAINER_CYCLE = 'YXG-V-004',

  /** Scope lists ids that are not tools of the workflow */
  VALIDATION_UNKNOWN_SCOPE_ID = 'YXG-V-005',

  // ============================================================================
  // RUNTIME ERRORS (R) - Filesystem and configuration
  // Exit Code: ExitCodes.FILESYSTEM_ERROR (206), ExitCodes.INTERNAL_ERROR (200)
  // ============================================================================

  /** Workflow file does not exist */
  RUNTIME_FILE_NOT_FOUND = 'YXG-R-001',

  /** File extension is not a supported workflow format */
  RUNTIME_UNSUPPORTED_FORMAT = 'YXG-R-002',

  /** File exists but could not be read */
  RUNTIME_READ_FAILED = 'YXG-R-003',

  /** Engine configuration is invalid */
  RUNTIME_INVALID_CONFIG = 'YXG-R-004',

  /** Internal engine error */
  RUNTIME_INTERNAL_ERROR = 'YXG-R-005',
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  /** Unrecoverable internal failure */
  CRITICAL = 'critical',

  /** Operation cannot complete */
  ERROR = 'error',

  /** Operation completed but something looks wrong */
  WARNING = 'warning',

  /** Informational message */
  INFO = 'info',
}

/**
 * Get human-readable category name from error code
 *
 * @example
 * ```typescript
 * getErrorCategory(GraphErrorCode.VALIDATION_CYCLE_DETECTED);
 * // Returns: "Validation Error"
 * ```
 */
export function getErrorCategory(code: GraphErrorCode): string {
  if (code.startsWith('YXG-S-')) return 'Schema Error';
  if (code.startsWith('YXG-V-')) return 'Validation Error';
  if (code.startsWith('YXG-R-')) return 'Runtime Error';
  return 'Unknown Error';
}

/**
 * Map an error code to the process exit code
 *
 * @example
 * ```typescript
 * getExitCodeForError(GraphErrorCode.VALIDATION_CYCLE_DETECTED);
 * // Returns: ExitCodes.CIRCULAR_DEPENDENCY (106)
 * ```
 */
export function getExitCodeForError(code: GraphErrorCode): ExitCodes {
  if (code.startsWith('YXG-S-')) {
    if (code === GraphErrorCode.SCHEMA_PARSE_ERROR) {
      return ExitCodes.INVALID_FORMAT;
    }
    return ExitCodes.INVALID_SCHEMA;
  }

  if (code.startsWith('YXG-V-')) {
    if (
      code === GraphErrorCode.VALIDATION_CYCLE_DETECTED ||
      code === GraphErrorCode.VALIDATION_CONTAINER_CYCLE
    ) {
      return ExitCodes.CIRCULAR_DEPENDENCY;
    }
    return ExitCodes.VALIDATION_FAILED;
  }

  switch (code) {
    case GraphErrorCode.RUNTIME_FILE_NOT_FOUND:
    case GraphErrorCode.RUNTIME_UNSUPPORTED_FORMAT:
      return ExitCodes.INVALID_FILE;
    case GraphErrorCode.RUNTIME_READ_FAILED:
      return ExitCodes.FILESYSTEM_ERROR;
    case GraphErrorCode.RUNTIME_INVALID_CONFIG:
      return ExitCodes.INVALID_CONFIG;
    default:
      return ExitCodes.INTERNAL_ERROR;
  }
}

/**
 * Human-readable description of an exit code
 */
export function getExitCodeDescription(exitCode: ExitCodes): string {
  switch (exitCode) {
    case ExitCodes.SUCCESS:
      return 'success';
    case ExitCodes.INVALID_FORMAT:
      return 'invalid format';
    case ExitCodes.INVALID_SCHEMA:
      return 'invalid schema';
    case ExitCodes.INVALID_FILE:
      return 'invalid file';
    case ExitCodes.VALIDATION_FAILED:
      return 'validation failed';
    case ExitCodes.CIRCULAR_DEPENDENCY:
      return 'circular dependency';
    case ExitCodes.INVALID_CONFIG:
      return 'invalid configuration';
    case ExitCodes.FILESYSTEM_ERROR:
      return 'filesystem error';
    case ExitCodes.INTERNAL_ERROR:
      return 'internal error';
    default:
      return 'general error';
  }
}

/**
 * Get suggested action for an error code
 */
export function getSuggestedAction(code: GraphErrorCode): string {
  const actions: Record<GraphErrorCode, string> = {
    [GraphErrorCode.SCHEMA_PARSE_ERROR]: 'Re-export the workflow from Alteryx or fix the file syntax',
    [GraphErrorCode.SCHEMA_INVALID_STRUCTURE]: 'Check the document against the expected workflow layout',

    [GraphErrorCode.VALIDATION_DUPLICATE_ID]: 'Give each tool a unique ToolID',
    [GraphErrorCode.VALIDATION_DANGLING_CONNECTION]: 'Remove the connection or add the missing tool',
    [GraphErrorCode.VALIDATION_CYCLE_DETECTED]: 'Remove one of the connections that closes the loop',
    [GraphErrorCode.VALIDATION_CONTAINER_CYCLE]: 'Fix the container nesting so no container contains itself',
    [GraphErrorCode.VALIDATION_UNKNOWN_SCOPE_ID]: 'Check the ToolIDs passed as scope',

    [GraphErrorCode.RUNTIME_FILE_NOT_FOUND]: 'Check the file path exists and is accessible',
    [GraphErrorCode.RUNTIME_UNSUPPORTED_FORMAT]: 'Use a .yxmd, .yxmc, .yxwz, .xml, .json, .yaml or .yml file',
    [GraphErrorCode.RUNTIME_READ_FAILED]: 'Check file permissions',
    [GraphErrorCode.RUNTIME_INVALID_CONFIG]: 'Fix the configuration value',
    [GraphErrorCode.RUNTIME_INTERNAL_ERROR]: 'Report the bug with the full error details',
  };

  return actions[code] ?? 'Review error details';
}
