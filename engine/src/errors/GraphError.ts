/**
 * Base Graph Error Class
 *
 * Every error the engine raises names the tools it is about, so the CLI
 * and any embedding UI can point at them without parsing messages.
 *
 * @module errors
 */

import {
  ExitCodes,
  GraphErrorCode,
  ErrorSeverity,
  getErrorCategory,
  getExitCodeForError,
  getSuggestedAction,
} from './ErrorCodes.js';
import type { ToolId } from '../types/graph-types.js';

export interface GraphErrorDiagnostic {
  code: GraphErrorCode;
  message: string;
  severity: ErrorSeverity;
  /** Defaults to the exit code mapped from `code` */
  exitCode?: ExitCodes;
  /** File the problem was found in */
  path?: string;
  /** Defaults to the suggested action for `code` */
  hint?: string;
  /** Tools the problem is about, in the order they should be reported */
  toolIds?: readonly ToolId[];
  context?: Record<string, unknown>;
}

/**
 * Serialized form used by the JSON formatter
 */
export interface GraphErrorJSON {
  name: string;
  code: GraphErrorCode;
  exitCode: ExitCodes;
  severity: ErrorSeverity;
  message: string;
  path?: string;
  toolIds: ToolId[];
  hint: string;
  context?: Record<string, unknown>;
}

/**
 * @example
 * ```typescript
 * throw new GraphError({
 *   code: GraphErrorCode.VALIDATION_DUPLICATE_ID,
 *   message: 'Duplicate ToolID "7"',
 *   severity: ErrorSeverity.ERROR,
 *   toolIds: ['7'],
 * });
 * ```
 */
export class GraphError extends Error {
  readonly code: GraphErrorCode;
  readonly exitCode: ExitCodes;
  readonly severity: ErrorSeverity;
  readonly path?: string;
  readonly hint: string;
  readonly toolIds: readonly ToolId[];
  readonly context?: Record<string, unknown>;

  constructor(diagnostic: GraphErrorDiagnostic) {
    super(diagnostic.message);
    this.name = getErrorCategory(diagnostic.code);
    this.code = diagnostic.code;
    this.exitCode = diagnostic.exitCode ?? getExitCodeForError(diagnostic.code);
    this.severity = diagnostic.severity;
    this.path = diagnostic.path;
    this.hint = diagnostic.hint ?? getSuggestedAction(diagnostic.code);
    this.toolIds = Object.freeze([...(diagnostic.toolIds ?? [])]);
    this.context = diagnostic.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * `Name [code] at path: message`, then the tools and the hint on their own lines
   */
  toString(): string {
    const lines = [`${this.name} [${this.code}]${this.path ? ` at ${this.path}` : ''}: ${this.message}`];
    if (this.toolIds.length > 0) {
      lines.push(`Tools: ${this.toolIds.join(', ')}`);
    }
    lines.push(`Hint: ${this.hint}`);
    return lines.join('\n');
  }

  toJSON(): GraphErrorJSON {
    return {
      name: this.name,
      code: this.code,
      exitCode: this.exitCode,
      severity: this.severity,
      message: this.message,
      ...(this.path !== undefined && { path: this.path }),
      toolIds: [...this.toolIds],
      hint: this.hint,
      ...(this.context !== undefined && { context: this.context }),
    };
  }
}
