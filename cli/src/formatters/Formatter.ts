/**
 * Base Formatter Interface
 *
 * All formatters must implement this interface.
 * Formatters are the ONLY place where console output is allowed in the CLI.
 *
 * Separation of Concerns:
 * - Command: Loads the workflow and builds a report
 * - Formatter: Decides how the report looks (colors, alignment, structure)
 * - Console: Where output goes (stdout for results, stderr for errors)
 *
 * Engine log lines go to stderr through the engine logger and never mix
 * with formatter output on stdout.
 */

import type { CliReport } from '../types/CliReport.js';

/**
 * Formatter options
 */
export interface FormatterOptions {
  /** Enable verbose output (stack traces, error context) */
  verbose?: boolean;

  /** Disable colors (for CI/CD or terminals without color support) */
  noColor?: boolean;
}

export interface Formatter {
  /**
   * Display the result of a command
   */
  showReport(report: CliReport): void;

  /**
   * Display an error. Graph errors show their code and hint.
   */
  showError(error: Error): void;

  /**
   * Display a warning on stderr. The command still succeeds.
   */
  showWarning(message: string): void;
}
