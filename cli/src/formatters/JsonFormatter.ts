/**
 * JSON Formatter
 *
 * Outputs structured JSON for:
 * - Machine parsing
 * - CI/CD integration
 * - Editor and notebook tooling
 *
 * Each report is one JSON document on stdout; errors go to stderr.
 */

import { GraphError } from '@yxgraph/engine';
import type { Formatter, FormatterOptions } from './Formatter.js';
import type { CliReport } from '../types/CliReport.js';

export class JsonFormatter implements Formatter {
  private options: FormatterOptions;

  constructor(options: FormatterOptions = {}) {
    this.options = options;
  }

  /**
   * Report as a single JSON document, indented in verbose mode
   */
  showReport(report: CliReport): void {
    console.log(JSON.stringify(report, null, this.options.verbose ? 2 : undefined));
  }

  /**
   * Display an error as JSON
   */
  showError(error: Error): void {
    const jsonError = {
      type: 'error',
      timestamp: new Date().toISOString(),
      error:
        error instanceof GraphError
          ? error.toJSON()
          : {
              message: error.message,
              name: error.name,
              ...(this.options.verbose && { stack: error.stack }),
            },
    };

    console.error(JSON.stringify(jsonError));
  }

  /**
   * Display a warning as JSON
   */
  showWarning(message: string): void {
    const jsonWarning = {
      type: 'warning',
      timestamp: new Date().toISOString(),
      message,
    };

    console.error(JSON.stringify(jsonWarning));
  }
}
