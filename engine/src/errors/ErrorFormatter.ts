/**
 * Error Formatter
 *
 * Formats graph errors for terminal display.
 *
 * USAGE:
 * =====
 * ```typescript
 * console.error(formatError(error));
 * console.error(formatError(error, false, true));
 * ```
 *
 * @module errors
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { GraphError } from './GraphError.js';
import { ErrorSeverity, getExitCodeDescription } from './ErrorCodes.js';

const colored = new Chalk();
const plain = new Chalk({ level: 0 });

function palette(useColors: boolean): ChalkInstance {
  return useColors ? colored : plain;
}

/**
 * Format error for CLI display
 *
 * @param useColors - Whether to use ANSI colors (default: true)
 * @param verbose - Show exit code and context (default: false)
 */
export function formatError(
  error: GraphError,
  useColors: boolean = true,
  verbose: boolean = false
): string {
  const c = palette(useColors);
  const color = getSeverityColor(error.severity, c);
  const lines: string[] = [];

  lines.push(`${color(`${getSeverityIcon(error.severity)} ${error.name}`)} ${c.gray(`[${error.code}]`)}`);

  if (error.path) {
    lines.push(`${c.dim('at')} ${c.cyan(error.path)}`);
  }

  lines.push('');
  lines.push(c.bold(error.message));

  if (error.toolIds.length > 0) {
    lines.push(`${c.dim('Tools:')} ${error.toolIds.join(', ')}`);
  }

  if (error.hint) {
    lines.push('');
    lines.push(`${c.blue('→ Hint:')} ${error.hint}`);
  }

  if (verbose) {
    lines.push('');
    lines.push(`${c.dim('Exit Code:')} ${error.exitCode} (${getExitCodeDescription(error.exitCode)})`);

    if (error.context && Object.keys(error.context).length > 0) {
      lines.push('');
      lines.push(c.dim('Context:'));
      lines.push(c.gray(JSON.stringify(error.context, null, 2)));
    }
  }

  return lines.join('\n');
}

function getSeverityIcon(severity: ErrorSeverity): string {
  switch (severity) {
    case ErrorSeverity.CRITICAL:
    case ErrorSeverity.ERROR:
      return '\u2717'; // ✗
    case ErrorSeverity.WARNING:
      return '\u26A0'; // ⚠
    case ErrorSeverity.INFO:
      return '\u2139'; // ℹ
    default:
      return '\u2022'; // •
  }
}

function getSeverityColor(severity: ErrorSeverity, c: ChalkInstance): ChalkInstance {
  switch (severity) {
    case ErrorSeverity.CRITICAL:
    case ErrorSeverity.ERROR:
      return c.red;
    case ErrorSeverity.WARNING:
      return c.yellow;
    case ErrorSeverity.INFO:
      return c.blue;
    default:
      return c.reset;
  }
}
