/**
 * Formatter Factory
 *
 * Creates the appropriate formatter based on user options.
 * This is the single point where formatters are instantiated.
 */

import type { Formatter, FormatterOptions } from './Formatter.js';
import { HumanFormatter } from './HumanFormatter.js';
import { JsonFormatter } from './JsonFormatter.js';
import type { OutputFormat } from '../types/CliCommonOptions.js';

/**
 * Supported formatter types
 */
export type FormatterType = OutputFormat;

/**
 * Available formatter types as a set for validation
 */
const VALID_FORMATTER_TYPES: ReadonlySet<string> = new Set(['human', 'json']);

export function isFormatterType(value: string): value is FormatterType {
  return VALID_FORMATTER_TYPES.has(value);
}

export function formatterTypes(): string[] {
  return Array.from(VALID_FORMATTER_TYPES);
}

/**
 * Create a formatter instance
 *
 * @example
 * ```ts
 * // Create a human-readable formatter
 * const formatter = createFormatter('human', { noColor: false });
 *
 * // Create a machine-readable JSON formatter
 * const jsonFormatter = createFormatter('json', { verbose: true });
 * ```
 */
export function createFormatter(type: FormatterType = 'human', options: FormatterOptions = {}): Formatter {
  switch (type) {
    case 'human':
      return new HumanFormatter(options);

    case 'json':
      return new JsonFormatter(options);

    default: {
      // TypeScript exhaustiveness check - should never reach here
      const exhaustiveCheck: never = type;
      throw new Error(`Unhandled formatter type: ${String(exhaustiveCheck)}`);
    }
  }
}
