/**
 * CLI Order Command Options
 *
 * Command-line options for the `yxgraph order` command.
 */

import type { CliCommonOptions } from './CliCommonOptions.js';

export interface CliOrderOptions extends CliCommonOptions {
  /**
   * Restrict ordering to these tool ids, e.g. `"[3, 7, 12]"` or `3,7,12`
   */
  scope?: string;

  /**
   * Group tools into phases instead of a single sequence
   */
  phases?: boolean;
}
