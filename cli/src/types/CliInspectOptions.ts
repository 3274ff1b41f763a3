/**
 * CLI Inspect Command Options
 *
 * Command-line options for the `yxgraph inspect` command.
 */

import type { CliCommonOptions } from './CliCommonOptions.js';

export interface CliInspectOptions extends CliCommonOptions {
  /**
   * Show neighbours, frames and containers of one tool
   */
  tool?: string;
}
