/**
 * CLI Children Command Options
 *
 * Command-line options for the `yxgraph children` command.
 */

import type { CliCommonOptions } from './CliCommonOptions.js';

export interface CliChildrenOptions extends CliCommonOptions {
  /**
   * Only tools whose container is exactly this one
   */
  direct?: boolean;

  /**
   * Keep nested containers and browse tools in the listing
   */
  allTypes?: boolean;
}
