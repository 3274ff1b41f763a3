/**
 * CLI Common Options
 *
 * Options every `yxgraph` command accepts.
 */

/**
 * Output format
 */
export type OutputFormat = 'human' | 'json';

export interface CliCommonOptions {
  /**
   * Output format; falls back to the config file, then `human`
   */
  format?: OutputFormat;

  /**
   * Colored output (`--no-color` sets false)
   */
  color?: boolean;

  /**
   * Verbose output (debug logs, stack traces)
   */
  verbose?: boolean;

  /**
   * Path to a YAML config file
   */
  config?: string;
}
