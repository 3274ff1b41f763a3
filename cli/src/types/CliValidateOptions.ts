/**
 * CLI Validate Command Options
 *
 * Command-line options for the `yxgraph validate` command.
 */

import type { CliCommonOptions } from './CliCommonOptions.js';

export type CliValidateOptions = CliCommonOptions;
