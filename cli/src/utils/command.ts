/**
 * Shared plumbing for workflow commands: common options, config merge,
 * engine setup and exit codes.
 *
 * @module utils
 */

import { InvalidArgumentError, type Command } from 'commander';
import {
  ExitCodes,
  GraphEngine,
  GraphError,
  UNKNOWN_TOOL_TYPE,
  type ToolId,
  type WorkflowSession,
} from '@yxgraph/engine';
import { createFormatter, formatterTypes, isFormatterType } from '../formatters/createFormatter.js';
import type { Formatter } from '../formatters/Formatter.js';
import type { CliCommonOptions, OutputFormat } from '../types/CliCommonOptions.js';
import type { ToolRef } from '../types/CliReport.js';
import { loadCliConfig, resolveCliOptions, type ResolvedCliOptions } from './config.js';

export interface CommandContext {
  /** Workflow path as the user typed it */
  workflow: string;
  session: WorkflowSession;
  formatter: Formatter;
  options: ResolvedCliOptions;
}

/**
 * commander argument parser for `--format`
 */
export function parseFormat(value: string): OutputFormat {
  if (!isFormatterType(value)) {
    throw new InvalidArgumentError(`Expected one of: ${formatterTypes().join(', ')}`);
  }
  return value;
}

/**
 * Options every workflow command takes
 */
export function addCommonOptions(command: Command): Command {
  return command
    .option('-f, --format <format>', 'Output format (human|json)', parseFormat)
    .option('--no-color', 'Disable colored output')
    .option('--verbose', 'Show debug logs and error details')
    .option('--config <file>', 'Path to a YAML config file');
}

/**
 * Exit status for an error: a graph error's own exit code, otherwise a
 * general failure
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof GraphError ? error.exitCode : ExitCodes.GENERAL_ERROR;
}

/**
 * Load the workflow, run `action` against it and report any error.
 *
 * @returns process exit status
 */
export async function runWorkflowCommand(
  workflow: string,
  options: CliCommonOptions,
  action: (context: CommandContext) => void | Promise<void>
): Promise<number> {
  // Flags only until the config file is read, so config errors are reported too
  let formatter = createFormatter(options.format ?? 'human', {
    noColor: options.color === false,
    verbose: options.verbose,
  });

  try {
    const resolved = resolveCliOptions(options, await loadCliConfig(options.config));
    formatter = createFormatter(resolved.format, { noColor: resolved.noColor, verbose: resolved.verbose });

    const engine = new GraphEngine(resolved.engine);
    const session = await engine.open(workflow);

    await action({ workflow, session, formatter, options: resolved });
    return ExitCodes.SUCCESS;
  } catch (error) {
    formatter.showError(error instanceof Error ? error : new Error(String(error)));
    return exitCodeFor(error);
  }
}

/**
 * Ids paired with their tool types for listings
 */
export function toolRefs(session: WorkflowSession, ids: Iterable<ToolId>): ToolRef[] {
  return [...ids].map((id) => ({ id, type: session.graph.nodes.get(id)?.type ?? UNKNOWN_TOOL_TYPE }));
}
