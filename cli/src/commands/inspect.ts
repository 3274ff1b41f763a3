/**
 * Inspect Command
 *
 * Summarizes a workflow: counts, entry and exit tools, containers, linear
 * chains and cycles. With `--tool`, shows one tool's neighbours instead.
 *
 * Usage:
 *   yxgraph inspect workflow.yxmd
 *   yxgraph inspect workflow.yxmd --tool 7
 */

import type { Command } from 'commander';
import { CliReportType } from '../types/CliReport.js';
import type { CliInspectOptions } from '../types/CliInspectOptions.js';
import { addCommonOptions, runWorkflowCommand } from '../utils/command.js';

/**
 * Register the inspect command
 */
export function registerInspectCommand(program: Command): void {
  addCommonOptions(
    program
      .command('inspect <workflow>')
      .description('Summarize the workflow graph')
      .option('--tool <id>', 'Show one tool instead of the whole workflow')
  ).action(inspectWorkflow);
}

async function inspectWorkflow(workflow: string, options: CliInspectOptions): Promise<void> {
  process.exitCode = await runWorkflowCommand(workflow, options, ({ session, formatter }) => {
    if (options.tool !== undefined) {
      const toolId = options.tool.trim();
      const context = session.toolContext(toolId);
      if (!context) {
        throw new Error(`Tool "${toolId}" is not part of ${workflow}`);
      }
      formatter.showReport({ type: CliReportType.TOOL, workflow, context });
      return;
    }

    formatter.showReport({ type: CliReportType.SUMMARY, workflow, summary: session.summary() });
  });
}
