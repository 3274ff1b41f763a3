/**
 * Select Command
 *
 * Puts a hand-picked set of tools into execution order. Containers in
 * the selection are replaced by the tools inside them.
 *
 * Usage:
 *   yxgraph select workflow.yxmd 12 3 7
 *   yxgraph select workflow.yxmd "[644, '645', 10]"
 */

import type { Command } from 'commander';
import { parseToolIdList } from '@yxgraph/engine';
import { CliReportType } from '../types/CliReport.js';
import type { CliCommonOptions } from '../types/CliCommonOptions.js';
import { addCommonOptions, runWorkflowCommand } from '../utils/command.js';

/**
 * Register the select command
 */
export function registerSelectCommand(program: Command): void {
  addCommonOptions(
    program
      .command('select <workflow> <toolIds...>')
      .description('Order a selection of tools, expanding containers')
  ).action(orderSelection);
}

async function orderSelection(workflow: string, toolIds: string[], options: CliCommonOptions): Promise<void> {
  const requested = toolIds.flatMap((value) => parseToolIdList(value));

  process.exitCode = await runWorkflowCommand(workflow, options, ({ session, formatter }) => {
    formatter.showReport({
      type: CliReportType.SELECTION,
      workflow,
      requested,
      ordered: session.orderSelection(requested),
    });
  });
}
