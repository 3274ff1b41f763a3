/**
 * Order Command
 *
 * Prints the execution order of a workflow's tools, optionally restricted
 * to a scope of tool ids, or grouped into phases.
 *
 * Usage:
 *   yxgraph order workflow.yxmd
 *   yxgraph order workflow.yxmd --scope "[3, 7, 12]"
 *   yxgraph order workflow.yxmd --phases
 *
 * Scope ids that are not tools are dropped with a warning on stderr,
 * or rejected with exit code 105 when strictScope is configured.
 *
 * Exit codes:
 *   0   - Order printed
 *   106 - Connections form a cycle
 *   other non-zero - Workflow could not be loaded
 */

import type { Command } from 'commander';
import { parseToolIdList } from '@yxgraph/engine';
import { CliReportType } from '../types/CliReport.js';
import type { CliOrderOptions } from '../types/CliOrderOptions.js';
import { addCommonOptions, runWorkflowCommand, toolRefs } from '../utils/command.js';

/**
 * Register the order command
 */
export function registerOrderCommand(program: Command): void {
  addCommonOptions(
    program
      .command('order <workflow>')
      .description('Show the execution order of the workflow tools')
      .option('--scope <ids>', 'Only order these tool ids (comma-separated)')
      .option('--phases', 'Group tools into phases')
  ).action(orderWorkflow);
}

async function orderWorkflow(workflow: string, options: CliOrderOptions): Promise<void> {
  const scope = options.scope !== undefined ? parseToolIdList(options.scope) : undefined;

  process.exitCode = await runWorkflowCommand(workflow, options, ({ session, formatter }) => {
    if (options.phases) {
      const result = session.phases(scope);
      formatter.showReport({
        type: CliReportType.PHASES,
        workflow,
        phases: result.phases.map((phase) => toolRefs(session, phase)),
        ...(scope !== undefined && { scope }),
      });
    } else {
      formatter.showReport({
        type: CliReportType.ORDER,
        workflow,
        tools: toolRefs(session, session.executionOrder(scope)),
        ...(scope !== undefined && { scope }),
      });
    }

    // Only reached without strictScope, which rejects these ids instead
    const ignored = scope?.filter((id) => !session.graph.nodes.has(id)) ?? [];
    if (ignored.length > 0) {
      formatter.showWarning(`Ignored scope ids that are not tools of the workflow: ${ignored.join(', ')}`);
    }
  });
}
