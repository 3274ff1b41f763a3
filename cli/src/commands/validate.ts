/**
 * Validate Command
 *
 * Checks a workflow without printing its order: the file parses, tool ids
 * are unique, every connection has both tools, connections have no cycle
 * and containers do not contain themselves.
 *
 * Usage:
 *   yxgraph validate workflow.yxmd
 *   yxgraph validate workflow.yxmd --format json
 *
 * Exit codes:
 *   0   - Workflow valid
 *   102 - XML or table syntax error
 *   103 - Not an Alteryx document / invalid tables
 *   104 - File missing or unsupported extension
 *   105 - Duplicate ToolID or dangling connection
 *   106 - Connection cycle or container cycle
 */

import type { Command } from 'commander';
import { CliReportType } from '../types/CliReport.js';
import type { CliValidateOptions } from '../types/CliValidateOptions.js';
import { addCommonOptions, runWorkflowCommand } from '../utils/command.js';

/**
 * Register the validate command
 */
export function registerValidateCommand(program: Command): void {
  addCommonOptions(
    program.command('validate <workflow>').description('Check a workflow for structural errors')
  ).action(validateWorkflow);
}

async function validateWorkflow(workflow: string, options: CliValidateOptions): Promise<void> {
  process.exitCode = await runWorkflowCommand(workflow, options, ({ session, formatter }) => {
    // Duplicate ids and dangling connections already failed while loading
    session.executionOrder();

    const containers = [...session.graph.containerIndex.keys()];
    for (const containerId of containers) {
      session.childrenOf(containerId, true);
    }

    formatter.showReport({
      type: CliReportType.VALIDATION,
      workflow,
      toolCount: session.graph.nodes.size,
      connectionCount: session.graph.connections.length,
      containerCount: containers.length,
    });
  });
}
