/**
 * Children Command
 *
 * Lists the tools inside a container. By default nested containers are
 * walked and container and browse tools are left out of the listing.
 *
 * Usage:
 *   yxgraph children workflow.yxmd 10
 *   yxgraph children workflow.yxmd 10 --direct
 *   yxgraph children workflow.yxmd 10 --all-types
 */

import type { Command } from 'commander';
import { CliReportType } from '../types/CliReport.js';
import type { CliChildrenOptions } from '../types/CliChildrenOptions.js';
import { addCommonOptions, runWorkflowCommand, toolRefs } from '../utils/command.js';

/**
 * Register the children command
 */
export function registerChildrenCommand(program: Command): void {
  addCommonOptions(
    program
      .command('children <workflow> <containerId>')
      .description('List the tools inside a container')
      .option('--direct', 'Only tools placed directly in the container')
      .option('--all-types', 'Include nested containers and browse tools')
  ).action(listChildren);
}

async function listChildren(workflow: string, containerId: string, options: CliChildrenOptions): Promise<void> {
  const id = containerId.trim();

  process.exitCode = await runWorkflowCommand(workflow, options, ({ session, formatter }) => {
    const transitive = !options.direct;
    const ids = options.direct || options.allTypes ? session.childrenOf(id, transitive) : session.childTools(id);

    formatter.showReport({
      type: CliReportType.CHILDREN,
      workflow,
      containerId: id,
      transitive,
      tools: toolRefs(session, ids),
    });
  });
}
