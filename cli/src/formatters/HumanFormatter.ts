/**
 * Human-Readable Formatter
 *
 * Formats command results for human consumption.
 * Uses symbols and colors for clear, scannable output.
 *
 * Symbols:
 * - ✔ Success
 * - ✖ Failure
 * - ⚠ Warning
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { GraphError, formatError, type ToolId, type WorkflowSummary, type ToolContext } from '@yxgraph/engine';
import type { Formatter, FormatterOptions } from './Formatter.js';
import {
  CliReportType,
  type ChildrenReport,
  type CliReport,
  type OrderReport,
  type PhasesReport,
  type SelectionReport,
  type ToolRef,
  type ValidationReport,
} from '../types/CliReport.js';

const Symbols = {
  success: '\u2714', // ✔
  failure: '\u2716', // ✖
  warning: '\u26A0', // ⚠
  arrow: '\u2192', // →
} as const;

const LABEL_WIDTH = 14;

export class HumanFormatter implements Formatter {
  private options: FormatterOptions;
  private c: ChalkInstance;

  constructor(options: FormatterOptions = {}) {
    this.options = options;
    this.c = options.noColor ? new Chalk({ level: 0 }) : new Chalk();
  }

  showReport(report: CliReport): void {
    switch (report.type) {
      case CliReportType.ORDER:
        this.print(this.formatOrder(report));
        break;
      case CliReportType.PHASES:
        this.print(this.formatPhases(report));
        break;
      case CliReportType.CHILDREN:
        this.print(this.formatChildren(report));
        break;
      case CliReportType.SELECTION:
        this.print(this.formatSelection(report));
        break;
      case CliReportType.SUMMARY:
        this.print(this.formatSummary(report.workflow, report.summary));
        break;
      case CliReportType.TOOL:
        this.print(this.formatTool(report.context));
        break;
      case CliReportType.VALIDATION:
        this.print(this.formatValidation(report));
        break;
    }
  }

  /**
   * Show error
   */
  showError(error: Error): void {
    if (error instanceof GraphError) {
      console.error(formatError(error, !this.options.noColor, this.options.verbose));
      return;
    }

    console.error(`${this.c.red.bold(`${Symbols.failure} Error:`)} ${error.message}`);

    if (this.options.verbose && error.stack) {
      console.error(this.c.gray(error.stack));
    }
  }

  showWarning(message: string): void {
    console.warn(`${this.c.yellow(Symbols.warning)} ${message}`);
  }

  // ==================== Report Formatting ====================

  private formatOrder(report: OrderReport): string[] {
    const lines = [this.c.bold(`Execution order for ${report.workflow} (${count(report.tools.length, 'tool')})`)];
    if (report.scope) {
      lines.push(this.c.dim(`Scope: ${report.scope.join(', ')}`));
    }
    lines.push(...this.numbered(report.tools));
    return lines;
  }

  private formatPhases(report: PhasesReport): string[] {
    const lines = [this.c.bold(`Execution phases for ${report.workflow} (${count(report.phases.length, 'phase')})`)];
    if (report.scope) {
      lines.push(this.c.dim(`Scope: ${report.scope.join(', ')}`));
    }
    report.phases.forEach((phase, index) => {
      lines.push(`  ${this.c.cyan(`Phase ${index + 1}:`)} ${phase.map((tool) => tool.id).join(', ')}`);
    });
    return lines;
  }

  private formatChildren(report: ChildrenReport): string[] {
    const title = report.transitive ? 'Child tools' : 'Direct children';
    const lines = [
      this.c.bold(`${title} of container ${report.containerId} in ${report.workflow} (${report.tools.length})`),
    ];
    if (report.tools.length === 0) {
      lines.push(this.c.dim('  (none)'));
    }
    for (const tool of report.tools) {
      lines.push(`  - ${tool.id}  ${this.c.dim(tool.type)}`);
    }
    return lines;
  }

  private formatSelection(report: SelectionReport): string[] {
    return [
      this.c.bold(`Ordered selection for ${report.workflow} (${count(report.ordered.length, 'tool')})`),
      `  ${report.ordered.join(` ${Symbols.arrow} `)}`,
    ];
  }

  private formatSummary(workflow: string, summary: WorkflowSummary): string[] {
    const typeCounts = Object.keys(summary.toolTypes)
      .sort()
      .map((type) => `${type}: ${summary.toolTypes[type]}`);

    const lines = [
      this.c.bold(`Workflow: ${workflow}`),
      this.row('Tools', String(summary.toolCount)),
      this.row('Connections', String(summary.connectionCount)),
      this.row('Entry tools', list(summary.entryTools)),
      this.row('Exit tools', list(summary.exitTools)),
      this.row('Tool types', typeCounts.length > 0 ? typeCounts.join(', ') : '-'),
      this.row(
        'Containers',
        summary.containers.length > 0
          ? summary.containers.map((container) => `${container.id} (${count(container.directChildren, 'child', 'children')})`).join(', ')
          : '-'
      ),
    ];

    if (summary.cycleMembers.length > 0) {
      lines.push(this.row('Cycles', this.c.red(`${Symbols.failure} ${summary.cycleMembers.join(', ')}`)));
    } else {
      lines.push(this.row('Cycles', 'none'));
    }

    if (summary.linearChains.length > 0) {
      lines.push(`  ${this.c.dim('Linear chains:')}`);
      for (const chain of summary.linearChains) {
        lines.push(`    ${chain.join(` ${Symbols.arrow} `)}`);
      }
    }

    return lines;
  }

  private formatTool(context: ToolContext): string[] {
    const { tool } = context;
    const lines = [this.c.bold(`Tool ${tool.id} (${tool.type})`)];

    if (tool.plugin) {
      lines.push(this.row('Plugin', tool.plugin));
    }
    if (tool.annotation) {
      lines.push(this.row('Annotation', tool.annotation));
    }
    lines.push(this.row('Containers', list(context.containers)));
    lines.push(
      this.row(
        'Inputs',
        context.inputFrames.length > 0
          ? context.inputFrames.map((frame) => `${frame.frameName} ${Symbols.arrow} ${frame.inputPort}`).join(', ')
          : '-'
      )
    );
    lines.push(this.row('Outputs', context.outputFrames.length > 0 ? context.outputFrames.join(', ') : '-'));
    lines.push(this.row('Previous', list(context.previousTools)));
    lines.push(this.row('Next', list(context.nextTools)));

    return lines;
  }

  private formatValidation(report: ValidationReport): string[] {
    return [
      this.c.green(`${Symbols.success} Workflow is valid: ${report.workflow}`),
      this.c.dim(
        `  ${count(report.toolCount, 'tool')}, ${count(report.connectionCount, 'connection')}, ${count(report.containerCount, 'container')}`
      ),
    ];
  }

  // ==================== Helpers ====================

  private numbered(tools: readonly ToolRef[]): string[] {
    const width = String(tools.length).length;
    return tools.map((tool, index) => `  ${String(index + 1).padStart(width)}. ${tool.id}  ${this.c.dim(tool.type)}`);
  }

  private row(label: string, value: string): string {
    return `  ${this.c.dim(`${label}:`.padEnd(LABEL_WIDTH))}${value}`;
  }

  private print(lines: string[]): void {
    console.log(lines.join('\n'));
  }
}

function count(n: number, singular: string, plural = `${singular}s`): string {
  return `${n} ${n === 1 ? singular : plural}`;
}

function list(ids: readonly ToolId[]): string {
  return ids.length > 0 ? ids.join(', ') : '-';
}
