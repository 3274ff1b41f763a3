/**
 * CLI Report Types
 *
 * Results of the `yxgraph` commands. Commands build a report; the
 * formatter decides how it looks.
 */

import type { ToolContext, ToolId, WorkflowSummary } from '@yxgraph/engine';

export enum CliReportType {
  ORDER = 'order',
  PHASES = 'phases',
  CHILDREN = 'children',
  SELECTION = 'selection',
  SUMMARY = 'summary',
  TOOL = 'tool',
  VALIDATION = 'validation',
}

/**
 * Base CLI report
 */
export interface BaseCliReport {
  type: CliReportType;
  workflow: string;
}

/**
 * Tool id with its type, for listings
 */
export interface ToolRef {
  id: ToolId;
  type: string;
}

export interface OrderReport extends BaseCliReport {
  type: CliReportType.ORDER;
  tools: ToolRef[];
  /** Present when the order was restricted */
  scope?: ToolId[];
}

export interface PhasesReport extends BaseCliReport {
  type: CliReportType.PHASES;
  phases: ToolRef[][];
  scope?: ToolId[];
}

export interface ChildrenReport extends BaseCliReport {
  type: CliReportType.CHILDREN;
  containerId: ToolId;
  transitive: boolean;
  tools: ToolRef[];
}

export interface SelectionReport extends BaseCliReport {
  type: CliReportType.SELECTION;
  requested: ToolId[];
  /** Expanded and in execution order; unknown ids last */
  ordered: ToolId[];
}

export interface SummaryReport extends BaseCliReport {
  type: CliReportType.SUMMARY;
  summary: WorkflowSummary;
}

export interface ToolReport extends BaseCliReport {
  type: CliReportType.TOOL;
  context: ToolContext;
}

export interface ValidationReport extends BaseCliReport {
  type: CliReportType.VALIDATION;
  toolCount: number;
  connectionCount: number;
  containerCount: number;
}

/**
 * Union type of all CLI reports
 */
export type CliReport =
  | OrderReport
  | PhasesReport
  | ChildrenReport
  | SelectionReport
  | SummaryReport
  | ToolReport
  | ValidationReport;
