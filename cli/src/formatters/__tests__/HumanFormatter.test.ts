import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from 'vitest';
import { DuplicateNodeError, formatError } from '@yxgraph/engine';
import { HumanFormatter } from '../HumanFormatter.js';
import { CliReportType } from '../../types/CliReport.js';

function row(label: string, value: string): string {
  return `  ${`${label}:`.padEnd(14)}${value}`;
}

describe('HumanFormatter', () => {
  const formatter = new HumanFormatter({ noColor: true });
  let log: MockInstance<Parameters<typeof console.log>, void>;
  let error: MockInstance<Parameters<typeof console.error>, void>;

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const printed = (): string[] => String(log.mock.calls[0][0]).split('\n');

  it('numbers the execution order', () => {
    formatter.showReport({
      type: CliReportType.ORDER,
      workflow: 'demo.yxmd',
      tools: [
        { id: '1', type: 'Input' },
        { id: '2', type: 'Filter' },
        { id: '10', type: 'ToolContainer' },
      ],
      scope: ['1', '2', '10'],
    });

    expect(log).toHaveBeenCalledTimes(1);
    expect(printed()).toEqual([
      'Execution order for demo.yxmd (3 tools)',
      'Scope: 1, 2, 10',
      '  1. 1  Input',
      '  2. 2  Filter',
      '  3. 10  ToolContainer',
    ]);
  });

  it('lists phases', () => {
    formatter.showReport({
      type: CliReportType.PHASES,
      workflow: 'demo.yxmd',
      phases: [[{ id: '1', type: 'Input' }, { id: '4', type: 'Input' }], [{ id: '2', type: 'Join' }]],
    });

    expect(printed()).toEqual(['Execution phases for demo.yxmd (2 phases)', '  Phase 1: 1, 4', '  Phase 2: 2']);
  });

  it('marks an empty container', () => {
    formatter.showReport({
      type: CliReportType.CHILDREN,
      workflow: 'demo.yxmd',
      containerId: '99',
      transitive: false,
      tools: [],
    });

    expect(printed()).toEqual(['Direct children of container 99 in demo.yxmd (0)', '  (none)']);
  });

  it('joins an ordered selection with arrows', () => {
    formatter.showReport({
      type: CliReportType.SELECTION,
      workflow: 'demo.yxmd',
      requested: ['3', '1'],
      ordered: ['1', '3'],
    });

    expect(printed()).toEqual(['Ordered selection for demo.yxmd (2 tools)', '  1 → 3']);
  });

  it('summarizes a workflow', () => {
    formatter.showReport({
      type: CliReportType.SUMMARY,
      workflow: 'demo.yxmd',
      summary: {
        toolCount: 2,
        connectionCount: 1,
        toolTypes: { Input: 1, Filter: 1 },
        entryTools: ['1'],
        exitTools: ['2'],
        containers: [],
        linearChains: [['1', '2']],
        cycleMembers: [],
      },
    });

    expect(printed()).toEqual([
      'Workflow: demo.yxmd',
      row('Tools', '2'),
      row('Connections', '1'),
      row('Entry tools', '1'),
      row('Exit tools', '2'),
      row('Tool types', 'Filter: 1, Input: 1'),
      row('Containers', '-'),
      row('Cycles', 'none'),
      '  Linear chains:',
      '    1 → 2',
    ]);
  });

  it('describes a single tool', () => {
    formatter.showReport({
      type: CliReportType.TOOL,
      workflow: 'demo.yxmd',
      context: {
        tool: { id: '3', type: 'Formula', configuration: {}, containerId: '10' },
        previousTools: ['2'],
        nextTools: [],
        inputFrames: [{ frameName: 'df_2_True', inputPort: 'Input' }],
        outputFrames: [],
        containers: ['10'],
      },
    });

    expect(printed()).toEqual([
      'Tool 3 (Formula)',
      row('Containers', '10'),
      row('Inputs', 'df_2_True → Input'),
      row('Outputs', '-'),
      row('Previous', '2'),
      row('Next', '-'),
    ]);
  });

  it('confirms a valid workflow', () => {
    formatter.showReport({
      type: CliReportType.VALIDATION,
      workflow: 'demo.yxmd',
      toolCount: 1,
      connectionCount: 2,
      containerCount: 0,
    });

    expect(printed()).toEqual(['✔ Workflow is valid: demo.yxmd', '  1 tool, 2 connections, 0 containers']);
  });

  it('prints graph errors with their diagnostic', () => {
    const duplicate = new DuplicateNodeError('7');
    formatter.showError(duplicate);

    expect(error).toHaveBeenCalledWith(formatError(duplicate, false, undefined));
  });

  it('prints other errors on one line', () => {
    formatter.showError(new Error('boom'));

    expect(error).toHaveBeenCalledWith('✖ Error: boom');
  });
});
