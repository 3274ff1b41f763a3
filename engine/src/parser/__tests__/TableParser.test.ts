import { describe, it, expect } from 'vitest';
import { TableParser } from '../TableParser.js';
import { WorkflowParseError } from '../../errors/WorkflowError.js';
import { GraphErrorCode } from '../../errors/ErrorCodes.js';
import { thrownBy } from '../../graph/__tests__/fixtures.js';

describe('TableParser', () => {
  it('reads YAML tables and normalizes ids to strings', () => {
    const tables = TableParser.fromYAML(
      [
        'nodes:',
        '  - { id: 1, type: Input }',
        '  - { id: "2", type: Filter, configuration: { Mode: Simple, Limit: 5 }, containerId: 10 }',
        '  - { id: 10, type: ToolContainer, containerId: null }',
        'connections:',
        '  - { sourceId: 1, targetId: 2, sourceOutputPort: Output, wireless: true }',
      ].join('\n')
    );

    expect(tables.nodes).toEqual([
      { id: '1', type: 'Input', configuration: {} },
      { id: '2', type: 'Filter', configuration: { Mode: 'Simple', Limit: 5 }, containerId: '10' },
      { id: '10', type: 'ToolContainer', configuration: {} },
    ]);
    expect(tables.connections).toEqual([{ sourceId: '1', targetId: '2', sourceOutputPort: 'Output', wireless: true }]);
  });

  it('reads JSON tables and defaults connections to none', () => {
    expect(TableParser.fromJSON('{"nodes":[{"id":"7","type":"Browse"}]}')).toEqual({
      nodes: [{ id: '7', type: 'Browse', configuration: {} }],
      connections: [],
    });
  });

  it('reports JSON syntax errors', () => {
    const error = thrownBy(() => TableParser.fromJSON('{"nodes": [', 'tables.json'), WorkflowParseError);

    expect(error.code).toBe(GraphErrorCode.SCHEMA_PARSE_ERROR);
    expect(error.message.startsWith('Invalid JSON: ')).toBe(true);
    expect(error.path).toBe('tables.json');
  });

  it('reports YAML syntax errors', () => {
    const error = thrownBy(() => TableParser.fromYAML('nodes: [', 'tables.yaml'), WorkflowParseError);

    expect(error.code).toBe(GraphErrorCode.SCHEMA_PARSE_ERROR);
    expect(error.message.startsWith('Invalid YAML: ')).toBe(true);
  });

  it('lists every invalid field', () => {
    const error = thrownBy(
      () => TableParser.parse({ nodes: [{ id: '1', type: 'Input', colour: 'red' }, { id: '3' }] }),
      WorkflowParseError
    );

    expect(error.code).toBe(GraphErrorCode.SCHEMA_INVALID_STRUCTURE);
    expect(error.message).toBe('Invalid workflow tables');
    expect(error.context?.issues).toEqual([
      "nodes.0: Unrecognized key(s) in object: 'colour'",
      'nodes.1.type: Required',
    ]);
  });

  it('rejects numeric ids too large to keep apart', () => {
    const text = '{"nodes": [{"id": 9007199254740993, "type": "Input"}, {"id": 9007199254740992, "type": "Filter"}]}';
    const error = thrownBy(() => TableParser.fromJSON(text, 'tables.json'), WorkflowParseError);

    expect(error.code).toBe(GraphErrorCode.SCHEMA_INVALID_STRUCTURE);
    expect(error.context?.issues).toEqual([
      'nodes.0.id: Tool ids above 2^53 - 1 must be written as strings',
      'nodes.1.id: Tool ids above 2^53 - 1 must be written as strings',
    ]);
  });

  it('keeps large ids written as strings', () => {
    const tables = TableParser.fromJSON('{"nodes": [{"id": "9007199254740993", "type": "Input"}]}');

    expect(tables.nodes[0].id).toBe('9007199254740993');
  });

  it('requires a node list', () => {
    const error = thrownBy(() => TableParser.parse({ connections: [] }), WorkflowParseError);

    expect(error.context?.issues).toEqual(['nodes: Required']);
  });
});
