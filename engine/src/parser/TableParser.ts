/**
 * Table Parser
 *
 * Reads workflows that are already in table form, as JSON or YAML:
 *
 * ```yaml
 * nodes:
 *   - { id: 1, type: Input }
 *   - { id: 2, type: Filter, configuration: { Mode: Simple }, containerId: 10 }
 * connections:
 *   - { sourceId: 1, targetId: 2, sourceOutputPort: Output }
 * ```
 *
 * Ids may be written as numbers or strings; they are stored as strings.
 *
 * @module parser
 */

import YAML from 'yaml';
import { z } from 'zod';
import { WorkflowParseError } from '../errors/WorkflowError.js';
import { describeZodIssues } from './SchemaIssues.js';
import type { Connection, ToolNode, WorkflowTables } from '../types/graph-types.js';

const ToolIdSchema = z
  .union([
    z.string().trim().min(1, 'Tool id must not be empty'),
    // JSON numbers past 2^53 are already rounded by the time they get here
    z.number().int().nonnegative().safe('Tool ids above 2^53 - 1 must be written as strings'),
  ])
  .transform((value) => String(value));

const ConfigValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const NodeRowSchema = z
  .object({
    id: ToolIdSchema,
    type: z.string().min(1, 'Tool type must not be empty'),
    configuration: z.record(ConfigValueSchema).default({}),
    containerId: ToolIdSchema.nullish(),
  })
  .strict();

export const ConnectionRowSchema = z
  .object({
    sourceId: ToolIdSchema,
    targetId: ToolIdSchema,
    sourceOutputPort: z.string().optional(),
    targetInputPort: z.string().optional(),
    wireless: z.boolean().optional(),
  })
  .strict();

export const WorkflowTablesSchema = z.object({
  nodes: z.array(NodeRowSchema),
  connections: z.array(ConnectionRowSchema).default([]),
});

export class TableParser {
  /**
   * Validate an already decoded table document
   *
   * @throws WorkflowParseError listing every invalid field
   */
  static parse(value: unknown, source?: string): WorkflowTables {
    const result = WorkflowTablesSchema.safeParse(value);
    if (!result.success) {
      throw new WorkflowParseError('Invalid workflow tables', {
        source,
        structural: true,
        issues: describeZodIssues(result.error),
      });
    }

    const nodes: ToolNode[] = result.data.nodes.map((row) => ({
      id: row.id,
      type: row.type,
      configuration: Object.freeze({ ...row.configuration }),
      ...(row.containerId !== undefined && row.containerId !== null && { containerId: row.containerId }),
    }));

    const connections: Connection[] = result.data.connections.map((row) => ({
      sourceId: row.sourceId,
      targetId: row.targetId,
      ...(row.sourceOutputPort !== undefined && { sourceOutputPort: row.sourceOutputPort }),
      ...(row.targetInputPort !== undefined && { targetInputPort: row.targetInputPort }),
      ...(row.wireless !== undefined && { wireless: row.wireless }),
    }));

    return { nodes, connections };
  }

  static fromJSON(text: string, source?: string): WorkflowTables {
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      throw new WorkflowParseError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`, {
        source,
        cause: error,
      });
    }
    return this.parse(value, source);
  }

  static fromYAML(text: string, source?: string): WorkflowTables {
    let value: unknown;
    try {
      value = YAML.parse(text);
    } catch (error) {
      throw new WorkflowParseError(`Invalid YAML: ${error instanceof Error ? error.message : String(error)}`, {
        source,
        cause: error,
      });
    }
    return this.parse(value, source);
  }
}
