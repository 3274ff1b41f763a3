/**
 * Small builders for graph tests
 */

import { GraphBuilder } from '../GraphBuilder.js';
import type { Connection, ToolNode, WorkflowGraph } from '../../types/graph-types.js';

export function tool(id: string, type = 'Filter', containerId?: string): ToolNode {
  return {
    id,
    type,
    configuration: {},
    ...(containerId !== undefined && { containerId }),
  };
}

export function link(sourceId: string, targetId: string, sourceOutputPort?: string, targetInputPort?: string): Connection {
  return {
    sourceId,
    targetId,
    ...(sourceOutputPort !== undefined && { sourceOutputPort }),
    ...(targetInputPort !== undefined && { targetInputPort }),
  };
}

/**
 * Graph from `ids` and `"a>b"` connection shorthands
 */
export function graphOf(ids: string[], edges: string[] = []): WorkflowGraph {
  return GraphBuilder.build(
    ids.map((id) => tool(id)),
    edges.map((edge) => {
      const [source, target] = edge.split('>');
      return link(source, target);
    })
  );
}

/**
 * Run `fn` and return the error it threw, which must be a `type`
 */
export function thrownBy<E extends Error>(fn: () => unknown, type: new (...args: never[]) => E): E {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}
