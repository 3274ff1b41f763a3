/**
 * Neighbour lookups and structural walks over a built workflow graph.
 * Used by inspection output and by code generators that name each
 * tool's output frame.
 */

import { sortToolIds } from './ToolIds.js';
import type { Connection, ToolId, WorkflowGraph } from '../types/graph-types.js';

export const DEFAULT_OUTPUT_PORT = 'Output';
export const DEFAULT_INPUT_PORT = 'Input';

/**
 * One input of a tool: the frame it reads and the anchor it arrives on
 */
export interface InputFrame {
  readonly frameName: string;
  readonly inputPort: string;
}

export class GraphTraversal {
  /**
   * Distinct downstream tool ids, in connection order
   */
  static nextTools(graph: WorkflowGraph, toolId: ToolId): ToolId[] {
    return unique((graph.outgoing.get(toolId) ?? []).map((connection) => connection.targetId));
  }

  /**
   * Distinct upstream tool ids, in connection order
   */
  static previousTools(graph: WorkflowGraph, toolId: ToolId): ToolId[] {
    return unique((graph.incoming.get(toolId) ?? []).map((connection) => connection.sourceId));
  }

  /**
   * Name of the frame a tool writes on one output anchor
   */
  static frameName(toolId: ToolId, port: string = DEFAULT_OUTPUT_PORT): string {
    return `df_${toolId}_${port}`;
  }

  /**
   * One frame name per distinct output anchor in use, e.g. `df_7_True`
   */
  static outputFrameNames(graph: WorkflowGraph, toolId: ToolId): string[] {
    const ports = unique(
      (graph.outgoing.get(toolId) ?? []).map((connection) => connection.sourceOutputPort ?? DEFAULT_OUTPUT_PORT)
    );
    return ports.map((port) => this.frameName(toolId, port));
  }

  /**
   * One entry per incoming connection, in connection order
   */
  static inputFrameNames(graph: WorkflowGraph, toolId: ToolId): InputFrame[] {
    return (graph.incoming.get(toolId) ?? []).map((connection) => ({
      frameName: this.frameName(connection.sourceId, connection.sourceOutputPort),
      inputPort: connection.targetInputPort ?? DEFAULT_INPUT_PORT,
    }));
  }

  /**
   * Split the connections into maximal linear chains. A chain runs on
   * through a tool only while that tool has exactly one input and one
   * output; branches and merges start new chains. Every connection
   * belongs to exactly one chain.
   *
   * Chains are started from sources in ascending id order, then in
   * connection order.
   */
  static linearChains(graph: WorkflowGraph): ToolId[][] {
    const used = new Set<Connection>();
    const chains: ToolId[][] = [];

    const isLinear = (id: ToolId): boolean =>
      (graph.incoming.get(id) ?? []).length === 1 && (graph.outgoing.get(id) ?? []).length === 1;

    for (const sourceId of sortToolIds(graph.outgoing.keys())) {
      for (const start of graph.outgoing.get(sourceId) ?? []) {
        if (used.has(start)) {
          continue;
        }

        const chain: ToolId[] = [start.sourceId, start.targetId];
        used.add(start);
        let current = start.targetId;

        while (isLinear(current)) {
          const [next] = graph.outgoing.get(current) ?? [];
          if (next === undefined || used.has(next)) {
            break;
          }
          chain.push(next.targetId);
          used.add(next);
          current = next.targetId;
        }

        chains.push(chain);
      }
    }

    return chains;
  }

  /**
   * Ids that feed at least one connection but receive none, ascending.
   * Tools without any connection are not included.
   */
  static toolsWithoutInput(graph: WorkflowGraph): ToolId[] {
    const sources = new Set(graph.connections.map((connection) => connection.sourceId));
    for (const connection of graph.connections) {
      sources.delete(connection.targetId);
    }
    return sortToolIds(sources);
  }
}

function unique(ids: ToolId[]): ToolId[] {
  return [...new Set(ids)];
}
