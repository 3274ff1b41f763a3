/**
 * GraphBuilder
 *
 * Builds the workflow graph from the parsed tool and connection tables.
 * This is pure analysis - NO I/O, NO ordering.
 *
 * Responsibilities:
 * 1. Index tools by id (ids must be unique)
 * 2. Check that every connection references existing tools
 * 3. Precompute outgoing/incoming adjacency for O(1) neighbour lookup
 * 4. Derive the container → children index
 *
 * What it does NOT do:
 * - Does NOT check for cycles (that's CycleDetector's job)
 * - Does NOT order tools (that's TopologicalSorter's job)
 * - Does NOT drop bad connections (the caller decides what to do)
 */

import { DanglingConnectionError, DuplicateNodeError } from '../errors/WorkflowError.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { LogCategoryEnum } from '../types/log-types.js';
import { FrozenMap } from './FrozenMap.js';
import { sortToolIds } from './ToolIds.js';
import type {
  Connection,
  ContainerIndex,
  ToolId,
  ToolNode,
  WorkflowGraph,
  WorkflowTables,
} from '../types/graph-types.js';

export class GraphBuilder {
  /**
   * Build the workflow graph.
   *
   * @throws DuplicateNodeError if two tools share an id
   * @throws DanglingConnectionError if a connection endpoint is not a tool
   */
  static build(nodes: Iterable<ToolNode>, connections: Iterable<Connection>): WorkflowGraph {
    // Step 1: Node map for quick lookup
    const nodeMap = new Map<ToolId, ToolNode>();
    for (const node of nodes) {
      if (nodeMap.has(node.id)) {
        throw new DuplicateNodeError(node.id);
      }
      nodeMap.set(node.id, freezeNode(node));
    }

    // Step 2: Validate connections and build adjacency
    const edges: Connection[] = [];
    const outgoing = new Map<ToolId, Connection[]>();
    const incoming = new Map<ToolId, Connection[]>();

    for (const id of nodeMap.keys()) {
      outgoing.set(id, []);
      incoming.set(id, []);
    }

    for (const connection of connections) {
      const sources = outgoing.get(connection.sourceId);
      if (!sources) {
        throw new DanglingConnectionError(connection.sourceId, connection);
      }
      const targets = incoming.get(connection.targetId);
      if (!targets) {
        throw new DanglingConnectionError(connection.targetId, connection);
      }

      const edge = Object.freeze({ ...connection });
      edges.push(edge);
      sources.push(edge);
      targets.push(edge);
    }

    // Step 3: Container index (direct children only)
    const containerIndex = this.indexContainers(nodeMap.values());

    LoggerManager.for('GraphBuilder', LogCategoryEnum.ANALYSIS).debug('Workflow graph built', {
      nodes: nodeMap.size,
      connections: edges.length,
      containers: containerIndex.size,
    });

    // Step 4: Freeze collections for immutability
    return {
      nodes: new FrozenMap(nodeMap),
      connections: Object.freeze(edges),
      outgoing: freezeLists(outgoing),
      incoming: freezeLists(incoming),
      containerIndex,
    };
  }

  /**
   * Build from the two parsed tables
   */
  static fromTables(tables: WorkflowTables): WorkflowGraph {
    return this.build(tables.nodes, tables.connections);
  }

  /**
   * Derive container id → direct children. Children are listed in
   * ascending id order.
   */
  static indexContainers(nodes: Iterable<ToolNode>): ContainerIndex {
    const children = new Map<ToolId, ToolId[]>();

    for (const node of nodes) {
      if (node.containerId === undefined) {
        continue;
      }
      const list = children.get(node.containerId);
      if (list) {
        list.push(node.id);
      } else {
        children.set(node.containerId, [node.id]);
      }
    }

    return new FrozenMap(
      [...children].map(([containerId, ids]) => [containerId, Object.freeze(sortToolIds(ids))] as const)
    );
  }

  /**
   * Tools without incoming connections (entry points), ascending
   */
  static getEntryPoints(graph: WorkflowGraph): ToolId[] {
    const entryPoints: ToolId[] = [];

    for (const [id, connections] of graph.incoming) {
      if (connections.length === 0) {
        entryPoints.push(id);
      }
    }

    return sortToolIds(entryPoints);
  }

  /**
   * Tools without outgoing connections (exit points), ascending
   */
  static getExitPoints(graph: WorkflowGraph): ToolId[] {
    const exitPoints: ToolId[] = [];

    for (const [id, connections] of graph.outgoing) {
      if (connections.length === 0) {
        exitPoints.push(id);
      }
    }

    return sortToolIds(exitPoints);
  }

  /**
   * Number of incoming connections per tool
   */
  static calculateInDegrees(graph: WorkflowGraph): Map<ToolId, number> {
    const inDegrees = new Map<ToolId, number>();

    for (const [id, connections] of graph.incoming) {
      inDegrees.set(id, connections.length);
    }

    return inDegrees;
  }

  /**
   * Number of outgoing connections per tool
   */
  static calculateOutDegrees(graph: WorkflowGraph): Map<ToolId, number> {
    const outDegrees = new Map<ToolId, number>();

    for (const [id, connections] of graph.outgoing) {
      outDegrees.set(id, connections.length);
    }

    return outDegrees;
  }
}

function freezeLists<T>(lists: Map<ToolId, T[]>): ReadonlyMap<ToolId, readonly T[]> {
  return new FrozenMap([...lists].map(([id, list]) => [id, Object.freeze(list)] as const));
}

// Copies down to the scalar values, so the caller's objects stay theirs
function freezeNode(node: ToolNode): ToolNode {
  return Object.freeze({
    ...node,
    configuration: Object.freeze({ ...node.configuration }),
    ...(node.position !== undefined && { position: Object.freeze({ ...node.position }) }),
  });
}
