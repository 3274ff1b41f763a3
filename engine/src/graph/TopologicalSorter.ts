/**
 * TopologicalSorter
 *
 * Orders workflow tools so that every tool comes after all of its
 * upstream tools, using Kahn's algorithm.
 *
 * Algorithm: Kahn's Algorithm (BFS-based)
 * 1. Start with all tools that have no in-scope inputs (in-degree = 0)
 * 2. Emit the smallest ready id, remove its connections
 * 3. Tools whose in-degree drops to 0 become ready
 * 4. Repeat until nothing is ready
 *
 * Ties are always broken by ascending tool id, so the same graph gives
 * the same sequence on every run: `{1, 2, 3}` without connections is
 * `[1, 2, 3]`.
 *
 * phases() runs the level-by-level variant:
 * Result: [['1', '4'], ['2'], ['3']]
 *         Phase 1: 1 and 4 have no inputs
 *         Phase 2: 2 reads from phase 1 only
 *         Phase 3: 3 reads from phase 2
 *
 * What it does NOT do:
 * - Does NOT execute tools
 * - Does NOT modify the graph
 */

import { CycleDetector } from './CycleDetector.js';
import { induceSubgraph, type InducedSubgraph, type InduceOptions } from './Subgraph.js';
import { compareToolIds } from './ToolIds.js';
import type { ToolId, ToolScope, WorkflowGraph } from '../types/graph-types.js';

/**
 * Result of phase sorting
 */
export interface TopologicalSortResult {
  /** Each inner array is a phase; ids ascending within a phase */
  readonly phases: readonly (readonly ToolId[])[];

  readonly phaseCount: number;

  /** Tool id → phase number (0-indexed) */
  readonly toolPhases: ReadonlyMap<ToolId, number>;
}

export class TopologicalSorter {
  /**
   * Execution order of the tools in scope (all tools when no scope is
   * given). Connections with an endpoint outside the scope are ignored.
   *
   * @throws CycleDetectedError if the scoped graph contains a cycle
   * @throws ScopeError with `strict` and scope ids that are not tools
   */
  static sequence(graph: WorkflowGraph, scope?: ToolScope, options?: InduceOptions): ToolId[] {
    const subgraph = induceSubgraph(graph, scope, options);
    const inDegrees = this.calculateInDegrees(subgraph);

    const ready = new ReadyQueue();
    for (const id of subgraph.ids) {
      if (inDegrees.get(id) === 0) {
        ready.push(id);
      }
    }

    const order: ToolId[] = [];
    let next = ready.shift();

    while (next !== undefined) {
      order.push(next);

      for (const target of subgraph.successors.get(next) ?? []) {
        const remaining = (inDegrees.get(target) ?? 0) - 1;
        inDegrees.set(target, remaining);
        if (remaining === 0) {
          ready.push(target);
        }
      }

      next = ready.shift();
    }

    // Tools left over sit on or behind a cycle
    if (order.length < subgraph.ids.length) {
      CycleDetector.throwIfCyclic(subgraph);
    }

    return order;
  }

  /**
   * Group the tools in scope into phases. A tool's phase is one more than
   * the latest phase of its upstream tools.
   *
   * @throws CycleDetectedError if the scoped graph contains a cycle
   */
  static phases(graph: WorkflowGraph, scope?: ToolScope, options?: InduceOptions): TopologicalSortResult {
    const subgraph = induceSubgraph(graph, scope, options);
    const inDegrees = this.calculateInDegrees(subgraph);
    const phases: ToolId[][] = [];
    const toolPhases = new Map<ToolId, number>();

    let currentPhase = subgraph.ids.filter((id) => inDegrees.get(id) === 0);

    while (currentPhase.length > 0) {
      const phaseIndex = phases.length;
      const nextPhase: ToolId[] = [];

      for (const id of currentPhase) {
        toolPhases.set(id, phaseIndex);

        for (const target of subgraph.successors.get(id) ?? []) {
          const remaining = (inDegrees.get(target) ?? 0) - 1;
          inDegrees.set(target, remaining);
          if (remaining === 0) {
            nextPhase.push(target);
          }
        }
      }

      phases.push(currentPhase);
      currentPhase = nextPhase.sort(compareToolIds);
    }

    if (toolPhases.size < subgraph.ids.length) {
      CycleDetector.throwIfCyclic(subgraph);
    }

    return {
      phases: phases.map((phase) => Object.freeze([...phase])),
      phaseCount: phases.length,
      toolPhases,
    };
  }

  /**
   * In-scope connection count per tool (parallel connections count twice)
   */
  static calculateInDegrees(subgraph: InducedSubgraph): Map<ToolId, number> {
    const inDegrees = new Map<ToolId, number>();

    for (const id of subgraph.ids) {
      inDegrees.set(id, 0);
    }
    for (const targets of subgraph.successors.values()) {
      for (const target of targets) {
        inDegrees.set(target, (inDegrees.get(target) ?? 0) + 1);
      }
    }

    return inDegrees;
  }
}

/**
 * Ready set kept in ascending id order
 */
class ReadyQueue {
  private readonly items: ToolId[] = [];

  push(id: ToolId): void {
    let low = 0;
    let high = this.items.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (compareToolIds(this.items[mid], id) < 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    this.items.splice(low, 0, id);
  }

  shift(): ToolId | undefined {
    return this.items.shift();
  }
}
