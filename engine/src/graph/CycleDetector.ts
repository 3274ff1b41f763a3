/**
 * CycleDetector
 *
 * Detects cycles in the connection graph.
 * This is about VALIDATION - fail fast with the ids that need fixing.
 *
 * Two views of the same problem:
 * - detect(): one representative cycle path (DFS, three-colour marking)
 * - findCycleMembers(): every id that lies on some cycle (Tarjan's SCC)
 *
 * DFS with three-colour marking:
 * - WHITE (unvisited): Node not yet explored
 * - GRAY (visiting): Node currently on the DFS path
 * - BLACK (visited): Node and all its descendants explored
 *
 * A cycle exists if we reach a GRAY node.
 *
 * Both walk ids and successors in ascending id order, so the reported
 * cycle is the same on every run.
 */

import { CycleDetectedError } from '../errors/WorkflowError.js';
import { induceSubgraph, type InducedSubgraph, type InduceOptions } from './Subgraph.js';
import { sortToolIds } from './ToolIds.js';
import {
  VisitState,
  type CycleDetectionResult,
  type ToolId,
  type ToolScope,
  type WorkflowGraph,
} from '../types/graph-types.js';

export class CycleDetector {
  /**
   * Check whether the (scoped) graph contains a cycle
   */
  static detect(graph: WorkflowGraph, scope?: ToolScope, options?: InduceOptions): CycleDetectionResult {
    return this.detectIn(induceSubgraph(graph, scope, options));
  }

  /**
   * Cycle check on an already induced subgraph
   */
  static detectIn(subgraph: InducedSubgraph): CycleDetectionResult {
    const visitState = new Map<ToolId, VisitState>();
    const parent = new Map<ToolId, ToolId>();

    for (const id of subgraph.ids) {
      visitState.set(id, VisitState.WHITE);
    }

    for (const id of subgraph.ids) {
      if (visitState.get(id) === VisitState.WHITE) {
        const result = this.dfs(id, subgraph, visitState, parent);
        if (result.hasCycle) {
          return result;
        }
      }
    }

    return { hasCycle: false };
  }

  /**
   * Iterative DFS; workflows with long chains would overflow a recursive one
   */
  private static dfs(
    start: ToolId,
    subgraph: InducedSubgraph,
    visitState: Map<ToolId, VisitState>,
    parent: Map<ToolId, ToolId>
  ): CycleDetectionResult {
    const stack: Array<{ id: ToolId; next: number; targets: readonly ToolId[] }> = [];
    const enter = (id: ToolId): void => {
      visitState.set(id, VisitState.GRAY);
      stack.push({ id, next: 0, targets: sortToolIds(subgraph.successors.get(id) ?? []) });
    };

    enter(start);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];

      if (frame.next >= frame.targets.length) {
        // All descendants explored
        visitState.set(frame.id, VisitState.BLACK);
        stack.pop();
        continue;
      }

      const target = frame.targets[frame.next];
      frame.next++;
      const state = visitState.get(target);

      if (state === VisitState.GRAY) {
        const cyclePath = this.reconstructCycle(frame.id, target, parent);
        return {
          hasCycle: true,
          cyclePath: Object.freeze([...cyclePath, target]),
        };
      }

      if (state === VisitState.WHITE) {
        parent.set(target, frame.id);
        enter(target);
      }
      // BLACK nodes are already fully explored
    }

    return { hasCycle: false };
  }

  /**
   * Walk parent pointers from `end` back to `cycleStart`
   */
  private static reconstructCycle(
    end: ToolId,
    cycleStart: ToolId,
    parent: Map<ToolId, ToolId>
  ): ToolId[] {
    const cycle: ToolId[] = [end];
    let current = end;

    while (current !== cycleStart) {
      const previous = parent.get(current);
      if (previous === undefined) {
        break;
      }
      cycle.unshift(previous);
      current = previous;
    }

    return cycle;
  }

  /**
   * Every id that lies on at least one cycle, ascending: members of
   * strongly connected components larger than one, plus self-looped ids.
   */
  static findCycleMembers(graph: WorkflowGraph, scope?: ToolScope, options?: InduceOptions): ToolId[] {
    return this.findCycleMembersIn(induceSubgraph(graph, scope, options));
  }

  static findCycleMembersIn(subgraph: InducedSubgraph): ToolId[] {
    const members: ToolId[] = [];

    for (const component of this.findStronglyConnectedComponents(subgraph)) {
      if (component.length > 1) {
        members.push(...component);
      } else {
        const [id] = component;
        if ((subgraph.successors.get(id) ?? []).includes(id)) {
          members.push(id);
        }
      }
    }

    return sortToolIds(members);
  }

  /**
   * Strongly connected components (Tarjan's algorithm, iterative).
   * Includes single-node components.
   */
  static findStronglyConnectedComponents(subgraph: InducedSubgraph): ToolId[][] {
    const index = new Map<ToolId, number>();
    const lowLink = new Map<ToolId, number>();
    const onStack = new Set<ToolId>();
    const stack: ToolId[] = [];
    const components: ToolId[][] = [];
    let counter = 0;

    for (const root of subgraph.ids) {
      if (index.has(root)) {
        continue;
      }

      const work: Array<{ id: ToolId; next: number; targets: readonly ToolId[] }> = [];
      const open = (id: ToolId): void => {
        index.set(id, counter);
        lowLink.set(id, counter);
        counter++;
        stack.push(id);
        onStack.add(id);
        work.push({ id, next: 0, targets: sortToolIds(subgraph.successors.get(id) ?? []) });
      };

      open(root);

      while (work.length > 0) {
        const frame = work[work.length - 1];

        if (frame.next < frame.targets.length) {
          const target = frame.targets[frame.next];
          frame.next++;

          if (!index.has(target)) {
            open(target);
          } else if (onStack.has(target)) {
            lowLink.set(frame.id, Math.min(lowLink.get(frame.id) ?? 0, index.get(target) ?? 0));
          }
          continue;
        }

        // Frame finished: propagate low link to the caller
        work.pop();
        const caller = work[work.length - 1];
        if (caller) {
          lowLink.set(caller.id, Math.min(lowLink.get(caller.id) ?? 0, lowLink.get(frame.id) ?? 0));
        }

        // Root of a component: pop it off the stack
        if (lowLink.get(frame.id) === index.get(frame.id)) {
          const component: ToolId[] = [];
          let member: ToolId | undefined;
          do {
            member = stack.pop();
            if (member === undefined) {
              break;
            }
            onStack.delete(member);
            component.push(member);
          } while (member !== frame.id);
          components.push(sortToolIds(component));
        }
      }
    }

    return components;
  }

  /**
   * Check for cycles and throw if found.
   * This is the "fail fast" version.
   *
   * @throws CycleDetectedError carrying every id on a cycle
   */
  static detectAndThrow(graph: WorkflowGraph, scope?: ToolScope, options?: InduceOptions): void {
    this.throwIfCyclic(induceSubgraph(graph, scope, options));
  }

  static throwIfCyclic(subgraph: InducedSubgraph): void {
    const result = this.detectIn(subgraph);

    if (result.hasCycle) {
      throw new CycleDetectedError(this.findCycleMembersIn(subgraph), result.cyclePath);
    }
  }
}
