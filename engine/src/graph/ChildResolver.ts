/**
 * ChildResolver
 *
 * Answers "which tools live inside this container?" from the container
 * index built by GraphBuilder. Containers nest, so a transitive lookup
 * walks the index depth-first and fails if the nesting loops back on
 * itself.
 */

import { ContainerCycleError } from '../errors/WorkflowError.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { LogCategoryEnum } from '../types/log-types.js';
import { sortToolIds } from './ToolIds.js';
import type { ToolId, ToolScope, WorkflowGraph } from '../types/graph-types.js';

/**
 * Tool types hidden from child tool listings: nested containers and
 * browse tools only display data.
 */
export const DEFAULT_EXCLUDED_CHILD_TYPES: readonly string[] = Object.freeze(['ToolContainer', 'BrowseV2']);

export interface ChildToolOptions {
  /** Tool types to leave out (case-insensitive) */
  excludeTypes?: readonly string[];
}

export class ChildResolver {
  /**
   * Direct or transitive children of a container, ascending.
   * An unknown or empty container has no children.
   *
   * @throws ContainerCycleError if a transitive walk meets an id already
   *   on the current containment path
   */
  static childrenOf(graph: WorkflowGraph, containerId: ToolId, transitive: boolean): ReadonlySet<ToolId> {
    if (!transitive) {
      return new Set(graph.containerIndex.get(containerId) ?? []);
    }

    const found = new Set<ToolId>();
    const path: ToolId[] = [containerId];

    const descend = (id: ToolId): void => {
      for (const child of graph.containerIndex.get(id) ?? []) {
        if (path.includes(child)) {
          throw new ContainerCycleError(containerId, [...path, child]);
        }
        if (found.has(child)) {
          continue;
        }
        found.add(child);
        path.push(child);
        descend(child);
        path.pop();
      }
    };

    descend(containerId);
    return new Set(sortToolIds(found));
  }

  /**
   * Transitive children without the excluded tool types, ascending
   */
  static childToolsOf(graph: WorkflowGraph, containerId: ToolId, options: ChildToolOptions = {}): ToolId[] {
    const excluded = new Set(
      (options.excludeTypes ?? DEFAULT_EXCLUDED_CHILD_TYPES).map((type) => type.toLowerCase())
    );
    const children = this.childrenOf(graph, containerId, true);

    const kept = [...children].filter((id) => {
      const type = graph.nodes.get(id)?.type;
      return type === undefined || !excluded.has(type.toLowerCase());
    });

    LoggerManager.for('ChildResolver', LogCategoryEnum.ANALYSIS).debug('Resolved child tools', {
      containerId,
      children: children.size,
      kept: kept.length,
    });

    return kept;
  }

  /**
   * Replace each selected container with its child tools. Other ids are
   * kept; duplicates are dropped, first occurrence wins.
   *
   * @example
   * ```typescript
   * // container 10 holds 11 and 12
   * ChildResolver.expandSelection(graph, ['3', '10', '11']); // ['3', '11', '12']
   * ```
   */
  static expandSelection(graph: WorkflowGraph, toolIds: ToolScope, options: ChildToolOptions = {}): ToolId[] {
    const expanded = new Set<ToolId>();

    for (const id of toolIds) {
      if (graph.containerIndex.has(id)) {
        for (const child of this.childToolsOf(graph, id, options)) {
          expanded.add(child);
        }
      } else {
        expanded.add(id);
      }
    }

    return [...expanded];
  }

  /**
   * Enclosing containers of a tool, innermost first. The outermost entry
   * may be a container id that is not itself a tool.
   *
   * @throws ContainerCycleError if the containment chain loops
   */
  static containerAncestors(graph: WorkflowGraph, toolId: ToolId): ToolId[] {
    const ancestors: ToolId[] = [];
    const seen = new Set<ToolId>([toolId]);
    let current = graph.nodes.get(toolId)?.containerId;

    while (current !== undefined) {
      if (seen.has(current)) {
        throw new ContainerCycleError(current, [toolId, ...ancestors, current]);
      }
      ancestors.push(current);
      seen.add(current);
      current = graph.nodes.get(current)?.containerId;
    }

    return ancestors;
  }
}
