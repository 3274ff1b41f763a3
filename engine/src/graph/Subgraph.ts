/**
 * Induced subgraph over an optional scope.
 *
 * Sorting and cycle detection both work on this view: the ids in scope
 * (ascending) and, per id, the targets of its in-scope connections. One
 * entry per connection, so parallel connections appear more than once.
 */

import { ScopeError } from '../errors/WorkflowError.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { LogCategoryEnum } from '../types/log-types.js';
import { sortToolIds } from './ToolIds.js';
import type { ToolId, ToolScope, WorkflowGraph } from '../types/graph-types.js';

export interface InducedSubgraph {
  /** Ids in scope, ascending */
  readonly ids: readonly ToolId[];
  /** Id → in-scope connection targets, in connection order */
  readonly successors: ReadonlyMap<ToolId, readonly ToolId[]>;
}

export interface InduceOptions {
  /** Throw ScopeError for scope ids that are not tools; otherwise ignore them */
  strict?: boolean;
}

export function induceSubgraph(
  graph: WorkflowGraph,
  scope?: ToolScope,
  options: InduceOptions = {}
): InducedSubgraph {
  let members: Set<ToolId>;

  if (scope === undefined) {
    members = new Set(graph.nodes.keys());
  } else {
    members = new Set();
    const unknown: ToolId[] = [];
    for (const id of scope) {
      if (graph.nodes.has(id)) {
        members.add(id);
      } else if (!unknown.includes(id)) {
        unknown.push(id);
      }
    }

    if (unknown.length > 0) {
      if (options.strict) {
        throw new ScopeError(sortToolIds(unknown));
      }
      LoggerManager.for('Subgraph', LogCategoryEnum.ANALYSIS).debug('Ignoring scope ids that are not tools', {
        unknownIds: sortToolIds(unknown),
      });
    }
  }

  const successors = new Map<ToolId, ToolId[]>();
  for (const id of members) {
    const targets: ToolId[] = [];
    for (const connection of graph.outgoing.get(id) ?? []) {
      if (members.has(connection.targetId)) {
        targets.push(connection.targetId);
      }
    }
    successors.set(id, targets);
  }

  return {
    ids: sortToolIds(members),
    successors,
  };
}
