/**
 * Workflow Session
 *
 * One loaded workflow and the questions asked about it. The graph is
 * built once; the full execution order is computed on first use and
 * reused after that.
 *
 * @module core
 */

import { ChildResolver } from '../graph/ChildResolver.js';
import { CycleDetector } from '../graph/CycleDetector.js';
import { GraphBuilder } from '../graph/GraphBuilder.js';
import { GraphTraversal, type InputFrame } from '../graph/GraphTraversal.js';
import { adjustOrder, sortToolIds } from '../graph/ToolIds.js';
import { TopologicalSorter, type TopologicalSortResult } from '../graph/TopologicalSorter.js';
import type { ResolvedEngineConfig } from './EngineConfig.js';
import type { ToolId, ToolNode, ToolScope, WorkflowGraph } from '../types/graph-types.js';

/**
 * Overview of a workflow for inspection output
 */
export interface WorkflowSummary {
  source?: string;
  toolCount: number;
  connectionCount: number;
  /** Tool type → number of tools */
  toolTypes: Record<string, number>;
  entryTools: ToolId[];
  exitTools: ToolId[];
  containers: Array<{ id: ToolId; directChildren: number }>;
  linearChains: ToolId[][];
  /** Ids on a connection cycle; empty for a valid workflow */
  cycleMembers: ToolId[];
}

/**
 * Everything the graph knows about one tool
 */
export interface ToolContext {
  tool: ToolNode;
  previousTools: ToolId[];
  nextTools: ToolId[];
  inputFrames: InputFrame[];
  outputFrames: string[];
  /** Enclosing containers, innermost first */
  containers: ToolId[];
}

export class WorkflowSession {
  private fullOrder: ToolId[] | null = null;

  constructor(
    readonly graph: WorkflowGraph,
    private readonly config: ResolvedEngineConfig,
    readonly source?: string
  ) {}

  /**
   * Execution order of all tools, or of the tools in `scope`
   *
   * @throws CycleDetectedError if the (scoped) graph has a cycle
   */
  executionOrder(scope?: ToolScope): ToolId[] {
    if (scope !== undefined) {
      return TopologicalSorter.sequence(this.graph, scope, { strict: this.config.strictScope });
    }
    if (this.fullOrder === null) {
      this.fullOrder = TopologicalSorter.sequence(this.graph);
    }
    return [...this.fullOrder];
  }

  phases(scope?: ToolScope): TopologicalSortResult {
    return TopologicalSorter.phases(this.graph, scope, { strict: this.config.strictScope });
  }

  childrenOf(containerId: ToolId, transitive: boolean): ReadonlySet<ToolId> {
    return ChildResolver.childrenOf(this.graph, containerId, transitive);
  }

  /**
   * Transitive children without the configured excluded tool types
   */
  childTools(containerId: ToolId): ToolId[] {
    return ChildResolver.childToolsOf(this.graph, containerId, {
      excludeTypes: this.config.excludedChildTypes,
    });
  }

  /**
   * Expand containers in a selection, then put it in execution order.
   * Ids that are not tools go last.
   */
  orderSelection(toolIds: ToolScope): ToolId[] {
    const expanded = ChildResolver.expandSelection(this.graph, toolIds, {
      excludeTypes: this.config.excludedChildTypes,
    });
    return adjustOrder(expanded, this.executionOrder());
  }

  /**
   * Neighbours, frames and containers of one tool; undefined for an
   * unknown id
   */
  toolContext(toolId: ToolId): ToolContext | undefined {
    const tool = this.graph.nodes.get(toolId);
    if (!tool) {
      return undefined;
    }

    return {
      tool,
      previousTools: GraphTraversal.previousTools(this.graph, toolId),
      nextTools: GraphTraversal.nextTools(this.graph, toolId),
      inputFrames: GraphTraversal.inputFrameNames(this.graph, toolId),
      outputFrames: GraphTraversal.outputFrameNames(this.graph, toolId),
      containers: ChildResolver.containerAncestors(this.graph, toolId),
    };
  }

  summary(): WorkflowSummary {
    const toolTypes: Record<string, number> = {};
    for (const node of this.graph.nodes.values()) {
      toolTypes[node.type] = (toolTypes[node.type] ?? 0) + 1;
    }

    const containers = sortToolIds(this.graph.containerIndex.keys()).map((id) => ({
      id,
      directChildren: this.graph.containerIndex.get(id)?.length ?? 0,
    }));

    return {
      ...(this.source !== undefined && { source: this.source }),
      toolCount: this.graph.nodes.size,
      connectionCount: this.graph.connections.length,
      toolTypes,
      entryTools: GraphBuilder.getEntryPoints(this.graph),
      exitTools: GraphBuilder.getExitPoints(this.graph),
      containers,
      linearChains: GraphTraversal.linearChains(this.graph),
      cycleMembers: CycleDetector.findCycleMembers(this.graph),
    };
  }
}
