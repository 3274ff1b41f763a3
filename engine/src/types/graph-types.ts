/**
 * Workflow graph types
 *
 * Typed records for parsed Alteryx tools and the directed connections
 * between them, plus the read-only graph built from them.
 *
 * @module types
 */

/**
 * Tool identifier. Alteryx writes ToolIDs as decimal strings; table input
 * may use numbers, which are normalized to strings on load.
 */
export type ToolId = string;

/**
 * Scalar value of a flattened tool configuration entry
 */
export type ToolConfigValue = string | number | boolean;

/**
 * Opaque tool-specific parameters, keyed by flattened XML path.
 * Graph algorithms never look inside.
 */
export type ToolConfiguration = Readonly<Record<string, ToolConfigValue>>;

/**
 * Canvas position of a tool
 */
export interface ToolPosition {
  readonly x: number;
  readonly y: number;
}

/**
 * One configured tool of a workflow
 */
export interface ToolNode {
  /** Unique ToolID */
  readonly id: ToolId;
  /** Tool kind, e.g. "Filter", "Join", "ToolContainer" */
  readonly type: string;
  /** Tool-specific parameters */
  readonly configuration: ToolConfiguration;
  /** Enclosing container (weak reference; the container may be absent) */
  readonly containerId?: ToolId;
  /** Full plugin name the type was derived from */
  readonly plugin?: string;
  /** Default annotation text shown under the tool */
  readonly annotation?: string;
  readonly position?: ToolPosition;
}

/**
 * Directed data-flow edge from one tool's output to another tool's input
 */
export interface Connection {
  readonly sourceId: ToolId;
  readonly targetId: ToolId;
  /** Output anchor, e.g. "Output", "True", "False", "Join" */
  readonly sourceOutputPort?: string;
  /** Input anchor, e.g. "Input", "Left", "Right", "#1" */
  readonly targetInputPort?: string;
  /** Wireless connections are drawn hidden on the canvas */
  readonly wireless?: boolean;
}

/**
 * Container id → ids of tools whose containerId equals it (direct children)
 */
export type ContainerIndex = ReadonlyMap<ToolId, readonly ToolId[]>;

/**
 * The complete workflow graph. Built once, read-only afterwards.
 */
export interface WorkflowGraph {
  /** All tools indexed by id */
  readonly nodes: ReadonlyMap<ToolId, ToolNode>;
  /** All connections, in input order */
  readonly connections: readonly Connection[];
  /** Tool id → connections leaving it */
  readonly outgoing: ReadonlyMap<ToolId, readonly Connection[]>;
  /** Tool id → connections entering it */
  readonly incoming: ReadonlyMap<ToolId, readonly Connection[]>;
  /** Derived container → direct children index */
  readonly containerIndex: ContainerIndex;
}

/**
 * The two semantic tables a workflow parses into
 */
export interface WorkflowTables {
  readonly nodes: readonly ToolNode[];
  readonly connections: readonly Connection[];
}

/**
 * Ids to restrict an operation to; out-of-scope tools are invisible.
 * A collection rather than any iterable, so a bare id string is rejected.
 */
export type ToolScope = ReadonlySet<ToolId> | readonly ToolId[];

/**
 * Result of cycle detection
 */
export interface CycleDetectionResult {
  /** Whether a cycle was found */
  readonly hasCycle: boolean;
  /** One cycle, first id repeated at the end (e.g. ['1', '2', '1']) */
  readonly cyclePath?: readonly ToolId[];
}

/**
 * DFS visit state (three-colour marking)
 */
export enum VisitState {
  /** Not yet explored */
  WHITE = 0,
  /** On the current DFS path */
  GRAY = 1,
  /** Fully explored */
  BLACK = 2,
}
