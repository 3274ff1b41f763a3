/**
 * Graph Analysis Utilities
 *
 * Tools for analyzing workflow graphs:
 * - GraphBuilder: Build the graph from tool and connection tables
 * - CycleDetector: Find connection loops
 * - TopologicalSorter: Execution order and phases
 * - ChildResolver: Container membership
 * - GraphTraversal: Neighbours, frame names, linear chains
 */

export * from './ToolIds.js';
export * from './Subgraph.js';
export * from './GraphBuilder.js';
export * from './CycleDetector.js';
export * from './TopologicalSorter.js';
export * from './ChildResolver.js';
export * from './GraphTraversal.js';
