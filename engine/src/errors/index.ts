/**
 * yxgraph Error Infrastructure
 *
 * @module errors
 */

export * from './ErrorCodes.js';
export * from './GraphError.js';
export * from './WorkflowError.js';
export * from './ErrorFormatter.js';
