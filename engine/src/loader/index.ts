/**
 * Workflow Loader Module
 * 
 * Utility layer for loading workflow files from disk.
 * This is I/O-aware but execution-agnostic.
 * 
 * @module loader
 */

export * from './WorkflowLoader.js';
