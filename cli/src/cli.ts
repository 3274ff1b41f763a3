#!/usr/bin/env node
/**
 * yxgraph CLI
 *
 * Command-line interface for analysing Alteryx workflow graphs.
 * This is the main entry point for the CLI.
 *
 * Usage:
 *   yxgraph order <workflow>                 Show execution order
 *   yxgraph children <workflow> <container>  List tools in a container
 *   yxgraph select <workflow> <toolIds...>   Order a selection of tools
 *   yxgraph inspect <workflow>               Summarize the graph
 *   yxgraph validate <workflow>              Check for structural errors
 */

import { createProgram } from './program.js';

/**
 * Main CLI function
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

// Run CLI
main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : String(error));
  if (process.env.DEBUG && error instanceof Error) {
    console.error(error.stack);
  }
  process.exit(1);
});
