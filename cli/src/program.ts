/**
 * Program definition; the executable entry point is cli.ts
 */

import { Command } from 'commander';
import { registerChildrenCommand } from './commands/children.js';
import { registerInspectCommand } from './commands/inspect.js';
import { registerOrderCommand } from './commands/order.js';
import { registerSelectCommand } from './commands/select.js';
import { registerValidateCommand } from './commands/validate.js';

export const CLI_VERSION = '0.1.0';

/**
 * Build the program with every command registered
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('yxgraph')
    .description('Execution order, containers and structure of Alteryx workflows')
    .version(CLI_VERSION, '-v, --version', 'Show version number')
    .helpOption('-h, --help', 'Show help');

  // Register commands
  registerOrderCommand(program);
  registerChildrenCommand(program);
  registerSelectCommand(program);
  registerInspectCommand(program);
  registerValidateCommand(program);

  return program;
}
