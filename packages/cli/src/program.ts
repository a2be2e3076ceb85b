/**
 * @module crosscheck
 * Command tree of the crosscheck CLI.
 */

import { Command } from 'commander';
import { registerRun } from './commands/run.js';
import { registerValidate } from './commands/validate.js';
import { registerList } from './commands/list.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('crosscheck')
    .description('Run sample-based tests of command-line programs across environments')
    .version(VERSION)
    .option('-c, --config <path>', 'crosscheck.yaml config file path')
    .option('--verbose', 'show every step and debug logs')
    .option('--no-color', 'disable coloured output');

  // Register sub-commands
  registerRun(program);
  registerValidate(program);
  registerList(program);

  return program;
}

export { runCommand } from './commands/run.js';
export type { RunCommandOptions } from './commands/run.js';
export { validateCommand } from './commands/validate.js';
export { listCommand } from './commands/list.js';
export { EXIT_PASSED, EXIT_FAILED, EXIT_USAGE } from './commands/shared.js';
export type { CliIO, GlobalOptions } from './commands/shared.js';
