/**
 * Builds the `worklog` commander program.
 * Kept separate from the entry point so tests can drive it.
 */

import { Command } from 'commander';
import { WorklogError } from '@worklog/core';
import { registerGenerateCommand, type CommandDeps } from './commands/generate.js';
import { registerInitCommand } from './commands/init.js';

export type { CommandDeps } from './commands/generate.js';

export function createProgram(deps: CommandDeps = {}): Command {
  const program = new Command();

  program
    .name('worklog')
    .version('0.1.0')
    .description('Generate monthly Markdown worklogs from git commit history');

  // Errors propagate to the caller instead of exiting the process.
  // Set before registering so subcommands inherit it.
  program.exitOverride();

  registerGenerateCommand(program, deps);
  registerInitCommand(program);

  return program;
}

/** Exit status for a failed run: 2 validation, 3 git, 4 I/O, 1 otherwise */
export function exitCodeFor(error: unknown): number {
  return error instanceof WorklogError ? error.exitCode : 1;
}
