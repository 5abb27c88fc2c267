/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { VERSION, NAME } from '../version.js';
import { CodewayError, GitCommandError, WorktreeConflictError } from '../core/errors.js';
import { createLogger, setLogger } from '../core/logger.js';
import { createStartCommand } from './commands/start.js';
import { createRemoveCommand } from './commands/remove.js';
import { createSwitchCommand } from './commands/switch.js';
import { createStatusCommand } from './commands/status.js';
import { createSetDefaultCommandCommand, createSetDefaultRepoCommand } from './commands/settings.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name('cw')
    .version(VERSION)
    .description('Isolated git worktree sessions for coding agents')
    .option('-v, --verbose', 'Log debug output to stderr')
    .hook('preAction', thisCommand => {
      if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
        setLogger(createLogger(NAME, true));
      }
    });

  // Register commands
  program.addCommand(createStartCommand());
  program.addCommand(createRemoveCommand());
  program.addCommand(createSwitchCommand());
  program.addCommand(createStatusCommand());
  program.addCommand(createSetDefaultRepoCommand());
  program.addCommand(createSetDefaultCommandCommand());

  return program;
}

/**
 * Lines printed to stderr for a failed command.
 */
export function describeError(error: unknown): string[] {
  if (error instanceof WorktreeConflictError) {
    return error.detail ? [chalk.red(error.message), chalk.dim(error.detail)] : [chalk.red(error.message)];
  }
  if (error instanceof GitCommandError) {
    return error.stderr ? [chalk.red(error.message), chalk.dim(error.stderr)] : [chalk.red(error.message)];
  }
  if (error instanceof Error) {
    const lines = [chalk.red(error.message)];
    if (!(error instanceof CodewayError) && process.env.DEBUG && error.stack) {
      lines.push(error.stack);
    }
    return lines;
  }
  return [chalk.red(String(error))];
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    for (const line of describeError(error)) {
      console.error(line);
    }
    process.exit(error instanceof CodewayError ? error.exitCode : 1);
  }
}
