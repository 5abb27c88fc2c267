/**
 * `cw rm`: remove a persistent worktree.
 */

import { existsSync } from 'fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { UserAbortError, ValidationError } from '../../core/errors.js';
import { selectSandbox } from '../../sandbox/selection.js';
import { createCommandContext, createWorktreeManager, resolveRepository, type CommandContext } from '../context.js';

/** Status lines shown before asking to remove a dirty worktree */
export const REMOVE_PREVIEW_LIMIT = 10;

export function createRemoveCommand(getContext: () => CommandContext = () => createCommandContext()): Command {
  const cmd = new Command('rm');

  cmd
    .description('Remove a persistent worktree')
    .argument('[name]', 'Branch name of the persistent worktree')
    .option('-f, --force', 'Remove without asking, even with uncommitted changes')
    .action(async (name: string | undefined, options: { force?: boolean }) => {
      await removeWorktree(getContext(), name, options.force ?? false);
    });

  return cmd;
}

export async function removeWorktree(
  context: CommandContext,
  name: string | undefined,
  force: boolean,
  write: (line: string) => void = console.log,
): Promise<void> {
  const repo = resolveRepository(context.git, context.config);
  const manager = createWorktreeManager(context, repo);

  const persistent = manager.listAll().filter(s => s.kind === 'persistent');
  if (persistent.length === 0) {
    throw new ValidationError('No persistent worktrees found.');
  }

  const selected = await selectSandbox(persistent, name, context.prompter, 'Select worktree to remove:');

  if (!force && existsSync(selected.path)) {
    const changes = context.git.statusPorcelain(selected.path);
    if (changes) {
      const lines = changes.split('\n');
      write(chalk.bold.yellow(`⚠  Uncommitted changes in '${selected.branch}':`));
      write('');
      for (const line of lines.slice(0, REMOVE_PREVIEW_LIMIT)) {
        write(`  ${line}`);
      }
      if (lines.length > REMOVE_PREVIEW_LIMIT) {
        write(chalk.dim(`  ... and ${lines.length - REMOVE_PREVIEW_LIMIT} more`));
      }
      write('');

      if (!(await context.prompter.confirm('Remove anyway?', false))) {
        throw new UserAbortError();
      }
    }
  }

  write(chalk.yellow(`Removing worktree for '${selected.branch}' ...`));
  manager.destroy(selected.path);
  write(`${chalk.green('✓')} Removed persistent worktree for ${chalk.bold(selected.branch)}`);
}
