/**
 * `cw switch`: open a shell in an existing worktree.
 */

import { existsSync } from 'fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { ValidationError } from '../../core/errors.js';
import { selectSandbox } from '../../sandbox/selection.js';
import { SpawnLauncher, shellContextFor, type CommandLauncher } from '../../sandbox/shell.js';
import type { SandboxKind } from '../../sandbox/types.js';
import { getUserShell } from '../../utils/platform.js';
import { createCommandContext, createWorktreeManager, resolveRepository, type CommandContext } from '../context.js';

const SWITCHABLE: readonly SandboxKind[] = ['primary', 'persistent', 'temporary'];

export function createSwitchCommand(getContext: () => CommandContext = () => createCommandContext()): Command {
  const cmd = new Command('switch');

  cmd
    .description('Open a shell in an existing worktree')
    .argument('[name]', 'Branch name of the worktree')
    .action(async (name: string | undefined) => {
      await switchWorktree(getContext(), name, new SpawnLauncher());
    });

  return cmd;
}

export async function switchWorktree(
  context: CommandContext,
  name: string | undefined,
  launcher: CommandLauncher,
  write: (line: string) => void = console.log,
): Promise<void> {
  const repo = resolveRepository(context.git, context.config);
  const manager = createWorktreeManager(context, repo);

  const switchable = manager.listAll().filter(s => SWITCHABLE.includes(s.kind));
  if (switchable.length === 0) {
    throw new ValidationError("No worktrees found. Create one with 'cw go <branch>'.");
  }

  const selected = await selectSandbox(switchable, name, context.prompter, 'Select a worktree:');
  if (!existsSync(selected.path)) {
    throw new ValidationError(`Worktree directory does not exist: ${selected.path}`);
  }

  if (selected.kind === 'temporary') {
    write('');
    write(chalk.yellow('Warning: This is a temporary worktree. It will be deleted when the original session exits.'));
    write(chalk.dim("Tip: Use 'cw go -p <branch>' to create persistent worktrees that won't be cleaned up."));
  }

  write('');
  write(`${chalk.bold.green('Switching to:')} ${selected.branch}`);
  write(chalk.dim(selected.path));
  write(chalk.dim("Type 'exit' to leave."));
  write('');

  await launcher.launchShell(shellContextFor(selected.path, context.config, getUserShell()), selected.path);
}
