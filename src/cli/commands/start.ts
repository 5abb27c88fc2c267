/**
 * `cw start` / `cw go`: open a session on a branch in its own worktree.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { RsyncCopier } from '../../sandbox/provision.js';
import { SessionOrchestrator, type SessionOptions } from '../../sandbox/session.js';
import { SpawnLauncher } from '../../sandbox/shell.js';
import type { EventBus } from '../../core/events.js';
import { getUserShell } from '../../utils/platform.js';
import { createCommandContext, resolveRepository, type CommandContext } from '../context.js';

interface StartCommandOptions {
  command?: string;
  shell?: boolean;
  persistent?: boolean;
  base?: string;
  yes?: boolean;
}

export function createStartCommand(getContext: () => CommandContext = () => createCommandContext()): Command {
  const cmd = new Command('start');

  cmd
    .alias('go')
    .description('Create a worktree for a branch and start a session in it')
    .argument('[branch]', 'Branch to work on (picked interactively when omitted)')
    .option('-c, --command <command>', 'Command to run instead of the default')
    .option('-s, --shell', 'Skip the command and open a shell right away')
    .option('-p, --persistent', 'Keep the worktree after the session ends')
    .option('-b, --base <ref>', 'Start point when the branch has to be created')
    .option('-y, --yes', 'Answer yes to branch creation and conflict prompts')
    .action(async (branch: string | undefined, options: StartCommandOptions) => {
      await startSession(getContext(), {
        branch,
        baseRef: options.base,
        command: options.command,
        shellOnly: options.shell ?? false,
        persistent: options.persistent ?? false,
        assumeYes: options.yes ?? false,
      });
    });

  return cmd;
}

/**
 * Terminal progress for a session, driven by the orchestrator's events.
 */
export function attachSessionPrinter(events: EventBus, persistent: boolean, write: (line: string) => void = console.log): void {
  events.on('sandbox:creating', ({ branch }) => {
    write(chalk.cyan(`Creating ${persistent ? 'persistent ' : ''}worktree for ${branch} ...`));
  });
  events.on('sandbox:created', ({ branch }) => {
    write(`${chalk.green('✓')} Worktree created for ${chalk.bold(branch)}`);
  });
  events.on('sandbox:reused', ({ branch }) => {
    write(`${chalk.green('✓')} Reusing persistent worktree for ${chalk.bold(branch)}`);
  });
  events.on('sandbox:orphan', ({ path }) => {
    write(chalk.yellow(`Removing stale directory ${path}`));
  });
  events.on('files:synced', ({ count }) => {
    write(`${chalk.green('✓')} Untracked files synced ${chalk.dim(`(${count})`)}`);
  });
  events.on('deps:linked', ({ linked }) => {
    if (linked.length > 0) {
      write(`${chalk.green('✓')} Dependencies linked ${chalk.dim(`(${linked.join(', ')})`)}`);
    }
  });
  events.on('sandbox:ready', ({ path, branch }) => {
    write('');
    write(`${chalk.bold.green('Worktree ready!')} ${chalk.dim(path)}`);
    write(`${chalk.dim('Branch:')} ${chalk.bold(branch)}`);
    write('');
  });
  events.on('command:start', ({ command }) => {
    write(`${chalk.bold.cyan('Launching:')} ${command}`);
    write('');
  });
  events.on('shell:start', () => {
    write(chalk.dim(persistent
      ? "Dropping into shell. Type 'exit' to leave; the worktree is kept."
      : "Dropping into shell. Type 'exit' to clean up."));
    write('');
  });
  events.on('cleanup:start', () => {
    write('');
    write(chalk.yellow('Cleaning up worktree ...'));
  });
  events.on('cleanup:done', () => {
    write(chalk.green('Done.'));
  });
}

async function startSession(context: CommandContext, options: SessionOptions): Promise<void> {
  const repo = resolveRepository(context.git, context.config);

  const orchestrator = new SessionOrchestrator(repo, {
    git: context.git,
    prompter: context.prompter,
    launcher: new SpawnLauncher(),
    copier: new RsyncCopier(),
    config: context.config,
    roots: context.roots,
    shell: getUserShell(),
  });
  attachSessionPrinter(orchestrator.events, options.persistent ?? false);

  const result = await orchestrator.run(options);
  if (result.persistent) {
    console.log(chalk.dim(`Worktree kept at ${result.path}. Remove it with 'cw rm ${result.branch}'.`));
  }
}
