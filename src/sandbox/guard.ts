/**
 * Last stop before a temporary worktree is deleted. While the worktree is
 * dirty the user can go back into a shell to commit or stash; declining, or
 * closing the prompt, lets cleanup proceed.
 */

import { existsSync } from 'fs';
import chalk, { type ChalkInstance } from 'chalk';
import type { Logger } from 'pino';
import { getLogger } from '../core/logger.js';
import type { Prompter } from '../core/prompter.js';
import type { GitClient } from '../utils/git.js';
import type { CommandLauncher } from './shell.js';
import type { ShellContext } from './types.js';

export const SUMMARY_LIMIT = 15;

const STATUS_COLORS: Record<string, 'yellow' | 'green' | 'red' | 'cyan'> = {
  M: 'yellow',
  A: 'green',
  D: 'red',
  '??': 'cyan',
};

/**
 * One colored line per porcelain entry, at most `limit` of them, followed by
 * an "... and N more" line when truncated.
 */
export function formatChangeSummary(
  porcelain: string,
  options: { limit?: number; colors?: ChalkInstance } = {},
): string[] {
  const { limit = SUMMARY_LIMIT, colors = chalk } = options;
  const lines = porcelain.split('\n').filter(line => line.trim() !== '');

  const formatted = lines.slice(0, limit).map(line => {
    const status = line.slice(0, 2).trim();
    const name = line.slice(3);
    const color = STATUS_COLORS[status];
    const tag = color ? colors[color](status) : colors.white(status);
    return `  ${tag} ${name}`;
  });

  if (lines.length > limit) {
    formatted.push(colors.dim(`  ... and ${lines.length - limit} more`));
  }
  return formatted;
}

export interface GuardOptions {
  git: GitClient;
  prompter: Prompter;
  launcher: CommandLauncher;
  write?: (line: string) => void;
  logger?: Logger;
}

export class UncommittedChangeGuard {
  private readonly write: (line: string) => void;
  private readonly logger: Logger;

  constructor(private readonly options: GuardOptions) {
    this.write = options.write ?? (line => console.log(line));
    this.logger = options.logger ?? getLogger();
  }

  async run(worktree: string, shell: ShellContext): Promise<void> {
    const { git, prompter, launcher } = this.options;
    if (!prompter.interactive || !existsSync(worktree)) return;

    for (;;) {
      const changes = git.statusPorcelain(worktree);
      if (!changes) return;

      this.write('');
      this.write(chalk.bold.yellow('⚠  Uncommitted changes'));
      this.write(chalk.dim('These will be lost when the worktree is removed.'));
      this.write('');
      for (const line of formatChangeSummary(changes)) {
        this.write(line);
      }
      this.write('');

      let goBack: boolean;
      try {
        goBack = await prompter.confirm('Return to shell to stash/stage/commit?', true);
      } catch (err) {
        this.logger.debug({ err }, 'Prompt closed; continuing with cleanup');
        return;
      }
      if (!goBack) return;

      this.write(chalk.dim("Returning to shell. Type 'exit' when done."));
      this.write('');
      await launcher.launchShell(shell, worktree);
    }
  }
}
