/**
 * Shared setup for CLI commands: configuration, git client, repository and
 * sandbox roots.
 */

import { ConfigManager } from '../core/config.js';
import { NotARepositoryError } from '../core/errors.js';
import type { Prompter } from '../core/prompter.js';
import type { CodewayConfig } from '../core/types.js';
import { WorktreeManager } from '../sandbox/worktree.js';
import type { SandboxRoots } from '../sandbox/types.js';
import { expandPath } from '../utils/fs.js';
import { CliGitClient, type GitClient } from '../utils/git.js';
import { getDefaultWorktreesDir, getTempDir } from '../utils/platform.js';
import { ConsolePrompter } from './prompter.js';

export interface CommandContext {
  configManager: ConfigManager;
  config: Readonly<CodewayConfig>;
  git: GitClient;
  prompter: Prompter;
  roots: SandboxRoots;
}

export function sandboxRoots(config: Pick<CodewayConfig, 'worktreesDir'>): SandboxRoots {
  return {
    persistentRoot: config.worktreesDir ? expandPath(config.worktreesDir) : getDefaultWorktreesDir(),
    tempRoot: getTempDir(),
  };
}

export function createCommandContext(overrides: Partial<CommandContext> = {}): CommandContext {
  const configManager = overrides.configManager ?? new ConfigManager();
  const config = overrides.config ?? configManager.load();
  return {
    configManager,
    config,
    git: overrides.git ?? new CliGitClient(),
    prompter: overrides.prompter ?? new ConsolePrompter(),
    roots: overrides.roots ?? sandboxRoots(config),
  };
}

/**
 * The primary checkout to work on: the repository around `cwd`, else the
 * configured default repository.
 */
export function resolveRepository(
  git: GitClient,
  config: Pick<CodewayConfig, 'defaultRepo'>,
  cwd: string = process.cwd(),
): string {
  const detected = git.findRepositoryRoot(cwd);
  if (detected) return detected;

  if (config.defaultRepo) {
    const fallback = git.findRepositoryRoot(expandPath(config.defaultRepo));
    if (fallback) return fallback;
    throw new NotARepositoryError(
      `Default repository ${config.defaultRepo} is not a git repository. Update it with 'cw set-default-repo'.`,
    );
  }

  throw new NotARepositoryError(
    "Not inside a git repository. Run from a repository or set one with 'cw set-default-repo'.",
  );
}

export function createWorktreeManager(context: CommandContext, repo: string): WorktreeManager {
  return new WorktreeManager(repo, {
    git: context.git,
    prompter: context.prompter,
    roots: context.roots,
  });
}
