/**
 * Provisioning of a fresh worktree: untracked files, dependency links and
 * post-create commands. Every step is best-effort: failures are logged and
 * the session goes on.
 */

import { spawnSync } from 'child_process';
import { cpSync, existsSync, mkdirSync, symlinkSync } from 'fs';
import { dirname, join } from 'path';
import type { Logger } from 'pino';
import { getLogger } from '../core/logger.js';
import type { GitClient } from '../utils/git.js';
import { lexists } from '../utils/fs.js';
import { shouldSync } from './sync-filter.js';
import type { SyncPolicy } from './types.js';

/** Bulk copy of repository-relative paths from one root into another */
export interface FileCopier {
  copy(sourceRoot: string, destRoot: string, relativePaths: string[]): void;
}

/**
 * `rsync -a --files-from=-`, falling back to per-file copies when rsync
 * cannot be started.
 */
export class RsyncCopier implements FileCopier {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? getLogger();
  }

  copy(sourceRoot: string, destRoot: string, relativePaths: string[]): void {
    if (relativePaths.length === 0) return;

    const result = spawnSync('rsync', ['-a', '--files-from=-', `${sourceRoot}/`, `${destRoot}/`], {
      input: relativePaths.join('\n'),
      encoding: 'utf-8',
      stdio: ['pipe', 'ignore', 'pipe'],
    });

    if (result.error) {
      this.logger.debug({ err: result.error }, 'rsync unavailable; copying files individually');
      this.copyEach(sourceRoot, destRoot, relativePaths);
    } else if (result.status !== 0) {
      this.logger.warn({ status: result.status, stderr: result.stderr.trim() }, 'rsync reported errors');
    }
  }

  private copyEach(sourceRoot: string, destRoot: string, relativePaths: string[]): void {
    for (const rel of relativePaths) {
      try {
        const target = join(destRoot, rel);
        mkdirSync(dirname(target), { recursive: true });
        cpSync(join(sourceRoot, rel), target, { preserveTimestamps: true, verbatimSymlinks: true });
      } catch (err) {
        this.logger.warn({ err, file: rel }, 'Failed to copy untracked file');
      }
    }
  }
}

/**
 * Copy the primary checkout's untracked files that pass the sync policy.
 * Returns the number of files handed to the copier.
 */
export function syncUntrackedFiles(
  repo: string,
  worktree: string,
  deps: { git: GitClient; copier: FileCopier; policy: SyncPolicy; logger?: Logger },
): number {
  const logger = deps.logger ?? getLogger();

  let untracked: string[];
  try {
    untracked = deps.git.listUntrackedFiles(repo);
  } catch (err) {
    logger.warn({ err }, 'Could not list untracked files; skipping sync');
    return 0;
  }

  const selected = untracked.filter(path => shouldSync(path, deps.policy));
  logger.debug({ total: untracked.length, selected: selected.length }, 'Syncing untracked files');

  try {
    deps.copier.copy(repo, worktree, selected);
  } catch (err) {
    logger.warn({ err }, 'Untracked file sync failed');
  }
  return selected.length;
}

/**
 * Symlink dependency directories from the primary checkout. Directories
 * missing in the primary or already present in the worktree are left alone.
 */
export function linkDependencies(
  repo: string,
  worktree: string,
  linkDirs: readonly string[],
  logger: Logger = getLogger(),
): string[] {
  const linked: string[] = [];

  for (const rel of linkDirs) {
    const source = join(repo, rel);
    const target = join(worktree, rel);
    if (!existsSync(source) || lexists(target)) continue;

    try {
      mkdirSync(dirname(target), { recursive: true });
      symlinkSync(source, target, 'dir');
      linked.push(rel);
    } catch (err) {
      logger.warn({ err, source, target }, 'Failed to link dependency directory');
    }
  }

  return linked;
}

/**
 * Run configured setup commands in a new worktree. Non-zero exits are logged.
 */
export function runPostCreate(
  worktree: string,
  commands: readonly string[],
  logger: Logger = getLogger(),
): void {
  for (const command of commands) {
    const result = spawnSync(command, { cwd: worktree, shell: true, stdio: 'ignore' });
    if (result.error || result.status !== 0) {
      logger.warn({ command, status: result.status, err: result.error }, 'Post-create command failed');
    }
  }
}
