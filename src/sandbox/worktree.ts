/**
 * Creating, locating, listing and destroying git worktrees.
 *
 * git's worktree registry is the single source of truth: every conflict
 * check and registration lookup re-reads `git worktree list --porcelain`.
 */

import { existsSync, rmSync } from 'fs';
import type { Logger } from 'pino';
import { getLogger } from '../core/logger.js';
import { GitCommandError, UserAbortError, WorktreeConflictError } from '../core/errors.js';
import type { Prompter } from '../core/prompter.js';
import type { GitClient } from '../utils/git.js';
import { canonicalPath, classifySandbox } from './naming.js';
import { BARE, DETACHED, type Sandbox, type SandboxRoots } from './types.js';

/** Messages git prints when a branch is already checked out in another worktree */
const CONFLICT_SIGNATURES = ['already checked out', 'already used by worktree'];

export type AddOutcome =
  | { kind: 'ok' }
  | { kind: 'conflict'; path: string | null; message: string }
  | { kind: 'error'; message: string };

export interface WorktreeEntry {
  path: string;
  head: string | null;
  branch: string;
}

/**
 * Decide whether a failed `worktree add` is a branch conflict. Unknown wording
 * is reported as a plain error rather than guessed at.
 */
export function classifyAddFailure(message: string): 'conflict' | 'error' {
  return CONFLICT_SIGNATURES.some(signature => message.includes(signature)) ? 'conflict' : 'error';
}

/**
 * Parse porcelain listing blocks. Blocks are separated by blank lines; the
 * accumulator is flushed at each boundary and at end of input.
 */
export function parseWorktreeList(output: string): WorktreeEntry[] {
  const entries: WorktreeEntry[] = [];
  let current: WorktreeEntry | null = null;

  for (const line of output.split('\n')) {
    if (line.trim() === '') {
      if (current) entries.push(current);
      current = null;
    } else if (line.startsWith('worktree ')) {
      if (current) entries.push(current);
      current = { path: line.slice('worktree '.length), head: null, branch: DETACHED };
    } else if (!current) {
      continue;
    } else if (line.startsWith('HEAD ')) {
      current.head = line.slice('HEAD '.length);
    } else if (line.startsWith('branch ')) {
      current.branch = line.slice('branch '.length).replace(/^refs\/heads\//, '');
    } else if (line === 'bare') {
      current.branch = BARE;
    } else if (line === 'detached') {
      current.branch = DETACHED;
    }
  }
  if (current) entries.push(current);

  return entries;
}

/**
 * Path of the worktree that has `branch` checked out, tracking the most
 * recent `worktree` line seen.
 */
export function findConflictingPath(output: string, branch: string): string | null {
  const target = `branch refs/heads/${branch}`;
  let candidate: string | null = null;

  for (const line of output.split('\n')) {
    if (line.startsWith('worktree ')) {
      candidate = line.slice('worktree '.length);
    } else if (line === target) {
      return candidate;
    }
  }
  return null;
}

export interface WorktreeManagerOptions {
  git: GitClient;
  prompter: Prompter;
  roots: SandboxRoots;
  logger?: Logger;
}

export class WorktreeManager {
  private readonly git: GitClient;
  private readonly prompter: Prompter;
  private readonly roots: SandboxRoots;
  private readonly logger: Logger;

  constructor(
    private readonly repo: string,
    options: WorktreeManagerOptions,
  ) {
    this.git = options.git;
    this.prompter = options.prompter;
    this.roots = options.roots;
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Add a worktree for `branch` at `targetPath`. When the branch is checked
   * out elsewhere the user may remove that worktree; the add is then retried
   * exactly once.
   */
  async create(targetPath: string, branch: string): Promise<void> {
    this.logger.debug({ path: targetPath, branch }, 'Creating worktree');

    const outcome = this.tryAdd(targetPath, branch);
    if (outcome.kind === 'ok') return;
    if (outcome.kind === 'error') {
      throw new GitCommandError(['worktree', 'add', targetPath, branch], outcome.message, null);
    }

    const conflictPath = outcome.path;
    if (conflictPath === null) {
      throw new WorktreeConflictError(
        `Branch '${branch}' is already checked out, but its worktree could not be located.`,
        branch,
        outcome.message,
      );
    }

    if (classifySandbox(this.repo, conflictPath, this.roots) === 'primary') {
      throw new WorktreeConflictError(
        `Branch '${branch}' is checked out in the primary checkout at ${conflictPath}. Switch it to another branch first.`,
        branch,
        outcome.message,
      );
    }

    this.logger.warn({ branch, conflictPath }, 'Branch already checked out in another worktree');
    const remove = await this.prompter.confirm(
      `Branch '${branch}' is already checked out at ${conflictPath}. Remove the existing worktree?`,
      true,
    );
    if (!remove) {
      throw new UserAbortError(`Aborted: '${branch}' is still checked out at ${conflictPath}.`);
    }

    this.destroy(conflictPath);

    const retry = this.git.addWorktree(this.repo, targetPath, branch);
    if (!retry.success) {
      throw new GitCommandError(['worktree', 'add', targetPath, branch], retry.output, null);
    }
  }

  /**
   * Run `worktree add` once and fold the result into a tagged outcome.
   */
  tryAdd(targetPath: string, branch: string): AddOutcome {
    const result = this.git.addWorktree(this.repo, targetPath, branch);
    if (result.success) {
      return { kind: 'ok' };
    }
    if (classifyAddFailure(result.output) === 'error') {
      return { kind: 'error', message: result.output };
    }
    return { kind: 'conflict', path: this.findConflictingWorktree(branch), message: result.output };
  }

  findConflictingWorktree(branch: string): string | null {
    try {
      return findConflictingPath(this.git.listWorktrees(this.repo), branch);
    } catch (err) {
      this.logger.debug({ err, branch }, 'Worktree listing failed during conflict lookup');
      return null;
    }
  }

  /**
   * Unregister and delete a worktree. Safe on paths that were never
   * worktrees and on repeated calls.
   */
  destroy(path: string): void {
    if (canonicalPath(path) === canonicalPath(this.repo)) {
      this.logger.warn({ path }, 'Refusing to remove the primary checkout');
      return;
    }
    this.logger.debug({ path }, 'Removing worktree');

    const removed = this.git.removeWorktree(this.repo, path);
    if (!removed.success) {
      this.logger.debug({ path, output: removed.output }, 'git worktree remove failed');
    }

    if (existsSync(path)) {
      try {
        rmSync(path, { recursive: true, force: true });
      } catch (err) {
        this.logger.warn({ err, path }, 'Failed to delete worktree directory');
      }
    }

    const pruned = this.git.pruneWorktrees(this.repo);
    if (!pruned.success) {
      this.logger.debug({ output: pruned.output }, 'git worktree prune failed');
    }
  }

  /**
   * Every registered worktree, classified, in listing order. Empty when git
   * cannot list them.
   */
  listAll(): Sandbox[] {
    let output: string;
    try {
      output = this.git.listWorktrees(this.repo);
    } catch (err) {
      this.logger.debug({ err }, 'Worktree listing failed');
      return [];
    }

    return parseWorktreeList(output).map(entry => ({
      ...entry,
      kind: classifySandbox(this.repo, entry.path, this.roots),
    }));
  }

  isRegistered(path: string): boolean {
    let output: string;
    try {
      output = this.git.listWorktrees(this.repo);
    } catch {
      return false;
    }

    const target = canonicalPath(path);
    return parseWorktreeList(output).some(entry => canonicalPath(entry.path) === target);
  }
}
