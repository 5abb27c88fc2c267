/**
 * In-memory git for tests. Worktree directories are created and deleted on
 * the real file system so path checks behave as they do against git.
 */

import { existsSync, mkdirSync, readdirSync, rmSync } from 'fs';
import { sep } from 'path';
import { GitCommandError } from '../../src/core/errors.js';
import type { GitClient, GitResult } from '../../src/utils/git.js';

export interface FakeWorktree {
  path: string;
  branch: string | null;
  head: string;
}

export interface FakeGitOptions {
  current?: string;
  branches?: string[];
  remoteBranches?: string[];
  untracked?: string[];
}

const HEAD = '0123456789abcdef0123456789abcdef01234567';

export class FakeGitClient implements GitClient {
  readonly branches: Set<string>;
  readonly remoteBranches: Set<string>;
  readonly worktrees: FakeWorktree[];
  readonly status = new Map<string, string>();
  readonly calls: string[] = [];
  untracked: string[];
  /** Output of a forced `worktree add` failure */
  addFailure: string | null = null;
  listFails = false;

  constructor(
    readonly repo: string,
    options: FakeGitOptions = {},
  ) {
    const current = options.current ?? 'main';
    this.branches = new Set([current, ...(options.branches ?? [])]);
    this.remoteBranches = new Set(options.remoteBranches ?? []);
    this.worktrees = [{ path: repo, branch: current, head: HEAD }];
    this.untracked = options.untracked ?? [];
  }

  findRepositoryRoot(cwd: string): string | null {
    return cwd === this.repo || cwd.startsWith(this.repo + sep) ? this.repo : null;
  }

  currentBranch(_repo: string): string {
    return this.worktrees[0].branch ?? 'HEAD';
  }

  refExists(_repo: string, ref: string): boolean {
    if (ref.startsWith('refs/heads/')) {
      return this.branches.has(ref.slice('refs/heads/'.length));
    }
    if (ref.startsWith('refs/remotes/origin/')) {
      return this.remoteBranches.has(ref.slice('refs/remotes/origin/'.length));
    }
    return false;
  }

  createBranch(_repo: string, name: string, base?: string): void {
    this.calls.push(base ? `branch ${name} ${base}` : `branch ${name}`);
    this.branches.add(name);
  }

  createTrackingBranch(_repo: string, name: string, remoteRef: string): void {
    this.calls.push(`branch --track ${name} ${remoteRef}`);
    this.branches.add(name);
  }

  listLocalBranches(_repo: string): string[] {
    return [...this.branches];
  }

  listRemoteBranches(_repo: string, _remote: string): string[] {
    return [...this.remoteBranches];
  }

  /** Register a worktree without going through `addWorktree` */
  attach(path: string, branch: string): void {
    mkdirSync(path, { recursive: true });
    this.branches.add(branch);
    this.worktrees.push({ path, branch, head: HEAD });
  }

  addWorktree(_repo: string, path: string, branch: string): GitResult {
    this.calls.push(`worktree add ${path} ${branch}`);
    if (this.addFailure !== null) {
      return { success: false, output: this.addFailure };
    }
    if (!this.branches.has(branch)) {
      return { success: false, output: `fatal: invalid reference: ${branch}` };
    }
    const holder = this.worktrees.find(w => w.branch === branch);
    if (holder) {
      return { success: false, output: `fatal: '${branch}' is already checked out at '${holder.path}'` };
    }
    if (existsSync(path) && readdirSync(path).length > 0) {
      return { success: false, output: `fatal: '${path}' already exists` };
    }

    mkdirSync(path, { recursive: true });
    this.worktrees.push({ path, branch, head: HEAD });
    return { success: true, output: `Preparing worktree (checking out '${branch}')` };
  }

  removeWorktree(_repo: string, path: string): GitResult {
    this.calls.push(`worktree remove --force ${path}`);
    const index = this.worktrees.findIndex(w => w.path === path);
    if (index <= 0) {
      return { success: false, output: `fatal: '${path}' is not a working tree` };
    }
    this.worktrees.splice(index, 1);
    rmSync(path, { recursive: true, force: true });
    return { success: true, output: '' };
  }

  pruneWorktrees(_repo: string): GitResult {
    this.calls.push('worktree prune');
    for (let i = this.worktrees.length - 1; i > 0; i--) {
      if (!existsSync(this.worktrees[i].path)) this.worktrees.splice(i, 1);
    }
    return { success: true, output: '' };
  }

  listWorktrees(_repo: string): string {
    if (this.listFails) {
      throw new GitCommandError(['worktree', 'list', '--porcelain'], 'fatal: not a git repository', 128);
    }
    return this.worktrees
      .map(w => {
        const ref = w.branch ? `branch refs/heads/${w.branch}` : 'detached';
        return `worktree ${w.path}\nHEAD ${w.head}\n${ref}\n`;
      })
      .join('\n');
  }

  statusPorcelain(path: string): string {
    return this.status.get(path) ?? '';
  }

  listUntrackedFiles(_repo: string): string[] {
    return this.untracked;
  }

  isRegistered(path: string): boolean {
    return this.worktrees.some(w => w.path === path);
  }
}
