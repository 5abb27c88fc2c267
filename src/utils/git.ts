import { execFileSync } from 'child_process';
import { dirname } from 'path';
import { GitCommandError } from '../core/errors.js';

/** Outcome of a git call whose failure text matters to the caller */
export interface GitResult {
  success: boolean;
  output: string;
}

/**
 * The git primitives codeway relies on. `CliGitClient` shells out to git;
 * tests substitute an in-memory implementation.
 */
export interface GitClient {
  /** Root of the primary checkout containing `cwd`, also from inside a linked worktree */
  findRepositoryRoot(cwd: string): string | null;
  currentBranch(repo: string): string;
  refExists(repo: string, ref: string): boolean;
  createBranch(repo: string, name: string, base?: string): void;
  createTrackingBranch(repo: string, name: string, remoteRef: string): void;
  /** Local branch names, most recently committed first */
  listLocalBranches(repo: string): string[];
  /** Branch names on `remote` without the remote prefix, most recently committed first */
  listRemoteBranches(repo: string, remote: string): string[];
  addWorktree(repo: string, path: string, branch: string): GitResult;
  removeWorktree(repo: string, path: string): GitResult;
  pruneWorktrees(repo: string): GitResult;
  /** Raw `git worktree list --porcelain` output */
  listWorktrees(repo: string): string;
  /** Porcelain status of a worktree; empty when clean or when git fails */
  statusPorcelain(path: string): string;
  /** Repository-relative paths of files git does not track */
  listUntrackedFiles(repo: string): string[];
}

function execErrorDetails(err: unknown): { stderr: string; status: number | null } {
  let stderr = '';
  let status: number | null = null;
  if (typeof err === 'object' && err !== null) {
    if ('stderr' in err && (typeof err.stderr === 'string' || Buffer.isBuffer(err.stderr))) {
      stderr = err.stderr.toString();
    }
    if ('status' in err && typeof err.status === 'number') {
      status = err.status;
    }
  }
  if (!stderr && err instanceof Error) {
    stderr = err.message;
  }
  return { stderr: stderr.trim(), status };
}

function splitLines(output: string): string[] {
  return output.split('\n').filter(line => line.length > 0);
}

export class CliGitClient implements GitClient {
  /**
   * Run `git -C <dir> ...args` and return stdout; throws GitCommandError.
   */
  run(dir: string, args: string[]): string {
    try {
      return execFileSync('git', ['-C', dir, ...args], {
        encoding: 'utf-8',
        stdio: ['pipe', 'pipe', 'pipe'],
        maxBuffer: 256 * 1024 * 1024,
      });
    } catch (err) {
      const { stderr, status } = execErrorDetails(err);
      throw new GitCommandError(args, stderr, status, err instanceof Error ? err : undefined);
    }
  }

  private attempt(dir: string, args: string[]): GitResult {
    try {
      return { success: true, output: this.run(dir, args).trim() };
    } catch (err) {
      if (err instanceof GitCommandError) {
        return { success: false, output: err.stderr };
      }
      throw err;
    }
  }

  findRepositoryRoot(cwd: string): string | null {
    const result = this.attempt(cwd, ['rev-parse', '--path-format=absolute', '--git-common-dir']);
    if (!result.success || !result.output) return null;
    return dirname(result.output);
  }

  currentBranch(repo: string): string {
    const result = this.attempt(repo, ['rev-parse', '--abbrev-ref', 'HEAD']);
    return result.success && result.output ? result.output : 'HEAD';
  }

  refExists(repo: string, ref: string): boolean {
    return this.attempt(repo, ['rev-parse', '--verify', '--quiet', ref]).success;
  }

  createBranch(repo: string, name: string, base?: string): void {
    this.run(repo, base ? ['branch', name, base] : ['branch', name]);
  }

  createTrackingBranch(repo: string, name: string, remoteRef: string): void {
    this.run(repo, ['branch', '--track', name, remoteRef]);
  }

  listLocalBranches(repo: string): string[] {
    const result = this.attempt(repo, ['branch', '--sort=-committerdate', '--format=%(refname:short)']);
    return result.success ? splitLines(result.output) : [];
  }

  listRemoteBranches(repo: string, remote: string): string[] {
    const result = this.attempt(repo, ['branch', '-r', '--sort=-committerdate', '--format=%(refname:short)']);
    if (!result.success) return [];

    const prefix = `${remote}/`;
    return splitLines(result.output)
      .filter(ref => ref.startsWith(prefix) && !ref.endsWith('/HEAD'))
      .map(ref => ref.slice(prefix.length))
      .filter(Boolean);
  }

  addWorktree(repo: string, path: string, branch: string): GitResult {
    return this.attempt(repo, ['worktree', 'add', path, branch]);
  }

  removeWorktree(repo: string, path: string): GitResult {
    return this.attempt(repo, ['worktree', 'remove', '--force', path]);
  }

  pruneWorktrees(repo: string): GitResult {
    return this.attempt(repo, ['worktree', 'prune']);
  }

  listWorktrees(repo: string): string {
    return this.run(repo, ['worktree', 'list', '--porcelain']);
  }

  statusPorcelain(path: string): string {
    try {
      // Only trailing whitespace is dropped: the first column of a porcelain line may be a space.
      return this.run(path, ['status', '--porcelain', '-unormal']).trimEnd();
    } catch (err) {
      if (err instanceof GitCommandError) return '';
      throw err;
    }
  }

  listUntrackedFiles(repo: string): string[] {
    return splitLines(this.run(repo, ['ls-files', '--others']));
  }
}
