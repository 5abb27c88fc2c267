import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('child_process', () => ({
  execFileSync: vi.fn(),
}));

import { execFileSync } from 'child_process';
import { CliGitClient } from '../../../src/utils/git.js';
import { GitCommandError } from '../../../src/core/errors.js';

const mockExec = vi.mocked(execFileSync);

function gitFailure(stderr: string, status: number): Error {
  return Object.assign(new Error('Command failed'), { stderr, status });
}

describe('CliGitClient', () => {
  let git: CliGitClient;

  beforeEach(() => {
    mockExec.mockReset();
    git = new CliGitClient();
  });

  it('should run git against the given directory', () => {
    mockExec.mockReturnValue('worktree /work/app\n');

    expect(git.listWorktrees('/work/app')).toBe('worktree /work/app\n');
    expect(mockExec).toHaveBeenCalledWith(
      'git',
      ['-C', '/work/app', 'worktree', 'list', '--porcelain'],
      expect.objectContaining({ encoding: 'utf-8' }),
    );
  });

  it('should raise GitCommandError with stderr and status', () => {
    mockExec.mockImplementation(() => {
      throw gitFailure('fatal: not a git repository\n', 128);
    });

    expect(() => git.listWorktrees('/nowhere')).toThrow(GitCommandError);
    try {
      git.listWorktrees('/nowhere');
    } catch (err) {
      expect(err).toMatchObject({ stderr: 'fatal: not a git repository', status: 128 });
    }
  });

  it('should fold add failures into a result', () => {
    mockExec.mockImplementation(() => {
      throw gitFailure("fatal: 'dev' is already checked out at '/tmp/cw-a'", 128);
    });

    expect(git.addWorktree('/work/app', '/tmp/cw-b', 'dev')).toEqual({
      success: false,
      output: "fatal: 'dev' is already checked out at '/tmp/cw-a'",
    });
  });

  it('should find the primary checkout through the common git dir', () => {
    mockExec.mockReturnValue('/work/app/.git\n');
    expect(git.findRepositoryRoot('/tmp/cw-a/src')).toBe('/work/app');
  });

  it('should return null outside a repository', () => {
    mockExec.mockImplementation(() => {
      throw gitFailure('fatal: not a git repository', 128);
    });
    expect(git.findRepositoryRoot('/tmp')).toBeNull();
  });

  it('should keep the leading status column of porcelain output', () => {
    mockExec.mockReturnValue(' M src/a.ts\n?? b.txt\n');
    expect(git.statusPorcelain('/tmp/cw-a')).toBe(' M src/a.ts\n?? b.txt');
  });

  it('should report a clean status when git fails', () => {
    mockExec.mockImplementation(() => {
      throw gitFailure('fatal: bad', 128);
    });
    expect(git.statusPorcelain('/gone')).toBe('');
  });

  it('should strip the remote prefix and HEAD alias from remote branches', () => {
    mockExec.mockReturnValue('origin/HEAD\norigin/dev\nupstream/dev\norigin/feature/x\n');
    expect(git.listRemoteBranches('/work/app', 'origin')).toEqual(['dev', 'feature/x']);
  });

  it('should pass the base ref when creating a branch', () => {
    mockExec.mockReturnValue('');
    git.createBranch('/work/app', 'hotfix', 'v1.2.0');
    expect(mockExec).toHaveBeenCalledWith('git', ['-C', '/work/app', 'branch', 'hotfix', 'v1.2.0'], expect.anything());
  });
});
