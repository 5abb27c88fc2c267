import { describe, it, expect } from 'vitest';
import {
  CodewayError,
  GitCommandError,
  UserAbortError,
  WorktreeConflictError,
} from '../../../src/core/errors.js';

describe('errors', () => {
  it('should exit with 1 by default', () => {
    const error = new UserAbortError();
    expect(error).toBeInstanceOf(CodewayError);
    expect(error.message).toBe('Aborted.');
    expect(error.code).toBe('USER_ABORTED');
    expect(error.exitCode).toBe(1);
  });

  it('should describe the failed git invocation', () => {
    const error = new GitCommandError(['worktree', 'add', '/tmp/cw-a', 'dev'], 'fatal: bad', 128);
    expect(error.message).toBe('git worktree add /tmp/cw-a dev failed (exit 128)');
    expect(error.stderr).toBe('fatal: bad');
    expect(new GitCommandError(['status'], '', null).message).toBe('git status failed');
  });

  it('should keep the branch and git detail on conflicts', () => {
    const error = new WorktreeConflictError('Branch busy', 'dev', "fatal: 'dev' is already checked out");
    expect(error.branch).toBe('dev');
    expect(error.detail).toBe("fatal: 'dev' is already checked out");
    expect(error.code).toBe('WORKTREE_CONFLICT');
  });

  it('should chain the cause', () => {
    const cause = new Error('spawn git ENOENT');
    expect(new GitCommandError(['status'], '', null, cause).cause).toBe(cause);
  });
});
