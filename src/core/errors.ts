export class CodewayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number = 1,
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = 'CodewayError';
  }
}

export class ConfigError extends CodewayError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 1, cause);
    this.name = 'ConfigError';
  }
}

export class NotARepositoryError extends CodewayError {
  constructor(message: string = 'Not inside a git repository.') {
    super(message, 'NOT_A_REPOSITORY');
    this.name = 'NotARepositoryError';
  }
}

export class UserAbortError extends CodewayError {
  constructor(message: string = 'Aborted.') {
    super(message, 'USER_ABORTED');
    this.name = 'UserAbortError';
  }
}

export class ValidationError extends CodewayError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class PromptUnavailableError extends CodewayError {
  constructor(message: string) {
    super(message, 'NO_TTY');
    this.name = 'PromptUnavailableError';
  }
}

/**
 * Raised when a branch is checked out elsewhere and the conflict cannot be
 * resolved. `detail` holds git's own error text when there is one.
 */
export class WorktreeConflictError extends CodewayError {
  constructor(
    message: string,
    public readonly branch: string,
    public readonly detail?: string,
  ) {
    super(message, 'WORKTREE_CONFLICT');
    this.name = 'WorktreeConflictError';
  }
}

export class GitCommandError extends CodewayError {
  constructor(
    public readonly args: readonly string[],
    public readonly stderr: string,
    public readonly status: number | null,
    cause?: Error,
  ) {
    super(`git ${args.join(' ')} failed${status === null ? '' : ` (exit ${status})`}`, 'GIT_ERROR', 1, cause);
    this.name = 'GitCommandError';
  }
}
