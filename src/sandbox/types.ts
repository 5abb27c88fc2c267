export type SandboxKind = 'primary' | 'persistent' | 'temporary' | 'unrecognized';

/** Branch marker for worktrees without a checked-out branch */
export const DETACHED = '(detached)';
export const BARE = '(bare)';

export interface Sandbox {
  /** Absolute path as reported by git */
  path: string;
  /** Commit id of HEAD, when the listing has one */
  head: string | null;
  /** Short branch name, or DETACHED / BARE */
  branch: string;
  kind: SandboxKind;
}

/** Roots that classification and naming are relative to */
export interface SandboxRoots {
  persistentRoot: string;
  tempRoot: string;
}

export interface SyncPolicy {
  /** Excluded when found anywhere in the relative path */
  skipPrefixes: readonly string[];
  /** Excluded when equal to the final path component */
  skipNames: readonly string[];
  /** Excluded when the final path component ends with one */
  skipSuffixes: readonly string[];
}

export type SessionState =
  | 'idle'
  | 'created'
  | 'synced'
  | 'deps-linked'
  | 'command-running'
  | 'shell-active'
  | 'cleaning-up'
  | 'done';

/** Shell program, environment and optional activation used for interactive sessions */
export interface ShellContext {
  shell: string;
  env: Record<string, string>;
  activateCommand?: string;
}
