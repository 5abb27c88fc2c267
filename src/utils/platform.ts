import { homedir, tmpdir } from 'os';
import { join } from 'path';

/**
 * Get the codeway global data directory (`CODEWAY_HOME` or `~/.codeway`)
 */
export function getGlobalDir(): string {
  return process.env.CODEWAY_HOME || join(homedir(), '.codeway');
}

/**
 * Default parent directory of persistent worktrees
 */
export function getDefaultWorktreesDir(): string {
  return join(getGlobalDir(), 'worktrees');
}

/**
 * Parent directory of temporary worktrees
 */
export function getTempDir(): string {
  return tmpdir();
}

/**
 * Whether stdin is attached to a terminal
 */
export function isInteractive(): boolean {
  return process.stdin.isTTY === true;
}

/**
 * The user's login shell
 */
export function getUserShell(): string {
  return process.env.SHELL || '/bin/sh';
}
