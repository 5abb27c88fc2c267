import { z } from 'zod';
import type { SessionState } from '../sandbox/types.js';

// ===== Configuration =====

export const DEFAULT_SKIP_PREFIXES = [
  'node_modules/',
  '.venv/',
  'venv/',
  '__pycache__/',
  '.next/',
  '.turbo/',
  '.nuxt/',
  '.cache/',
  'dist/',
  'build/',
  'coverage/',
] as const;

export const DEFAULT_SKIP_SUFFIXES = ['.sqlite3', '.db', '.pyc'] as const;

export const DEFAULT_SKIP_NAMES = ['.DS_Store', '.coverage'] as const;

export const CodewayConfigSchema = z.object({
  /** Command launched in every new session unless `--command` or `--shell` is given */
  defaultCommand: z.string().min(1).default('claude'),
  /** Repository used when the working directory is not inside one */
  defaultRepo: z.string().optional(),
  /** Parent directory of persistent worktrees */
  worktreesDir: z.string().optional(),
  /** Directories symlinked from the primary checkout instead of copied */
  linkDirs: z.array(z.string()).default(['node_modules', '.venv']),
  /** Virtualenv (relative to the worktree) activated in the session shell */
  venvDir: z.string().optional(),
  /** Shell commands run once in every freshly created worktree */
  postCreate: z.array(z.string()).default([]),
  sync: z.object({
    skipPrefixes: z.array(z.string()).default([...DEFAULT_SKIP_PREFIXES]),
    skipNames: z.array(z.string()).default([...DEFAULT_SKIP_NAMES]),
    skipSuffixes: z.array(z.string()).default([...DEFAULT_SKIP_SUFFIXES]),
  }).default({}),
});

export type CodewayConfig = z.infer<typeof CodewayConfigSchema>;

/** Keys that `cw set-*` commands may write */
export type SettableConfigKey = 'defaultCommand' | 'defaultRepo';

// ===== Events =====

export interface SessionEvents {
  'session:state': { from: SessionState; to: SessionState };
  'branch:resolved': { branch: string };
  'sandbox:creating': { path: string; branch: string; persistent: boolean };
  'sandbox:created': { path: string; branch: string; persistent: boolean };
  'sandbox:reused': { path: string; branch: string };
  'sandbox:orphan': { path: string };
  'files:synced': { count: number };
  'deps:linked': { linked: string[] };
  'sandbox:ready': { path: string; branch: string };
  'command:start': { command: string };
  'command:exit': { command: string; exitCode: number | null };
  'shell:start': { path: string };
  'cleanup:start': { path: string };
  'cleanup:done': { path: string };
  'signal:received': { signal: string };
}
