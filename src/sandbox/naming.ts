/**
 * Naming and classification of worktree paths.
 *
 * Persistent worktrees live at a deterministic path under one root so later
 * sessions can find them again; temporary ones get a fresh `cw-` name under
 * the OS temp directory.
 */

import { existsSync, realpathSync } from 'fs';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'path';
import { nanoid } from 'nanoid';
import { shortHash } from '../utils/crypto.js';
import type { SandboxKind, SandboxRoots } from './types.js';

export const TEMP_PREFIX = 'cw-';

/**
 * Resolve symlinks and `.`/`..` segments. A path that does not exist is
 * resolved through its deepest existing ancestor. Never throws.
 */
export function canonicalPath(p: string): string {
  let current = resolve(p);
  const rest: string[] = [];

  for (;;) {
    try {
      return join(realpathSync(current), ...rest);
    } catch {
      const parent = dirname(current);
      if (parent === current) {
        return resolve(p);
      }
      rest.unshift(basename(current));
      current = parent;
    }
  }
}

/**
 * Whether `child` lies strictly inside `parent`; both must be canonical.
 */
export function isInside(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel !== '' && !rel.startsWith('..') && !isAbsolute(rel);
}

export function sanitizeBranchName(branch: string): string {
  return branch.replace(/[/\\]/g, '-');
}

/**
 * Deterministic location of the persistent worktree for `branch` in `repo`.
 * The fingerprint keeps same-named branches of different repositories apart.
 */
export function derivePersistentPath(repo: string, branch: string, persistentRoot: string): string {
  const fingerprint = shortHash(`${branch}:${resolve(repo)}`);
  return join(persistentRoot, `${sanitizeBranchName(branch)}-${fingerprint}`);
}

/**
 * A temporary worktree path that does not exist yet.
 */
export function createTempSandboxPath(tempRoot: string): string {
  for (;;) {
    const candidate = join(tempRoot, `${TEMP_PREFIX}${nanoid(10)}`);
    if (!existsSync(candidate)) {
      return candidate;
    }
  }
}

export function classifySandbox(repo: string, candidate: string, roots: SandboxRoots): SandboxKind {
  const path = canonicalPath(candidate);
  if (path === canonicalPath(repo)) {
    return 'primary';
  }

  if (isInside(canonicalPath(roots.persistentRoot), path)) {
    return 'persistent';
  }

  const tempRoot = canonicalPath(roots.tempRoot);
  if (isInside(tempRoot, path)) {
    const [first] = relative(tempRoot, path).split(sep);
    if (first.startsWith(TEMP_PREFIX)) {
      return 'temporary';
    }
  }

  return 'unrecognized';
}
