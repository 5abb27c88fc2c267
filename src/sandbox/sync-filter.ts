import { DEFAULT_SKIP_NAMES, DEFAULT_SKIP_PREFIXES, DEFAULT_SKIP_SUFFIXES } from '../core/types.js';
import type { CodewayConfig } from '../core/types.js';
import type { SyncPolicy } from './types.js';

export const DEFAULT_SYNC_POLICY: SyncPolicy = {
  skipPrefixes: DEFAULT_SKIP_PREFIXES,
  skipNames: DEFAULT_SKIP_NAMES,
  skipSuffixes: DEFAULT_SKIP_SUFFIXES,
};

export function syncPolicyFromConfig(config: Pick<CodewayConfig, 'sync'>): SyncPolicy {
  return {
    skipPrefixes: config.sync.skipPrefixes,
    skipNames: config.sync.skipNames,
    skipSuffixes: config.sync.skipSuffixes,
  };
}

/**
 * Whether an untracked file should be copied into a new worktree.
 * Prefixes match anywhere in the path, so nested `node_modules/` is skipped too.
 */
export function shouldSync(relativePath: string, policy: SyncPolicy = DEFAULT_SYNC_POLICY): boolean {
  if (policy.skipPrefixes.some(prefix => relativePath.includes(prefix))) {
    return false;
  }
  const name = relativePath.slice(relativePath.lastIndexOf('/') + 1);
  if (policy.skipNames.includes(name)) {
    return false;
  }
  return !policy.skipSuffixes.some(suffix => name.endsWith(suffix));
}
