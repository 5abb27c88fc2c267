export * from './types.js';
export * from './naming.js';
export * from './sync-filter.js';
export * from './worktree.js';
export * from './branch-resolver.js';
export * from './provision.js';
export * from './shell.js';
export * from './guard.js';
export * from './selection.js';
export * from './session.js';
