/**
 * codeway: isolated git worktree sessions
 * Public exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, CliGitClient, SessionOrchestrator } from 'codeway';
 *
 * const config = new ConfigManager().load();
 * const orchestrator = new SessionOrchestrator(repo, { config, git: new CliGitClient(), ... });
 * await orchestrator.run({ branch: 'feature/login', shellOnly: true });
 * ```
 */

// Core
export { EventBus } from './core/events.js';
export { ConfigManager } from './core/config.js';
export { createLogger, getLogger, setLogger } from './core/logger.js';
export { AutoConfirmPrompter, type Prompter, type PromptChoice } from './core/prompter.js';
export {
  CodewayError,
  ConfigError,
  NotARepositoryError,
  UserAbortError,
  ValidationError,
  PromptUnavailableError,
  WorktreeConflictError,
  GitCommandError,
} from './core/errors.js';
export {
  CodewayConfigSchema,
  type CodewayConfig,
  type SettableConfigKey,
  type SessionEvents,
} from './core/types.js';

// Git
export { CliGitClient, type GitClient, type GitResult } from './utils/git.js';

// Sandboxes
export * from './sandbox/index.js';

// CLI
export { createCLI, main } from './cli/index.js';
export { ConsolePrompter } from './cli/prompter.js';

export { VERSION, NAME } from './version.js';
