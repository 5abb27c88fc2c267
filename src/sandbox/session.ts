/**
 * Session lifecycle behind `cw start` / `cw go`.
 *
 *   idle → created → synced → deps-linked → (command-running) → shell-active
 *        → cleaning-up → done
 *
 * Persistent sessions stop at shell-active and keep their worktree. Temporary
 * sessions always finish through `finalize()`, which runs once no matter
 * whether it is reached by normal completion, an error, or a signal.
 */

import { existsSync } from 'fs';
import { dirname } from 'path';
import type { Logger } from 'pino';
import { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import { AutoConfirmPrompter, type Prompter } from '../core/prompter.js';
import type { CodewayConfig } from '../core/types.js';
import type { GitClient } from '../utils/git.js';
import { ensureDirSync } from '../utils/fs.js';
import { BranchResolver } from './branch-resolver.js';
import { UncommittedChangeGuard } from './guard.js';
import { createTempSandboxPath, derivePersistentPath } from './naming.js';
import { linkDependencies, runPostCreate, syncUntrackedFiles, type FileCopier } from './provision.js';
import { buildShellEnv, shellContextFor, type CommandLauncher } from './shell.js';
import { syncPolicyFromConfig } from './sync-filter.js';
import type { SandboxRoots, SessionState, ShellContext } from './types.js';
import { WorktreeManager } from './worktree.js';

/** Conventional POSIX numbers, used for the `128 + n` exit status */
export const SIGNAL_NUMBERS = { SIGHUP: 1, SIGINT: 2, SIGTERM: 15 } as const;
export type HandledSignal = keyof typeof SIGNAL_NUMBERS;
const HANDLED_SIGNALS: readonly HandledSignal[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/** Where signal handlers are installed and how the process exits */
export interface SignalHost {
  on(signal: HandledSignal, handler: () => void): void;
  off(signal: HandledSignal, handler: () => void): void;
  exit(code: number): void;
}

export const processSignalHost: SignalHost = {
  on: (signal, handler) => {
    process.on(signal, handler);
  },
  off: (signal, handler) => {
    process.off(signal, handler);
  },
  exit: code => process.exit(code),
};

export interface SessionOptions {
  branch?: string;
  baseRef?: string;
  /** Overrides the configured default command */
  command?: string;
  /** Skip the command and open the shell directly */
  shellOnly?: boolean;
  persistent?: boolean;
  /** Accept branch creation and conflict removal without asking */
  assumeYes?: boolean;
}

export interface SessionDependencies {
  git: GitClient;
  prompter: Prompter;
  launcher: CommandLauncher;
  copier: FileCopier;
  config: Readonly<CodewayConfig>;
  roots: SandboxRoots;
  shell: string;
  signals?: SignalHost;
  logger?: Logger;
  /** Sink for the guard's change summary */
  write?: (line: string) => void;
}

export interface SessionResult {
  path: string;
  branch: string;
  persistent: boolean;
  reused: boolean;
  state: SessionState;
}

/** Orchestrator-local state; lives for one run and is never persisted */
interface SessionContext {
  path: string | null;
  shell: ShellContext | null;
  finalizing: Promise<void> | null;
}

export class SessionOrchestrator {
  readonly events = new EventBus();
  private state: SessionState = 'idle';
  private readonly context: SessionContext = { path: null, shell: null, finalizing: null };
  private readonly logger: Logger;
  private readonly signals: SignalHost;
  private readonly manager: WorktreeManager;

  constructor(
    private readonly repo: string,
    private readonly deps: SessionDependencies,
  ) {
    this.logger = deps.logger ?? getLogger();
    this.signals = deps.signals ?? processSignalHost;
    this.manager = new WorktreeManager(repo, {
      git: deps.git,
      prompter: deps.prompter,
      roots: deps.roots,
      logger: this.logger,
    });
  }

  getState(): SessionState {
    return this.state;
  }

  async run(options: SessionOptions = {}): Promise<SessionResult> {
    const persistent = options.persistent ?? false;
    const decisions = options.assumeYes ? new AutoConfirmPrompter(this.deps.prompter) : this.deps.prompter;

    const resolver = new BranchResolver(this.repo, {
      git: this.deps.git,
      prompter: decisions,
      logger: this.logger,
    });
    const branch = await resolver.resolve(options.branch, options.baseRef);
    this.events.emit('branch:resolved', { branch });

    const manager = options.assumeYes
      ? new WorktreeManager(this.repo, {
          git: this.deps.git,
          prompter: decisions,
          roots: this.deps.roots,
          logger: this.logger,
        })
      : this.manager;

    if (persistent) {
      const { path, reused } = await this.attachPersistent(manager, branch);
      await this.runSession(path, branch, reused, options);
      return { path, branch, persistent, reused, state: this.state };
    }

    const path = createTempSandboxPath(this.deps.roots.tempRoot);
    this.events.emit('sandbox:creating', { path, branch, persistent });
    await manager.create(path, branch);
    this.context.path = path;
    this.events.emit('sandbox:created', { path, branch, persistent });
    this.transition('created');

    try {
      await this.runSession(path, branch, false, options);
    } finally {
      await this.finalize();
    }
    return { path, branch, persistent, reused: false, state: this.state };
  }

  /**
   * Tear down the temporary worktree: guard, then destroy. Every caller
   * shares one promise, so the work happens at most once.
   */
  finalize(): Promise<void> {
    if (!this.context.finalizing) {
      this.context.finalizing = this.cleanup();
    }
    return this.context.finalizing;
  }

  private async attachPersistent(manager: WorktreeManager, branch: string): Promise<{ path: string; reused: boolean }> {
    const path = derivePersistentPath(this.repo, branch, this.deps.roots.persistentRoot);

    if (existsSync(path) && manager.isRegistered(path)) {
      this.logger.info({ path, branch }, 'Reusing persistent worktree');
      this.events.emit('sandbox:reused', { path, branch });
      this.transition('created');
      return { path, reused: true };
    }

    if (existsSync(path)) {
      this.logger.warn({ path }, 'Discarding unregistered directory at persistent worktree path');
      this.events.emit('sandbox:orphan', { path });
      manager.destroy(path);
    }

    ensureDirSync(dirname(path));
    this.events.emit('sandbox:creating', { path, branch, persistent: true });
    await manager.create(path, branch);
    this.events.emit('sandbox:created', { path, branch, persistent: true });
    this.transition('created');
    return { path, reused: false };
  }

  private async runSession(path: string, branch: string, reused: boolean, options: SessionOptions): Promise<void> {
    const { config } = this.deps;

    if (!reused) {
      const count = syncUntrackedFiles(this.repo, path, {
        git: this.deps.git,
        copier: this.deps.copier,
        policy: syncPolicyFromConfig(config),
        logger: this.logger,
      });
      this.events.emit('files:synced', { count });
    }
    this.transition('synced');

    const linked = linkDependencies(this.repo, path, config.linkDirs, this.logger);
    this.events.emit('deps:linked', { linked });
    if (!reused && config.postCreate.length > 0) {
      runPostCreate(path, config.postCreate, this.logger);
    }
    this.transition('deps-linked');
    this.events.emit('sandbox:ready', { path, branch });

    const handlers = HANDLED_SIGNALS.map(signal => ({ signal, handler: () => this.onSignal(signal) }));
    for (const { signal, handler } of handlers) this.signals.on(signal, handler);

    try {
      if (!options.shellOnly) {
        const command = options.command || config.defaultCommand;
        this.transition('command-running');
        this.events.emit('command:start', { command });
        const exitCode = await this.deps.launcher.runCommand(command, { cwd: path, env: buildShellEnv() });
        this.events.emit('command:exit', { command, exitCode });
      }
      // A signal during the command already tore the session down.
      if (this.context.finalizing) return;

      const shell = shellContextFor(path, config, this.deps.shell);
      this.context.shell = shell;
      this.transition('shell-active');
      this.events.emit('shell:start', { path });
      await this.deps.launcher.launchShell(shell, path);
    } finally {
      for (const { signal, handler } of handlers) this.signals.off(signal, handler);
    }
  }

  private onSignal(signal: HandledSignal): void {
    this.logger.info({ signal }, 'Signal received; cleaning up');
    this.events.emit('signal:received', { signal });
    const code = 128 + SIGNAL_NUMBERS[signal];
    void this.finalize().then(
      () => this.signals.exit(code),
      err => {
        this.logger.error({ err }, 'Cleanup after signal failed');
        this.signals.exit(code);
      },
    );
  }

  private async cleanup(): Promise<void> {
    const path = this.context.path;
    if (!path) return;

    this.transition('cleaning-up');
    if (this.context.shell && existsSync(path)) {
      const guard = new UncommittedChangeGuard({
        git: this.deps.git,
        prompter: this.deps.prompter,
        launcher: this.deps.launcher,
        write: this.deps.write,
        logger: this.logger,
      });
      try {
        await guard.run(path, this.context.shell);
      } catch (err) {
        this.logger.warn({ err, path }, 'Uncommitted-change check failed; removing worktree anyway');
      }
    }

    this.events.emit('cleanup:start', { path });
    this.manager.destroy(path);
    this.events.emit('cleanup:done', { path });
    this.transition('done');
  }

  private transition(to: SessionState): void {
    const from = this.state;
    this.state = to;
    this.logger.debug({ from, to }, 'Session state');
    this.events.emit('session:state', { from, to });
  }
}
