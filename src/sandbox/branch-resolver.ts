/**
 * Branch resolution: make sure the branch a session asks for exists locally.
 */

import type { Logger } from 'pino';
import { getLogger } from '../core/logger.js';
import { UserAbortError, ValidationError } from '../core/errors.js';
import type { Prompter, PromptChoice } from '../core/prompter.js';
import type { GitClient } from '../utils/git.js';

export const CREATE_NEW_BRANCH = '+ Create new branch...';
export const DEFAULT_REMOTE = 'origin';

/**
 * `origin/foo` -> `foo`, so a remote name never ends up as a detached checkout.
 */
export function normalizeBranchName(name: string, remote: string = DEFAULT_REMOTE): string {
  const trimmed = name.trim();
  const prefix = `${remote}/`;
  return trimmed.startsWith(prefix) ? trimmed.slice(prefix.length) : trimmed;
}

export interface BranchResolverOptions {
  git: GitClient;
  prompter: Prompter;
  remote?: string;
  logger?: Logger;
}

export class BranchResolver {
  private readonly git: GitClient;
  private readonly prompter: Prompter;
  private readonly remote: string;
  private readonly logger: Logger;

  constructor(
    private readonly repo: string,
    options: BranchResolverOptions,
  ) {
    this.git = options.git;
    this.prompter = options.prompter;
    this.remote = options.remote ?? DEFAULT_REMOTE;
    this.logger = options.logger ?? getLogger();
  }

  async resolve(branch?: string, baseRef?: string): Promise<string> {
    const name = branch ?? (await this.select());
    return this.ensure(name, baseRef);
  }

  /**
   * Ask for a branch: a searchable list on a terminal, a plain line otherwise.
   */
  async select(): Promise<string> {
    if (!this.prompter.interactive) {
      return this.prompter.input('Enter a branch name');
    }

    const current = this.git.currentBranch(this.repo);
    const local = this.git.listLocalBranches(this.repo).filter(b => b !== current);
    const localSet = new Set(local);
    const remoteOnly = this.git
      .listRemoteBranches(this.repo, this.remote)
      .filter(b => !localSet.has(b) && b !== current);

    const choices: PromptChoice[] = [
      { name: CREATE_NEW_BRANCH, value: CREATE_NEW_BRANCH },
      ...local.map(b => ({ name: b, value: b })),
      ...remoteOnly.map(b => ({ name: `${this.remote}/${b}`, value: `${this.remote}/${b}` })),
    ];

    const selected = await this.prompter.select('Select a branch:', choices);
    if (selected === CREATE_NEW_BRANCH) {
      return this.prompter.input('Enter a new branch name');
    }
    return normalizeBranchName(selected, this.remote);
  }

  /**
   * Return the local branch name, creating it from the remote or, after
   * confirmation, from `baseRef` (or HEAD) when it does not exist.
   */
  async ensure(name: string, baseRef?: string): Promise<string> {
    const branch = normalizeBranchName(name, this.remote);
    if (!branch) {
      throw new ValidationError('Branch name must not be empty.');
    }

    if (this.git.refExists(this.repo, `refs/heads/${branch}`)) {
      if (baseRef) {
        this.logger.debug({ branch, baseRef }, 'Branch exists; ignoring base ref');
      }
      return branch;
    }

    const remoteRef = `${this.remote}/${branch}`;
    if (this.git.refExists(this.repo, `refs/remotes/${remoteRef}`)) {
      this.logger.info({ branch, remoteRef }, 'Creating local branch tracking remote');
      this.git.createTrackingBranch(this.repo, branch, remoteRef);
      return branch;
    }

    const question = baseRef
      ? `Branch '${branch}' does not exist. Create it from '${baseRef}'?`
      : `Branch '${branch}' does not exist. Create it?`;
    if (!(await this.prompter.confirm(question, true))) {
      throw new UserAbortError();
    }

    this.logger.info({ branch, baseRef }, 'Creating branch');
    this.git.createBranch(this.repo, branch, baseRef);
    return branch;
  }
}
