import { PromptUnavailableError, ValidationError } from '../core/errors.js';
import type { Prompter } from '../core/prompter.js';
import type { Sandbox } from './types.js';

/**
 * Pick one sandbox by branch name, or interactively when no name is given.
 */
export async function selectSandbox(
  sandboxes: Sandbox[],
  name: string | undefined,
  prompter: Prompter,
  message: string,
): Promise<Sandbox> {
  if (sandboxes.length === 0) {
    throw new ValidationError('No matching worktrees found.');
  }

  if (name !== undefined) {
    const match = sandboxes.find(s => s.branch === name);
    if (!match) {
      const available = sandboxes.map(s => s.branch).join(', ');
      throw new ValidationError(`No worktree for branch '${name}'. Available: ${available}`);
    }
    return match;
  }

  if (!prompter.interactive) {
    throw new PromptUnavailableError('No terminal attached; pass a branch name.');
  }

  const choices = sandboxes.map(s => ({ name: `${s.branch}  ${s.path}`, value: s.path }));
  const path = await prompter.select(message, choices);
  const picked = sandboxes.find(s => s.path === path);
  if (!picked) {
    throw new ValidationError(`Unknown worktree: ${path}`);
  }
  return picked;
}
