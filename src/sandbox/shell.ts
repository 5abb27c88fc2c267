import { spawn } from 'child_process';
import { existsSync } from 'fs';
import { basename, delimiter, join } from 'path';
import type { ShellContext } from './types.js';

/** Launches child processes attached to the terminal and waits for them */
export interface CommandLauncher {
  runCommand(command: string, options: { cwd: string; env: Record<string, string> }): Promise<number | null>;
  launchShell(context: ShellContext, cwd: string): Promise<number | null>;
}

/**
 * Environment for a session started from this process. The virtualenv this
 * process runs in is removed so the child starts like a fresh shell.
 */
export function buildShellEnv(base: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value === undefined || key === 'VIRTUAL_ENV') continue;
    env[key] = value;
  }

  const virtualEnv = base.VIRTUAL_ENV;
  const pathValue = base.PATH ?? '';
  env.PATH = pathValue
    .split(delimiter)
    .filter(entry => entry && !entry.includes('codeway') && !(virtualEnv && entry.startsWith(virtualEnv)))
    .join(delimiter);

  return env;
}

/**
 * `source <venv>/bin/activate` for the given shell, or undefined when the
 * worktree has no such virtualenv.
 */
export function getActivateCommand(shell: string, worktree: string, venvDir?: string): string | undefined {
  if (!venvDir) return undefined;

  const venv = join(worktree, venvDir);
  const fish = basename(shell) === 'fish';
  const script = join(venv, 'bin', fish ? 'activate.fish' : 'activate');
  if (!existsSync(script)) return undefined;

  return `source ${script}`;
}

export function shellContextFor(worktree: string, config: { venvDir?: string }, shell: string): ShellContext {
  return {
    shell,
    env: buildShellEnv(),
    activateCommand: getActivateCommand(shell, worktree, config.venvDir),
  };
}

/**
 * Program and arguments that open an interactive shell, running the
 * activation command first when there is one.
 */
export function shellInvocation(context: ShellContext): { file: string; args: string[] } {
  const { shell, activateCommand } = context;
  if (!activateCommand) {
    return { file: shell, args: ['-i'] };
  }
  if (basename(shell) === 'fish') {
    return { file: shell, args: ['-C', activateCommand] };
  }
  return { file: shell, args: ['-c', `${activateCommand}; exec ${shell} -i`] };
}

function waitForExit(file: string, args: string[], options: { cwd: string; env: Record<string, string>; shell?: boolean }): Promise<number | null> {
  return new Promise((resolve, reject) => {
    const child = spawn(file, args, { ...options, stdio: 'inherit' });
    child.once('error', reject);
    child.once('exit', code => resolve(code));
  });
}

export class SpawnLauncher implements CommandLauncher {
  runCommand(command: string, options: { cwd: string; env: Record<string, string> }): Promise<number | null> {
    return waitForExit(command, [], { ...options, shell: true });
  }

  launchShell(context: ShellContext, cwd: string): Promise<number | null> {
    const { file, args } = shellInvocation(context);
    return waitForExit(file, args, { cwd, env: context.env });
  }
}
