/**
 * Scripted prompter, launcher and copier for tests
 */

import { cpSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { PromptUnavailableError } from '../../src/core/errors.js';
import type { Prompter, PromptChoice } from '../../src/core/prompter.js';
import type { FileCopier } from '../../src/sandbox/provision.js';
import type { CommandLauncher } from '../../src/sandbox/shell.js';
import type { ShellContext } from '../../src/sandbox/types.js';

export interface ScriptedAnswers {
  interactive?: boolean;
  /** Consumed in order; an Error is thrown instead of answering. Defaults apply once empty. */
  confirms?: Array<boolean | Error>;
  inputs?: string[];
  /** Values to pick, in order */
  selections?: string[];
}

export class ScriptedPrompter implements Prompter {
  readonly interactive: boolean;
  readonly asked: string[] = [];
  readonly offered: Array<PromptChoice[]> = [];
  private readonly confirms: Array<boolean | Error>;
  private readonly inputs: string[];
  private readonly selections: string[];

  constructor(answers: ScriptedAnswers = {}) {
    this.interactive = answers.interactive ?? true;
    this.confirms = [...(answers.confirms ?? [])];
    this.inputs = [...(answers.inputs ?? [])];
    this.selections = [...(answers.selections ?? [])];
  }

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    this.asked.push(message);
    const next = this.confirms.shift();
    if (next === undefined) return defaultValue;
    if (next instanceof Error) throw next;
    return next;
  }

  async input(message: string): Promise<string> {
    this.asked.push(message);
    const next = this.inputs.shift();
    if (next === undefined) {
      throw new PromptUnavailableError(`No scripted input for: ${message}`);
    }
    return next;
  }

  async select<T extends string>(message: string, choices: PromptChoice<T>[]): Promise<T> {
    this.asked.push(message);
    this.offered.push(choices);
    const wanted = this.selections.shift();
    const match = choices.find(choice => choice.value === wanted);
    if (!match) {
      throw new Error(`No scripted selection among: ${choices.map(c => c.value).join(', ')}`);
    }
    return match.value;
  }
}

export interface LaunchRecord {
  command?: string;
  cwd: string;
  env: Record<string, string>;
}

export class RecordingLauncher implements CommandLauncher {
  readonly commands: LaunchRecord[] = [];
  readonly shells: Array<{ context: ShellContext; cwd: string }> = [];
  /** Runs inside each shell launch, as the user would */
  onShell?: (cwd: string, launch: number) => void | Promise<void>;
  onCommand?: (cwd: string) => void | Promise<void>;

  async runCommand(command: string, options: { cwd: string; env: Record<string, string> }): Promise<number | null> {
    this.commands.push({ command, ...options });
    await this.onCommand?.(options.cwd);
    return 0;
  }

  async launchShell(context: ShellContext, cwd: string): Promise<number | null> {
    this.shells.push({ context, cwd });
    await this.onShell?.(cwd, this.shells.length);
    return 0;
  }
}

/** Copies with cpSync and remembers what it was given */
export class RecordingCopier implements FileCopier {
  readonly copied: string[] = [];

  copy(sourceRoot: string, destRoot: string, relativePaths: string[]): void {
    for (const rel of relativePaths) {
      const target = join(destRoot, rel);
      mkdirSync(dirname(target), { recursive: true });
      cpSync(join(sourceRoot, rel), target);
      this.copied.push(rel);
    }
  }
}
