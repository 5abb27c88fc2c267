/**
 * Terminal prompter: Inquirer prompts on a TTY, a plain line read otherwise.
 */

import * as readline from 'readline';
import { confirm, input, search } from '@inquirer/prompts';
import { PromptUnavailableError } from '../core/errors.js';
import type { Prompter, PromptChoice } from '../core/prompter.js';
import { isInteractive } from '../utils/platform.js';

/**
 * Case-insensitive substring match on the choice label; an empty term keeps all.
 */
export function filterChoices<T extends string>(choices: PromptChoice<T>[], term: string | undefined): PromptChoice<T>[] {
  const needle = (term ?? '').trim().toLowerCase();
  if (!needle) return choices;
  return choices.filter(choice => choice.name.toLowerCase().includes(needle));
}

function readLine(message: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const rl = readline.createInterface({ input: process.stdin, output: process.stderr, terminal: false });
    let answered = false;

    rl.once('line', line => {
      answered = true;
      rl.close();
      resolve(line.trim());
    });
    rl.once('close', () => {
      if (!answered) {
        reject(new PromptUnavailableError(`No input received for: ${message}`));
      }
    });

    process.stderr.write(`${message}: `);
  });
}

export class ConsolePrompter implements Prompter {
  readonly interactive: boolean;

  constructor(interactive: boolean = isInteractive()) {
    this.interactive = interactive;
  }

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    if (!this.interactive) {
      throw new PromptUnavailableError(`Cannot ask "${message}" without a terminal. Re-run with --yes or from a terminal.`);
    }
    return confirm({ message, default: defaultValue });
  }

  async input(message: string): Promise<string> {
    if (!this.interactive) {
      return readLine(message);
    }
    const answer = await input({ message });
    return answer.trim();
  }

  async select<T extends string>(message: string, choices: PromptChoice<T>[]): Promise<T> {
    if (!this.interactive) {
      throw new PromptUnavailableError(`Cannot show "${message}" without a terminal. Pass the name as an argument.`);
    }
    return search<T>({
      message,
      source: term => filterChoices(choices, term),
    });
  }
}
