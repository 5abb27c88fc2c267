/**
 * `cw set-default-repo` and `cw set-default-command`: persist settings to
 * the global config file.
 */

import { Command } from 'commander';
import { ConfigManager } from '../../core/config.js';
import { ValidationError } from '../../core/errors.js';
import type { Prompter } from '../../core/prompter.js';
import { expandPath, isDirectory } from '../../utils/fs.js';
import { ConsolePrompter } from '../prompter.js';

export function validateRepoPath(input: string): string {
  const path = expandPath(input.trim());
  if (!isDirectory(path)) {
    throw new ValidationError(`'${path}' is not a valid directory.`);
  }
  return path;
}

/**
 * Ask until an existing directory is entered.
 */
export async function promptRepoPath(prompter: Prompter, write: (line: string) => void = console.error): Promise<string> {
  for (;;) {
    const answer = await prompter.input('Enter the path to your repository');
    try {
      return validateRepoPath(answer);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      write(`Error: ${err.message} Please try again.`);
    }
  }
}

export function createSetDefaultRepoCommand(
  configManager: ConfigManager = new ConfigManager(),
  prompter: Prompter = new ConsolePrompter(),
): Command {
  const cmd = new Command('set-default-repo');

  cmd
    .description('Set the repository used when not inside one')
    .argument('[path]', 'Path to the repository (prompted when omitted)')
    .action(async (path: string | undefined) => {
      const resolved = path !== undefined ? validateRepoPath(path) : await promptRepoPath(prompter);
      configManager.set('defaultRepo', resolved);
      console.log(`defaultRepo set to: ${resolved}`);
      console.log(`Saved to ${configManager.getConfigPath()}`);
    });

  return cmd;
}

export function createSetDefaultCommandCommand(configManager: ConfigManager = new ConfigManager()): Command {
  const cmd = new Command('set-default-command');

  cmd
    .description('Set the command run in new sessions')
    .argument('<command>', 'Command to run in new sessions')
    .action((command: string) => {
      if (!command.trim()) {
        throw new ValidationError('Command must not be empty.');
      }
      configManager.set('defaultCommand', command);
      console.log(`defaultCommand set to: ${command}`);
      console.log(`Saved to ${configManager.getConfigPath()}`);
    });

  return cmd;
}
