/**
 * `cw status`: show configuration and the repository's worktrees.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { NotARepositoryError } from '../../core/errors.js';
import type { CodewayConfig } from '../../core/types.js';
import type { Sandbox, SandboxKind } from '../../sandbox/types.js';
import { VERSION } from '../../version.js';
import { createCommandContext, createWorktreeManager, resolveRepository, type CommandContext } from '../context.js';

export interface StatusReport {
  version: string;
  configPath: string;
  config: Readonly<CodewayConfig>;
  repository: string | null;
  worktrees: Sandbox[];
}

const KIND_COLORS: Record<SandboxKind, 'green' | 'cyan' | 'yellow' | 'dim'> = {
  primary: 'green',
  persistent: 'cyan',
  temporary: 'yellow',
  unrecognized: 'dim',
};

export function createStatusCommand(getContext: () => CommandContext = () => createCommandContext()): Command {
  const cmd = new Command('status');

  cmd
    .description('Show configuration and active worktrees')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      const report = collectStatus(getContext());
      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }
      for (const line of formatStatus(report)) {
        console.log(line);
      }
    });

  return cmd;
}

export function collectStatus(context: CommandContext): StatusReport {
  let repository: string | null = null;
  try {
    repository = resolveRepository(context.git, context.config);
  } catch (err) {
    if (!(err instanceof NotARepositoryError)) throw err;
  }

  const worktrees = repository ? createWorktreeManager(context, repository).listAll() : [];
  return {
    version: VERSION,
    configPath: context.configManager.getConfigPath(),
    config: context.config,
    repository,
    worktrees,
  };
}

type CellStyle = (text: string, row: number, col: number) => string;

/**
 * Left-aligned columns. Widths come from the raw text so styling never shifts them.
 */
function table(rows: string[][], style: CellStyle = text => text): string[] {
  const widths = rows[0].map((_, col) => Math.max(...rows.map(row => row[col].length)));
  return rows.map((row, r) => {
    const last = row.length - 1;
    const cells = row.map((cell, col) => style(col === last ? cell : cell.padEnd(widths[col]), r, col));
    return '  ' + cells.join('  ');
  });
}

export function formatStatus(report: StatusReport): string[] {
  const { config } = report;
  const lines: string[] = [];

  lines.push('', chalk.bold.cyan(`codeway v${report.version}`), '');
  const configRows = [
    ['defaultCommand', config.defaultCommand],
    ['defaultRepo', config.defaultRepo ?? '(not set)'],
    ['linkDirs', config.linkDirs.join(', ') || '(none)'],
    ['config file', report.configPath],
  ];
  lines.push(...table(configRows));
  lines.push('');

  if (!report.repository) {
    lines.push(chalk.dim('Not inside a git repository; skipping worktree listing.'), '');
    return lines;
  }

  if (report.worktrees.length === 0) {
    lines.push(chalk.dim('No worktrees found.'), '');
    return lines;
  }

  lines.push(chalk.bold.cyan('Active Worktrees'), '');
  const rows = [['Branch', 'Type', 'Path'], ...report.worktrees.map(w => [w.branch, w.kind, w.path])];
  lines.push(...table(rows, (text, row, col) => {
    if (row === 0) return chalk.bold(text);
    if (col !== 1) return text;
    return chalk[KIND_COLORS[report.worktrees[row - 1].kind]](text);
  }));
  lines.push('');
  return lines;
}
