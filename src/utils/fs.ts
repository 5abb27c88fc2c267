import { readFileSync, writeFileSync, existsSync, mkdirSync, statSync, lstatSync } from 'fs';
import { homedir } from 'os';
import { dirname, join, resolve } from 'path';

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export function ensureDirSync(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Read file content safely, returns null if file doesn't exist
 */
export function readFileSafe(filePath: string): string | null {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch {
    return null;
  }
}

/**
 * Write file with automatic directory creation
 */
export function writeFileSafe(filePath: string, content: string): void {
  ensureDirSync(dirname(filePath));
  writeFileSync(filePath, content, 'utf-8');
}

/**
 * Check if a path exists without following a final symlink, so dangling
 * links count as present.
 */
export function lexists(p: string): boolean {
  try {
    lstatSync(p);
    return true;
  } catch {
    return false;
  }
}

export function isDirectory(p: string): boolean {
  try {
    return statSync(p).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Resolve a user-supplied path, expanding a leading `~`
 */
export function expandPath(input: string, workingDir: string = process.cwd()): string {
  if (input === '~') return homedir();
  if (input.startsWith('~/')) return join(homedir(), input.slice(2));
  return resolve(workingDir, input);
}
