import pino from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { getGlobalDir } from '../utils/platform.js';
import { NAME } from '../version.js';

function getLogDir(): string {
  return join(getGlobalDir(), 'logs');
}

function ensureLogDir(): void {
  const dir = getLogDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

export function createLogger(name: string = NAME, verbose: boolean = false): pino.Logger {
  if (verbose) {
    return pino({
      name,
      level: 'debug',
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  ensureLogDir();
  return pino({
    name,
    level: 'debug',
    transport: {
      target: 'pino/file',
      options: { destination: join(getLogDir(), `${NAME}.log`), mkdir: true },
    },
  });
}

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}
