import pino from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

const LOG_DIR = join(homedir(), '.mindgate', 'logs');

export type Logger = pino.Logger;

function ensureLogDir(): void {
  if (!existsSync(LOG_DIR)) {
    mkdirSync(LOG_DIR, { recursive: true });
  }
}

function resolveLevel(): string {
  return process.env.MINDGATE_LOG_LEVEL || 'info';
}

export function createLogger(name: string = 'mindgate', verbose: boolean = false): Logger {
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
    level: resolveLevel(),
    transport: {
      target: 'pino/file',
      options: { destination: join(LOG_DIR, 'mindgate.log'), mkdir: true },
    },
  });
}

let _logger: Logger | null = null;

export function getLogger(): Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: Logger): void {
  _logger = logger;
}
