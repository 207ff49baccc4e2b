import pino from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

const LOG_DIR = join(homedir(), '.voxbridge', 'logs');

export interface LoggerOptions {
  /** pino level; falls back to VOXBRIDGE_LOG_LEVEL, then 'info' */
  level?: string;
  /** Pretty-print to stderr instead of writing the log file */
  verbose?: boolean;
}

function ensureLogDir(): void {
  if (!existsSync(LOG_DIR)) {
    mkdirSync(LOG_DIR, { recursive: true });
  }
}

export function createLogger(name: string = 'voxbridge', options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? process.env.VOXBRIDGE_LOG_LEVEL ?? 'info';

  if (options.verbose) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  ensureLogDir();
  return pino({
    name,
    level,
    transport: {
      target: 'pino/file',
      options: { destination: join(LOG_DIR, 'voxbridge.log'), mkdir: true },
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
