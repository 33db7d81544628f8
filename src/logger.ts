import os from 'os';
import path from 'path';
import pino from 'pino';
import type { LevelWithSilent, Logger } from 'pino';

// The terminal belongs to the UI, so log lines go to a file
export const LOG_PATH =
  process.env.BCACHEFS_TUI_LOG_FILE ??
  path.join(process.env.BCACHEFS_TUI_HOME ?? path.join(os.homedir(), '.bcachefs-tui'), 'tui.log');

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const satisfies readonly LevelWithSilent[];

export function isLogLevel(value: string): value is LevelWithSilent {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

const envLevel = process.env.BCACHEFS_TUI_LOG_LEVEL ?? 'info';

export const logger: Logger = pino(
  {
    name: 'bcachefs-tui',
    level: isLogLevel(envLevel) ? envLevel : 'info',
  },
  pino.destination({ dest: LOG_PATH, mkdir: true, sync: true })
);

export function setLogLevel(level: LevelWithSilent): void {
  logger.level = level;
}
