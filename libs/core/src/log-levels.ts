import type { LogLevel } from '@nestjs/common';

const ORDERED_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

const LEVEL_ALIASES: Record<string, LogLevel> = {
  fatal: 'fatal',
  error: 'error',
  warn: 'warn',
  info: 'log',
  debug: 'debug',
  trace: 'verbose',
};

/** Maps LOG_LEVEL to the set of Nest logger levels that stay enabled. */
export const resolveLogLevels = (level?: string): LogLevel[] => {
  const target = LEVEL_ALIASES[(level ?? 'info').trim().toLowerCase()] ?? 'log';
  return ORDERED_LEVELS.slice(0, ORDERED_LEVELS.indexOf(target) + 1);
};
