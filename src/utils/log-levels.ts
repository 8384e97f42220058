import { LogLevel } from '@nestjs/common';

/**
 * Nest log levels from most to least severe
 */
export const LOG_LEVELS: LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'log',
  'debug',
  'verbose',
];

const DEFAULT_LOG_LEVEL: LogLevel = 'log';

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? '';
  return isLogLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

/**
 * Expands a threshold into the list Nest expects, e.g. 'warn' enables
 * fatal, error and warn.
 */
export function resolveLogLevels(threshold: LogLevel): LogLevel[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(threshold) + 1);
}
