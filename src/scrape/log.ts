/**
 * log.ts
 *
 * Leveled console logging. Everything goes to stderr so stdout only carries the report.
 */

import type { LogLevel } from './types';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warning', 'error'];

let threshold: LogLevel = 'warning';

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

export const log = {
  debug: (...args: unknown[]) => {
    if (enabled('debug')) console.error(...args);
  },
  info: (...args: unknown[]) => {
    if (enabled('info')) console.error(...args);
  },
  warning: (...args: unknown[]) => {
    if (enabled('warning')) console.error(...args);
  },
  error: (...args: unknown[]) => {
    if (enabled('error')) console.error(...args);
  },
};
