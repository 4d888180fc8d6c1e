/**
 * Application levels and their Cloud Logging severities.
 *
 * Level values are pino's numeric levels, plus `panic` which is
 * registered on our loggers as a custom level above `fatal`.
 */

import type { Severity } from './types';

export const Level = {
  Trace: 10,
  Debug: 20,
  Info: 30,
  Warn: 40,
  Error: 50,
  Fatal: 60,
  Panic: 70,
} as const;

export type Level = (typeof Level)[keyof typeof Level];

/** Custom pino levels understood by severityFor */
export const CUSTOM_LEVELS = { panic: Level.Panic } as const;

/**
 * Map an application level to a Cloud Logging severity.
 * Runs on every write, so it switches on the number directly.
 */
export function severityFor(level: number): Severity {
  switch (level) {
    case Level.Debug:
      return 'DEBUG';
    case Level.Info:
      return 'INFO';
    case Level.Warn:
      return 'WARNING';
    case Level.Error:
      return 'ERROR';
    case Level.Fatal:
    case Level.Panic:
      return 'CRITICAL';
    default:
      return 'DEFAULT';
  }
}
