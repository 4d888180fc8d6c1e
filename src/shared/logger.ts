/**
 * Diagnostic log for the writer itself.
 *
 * Background send failures cannot be reported through the Cloud Logging
 * writer without recursing into it, so they are written as structured
 * JSON to stdout/stderr instead. On GCP runtimes Cloud Logging parses
 * these lines into entries with the given severity.
 *
 * @see https://cloud.google.com/logging/docs/structured-logging
 */

import { errorMessage } from './errors';

type DiagnosticSeverity = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

interface DiagnosticEntry {
  severity: DiagnosticSeverity;
  message: string;
  component?: string;
  logId?: string;
  [key: string]: unknown;
}

/** `err` is flattened to its message under `error`. */
export type DiagnosticContext = Omit<DiagnosticEntry, 'severity' | 'message'> & { err?: unknown };

function write(severity: DiagnosticSeverity, message: string, context: DiagnosticContext = {}): void {
  const { err, ...rest } = context;
  const entry: DiagnosticEntry = { severity, message, ...rest };
  if (err !== undefined) {
    entry.error = errorMessage(err);
  }
  const output = JSON.stringify({ ...entry, timestamp: new Date().toISOString() });

  // stderr for errors only; everything else is routine
  const stream = severity === 'ERROR' ? process.stderr : process.stdout;
  stream.write(output + '\n');
}

export const log = {
  info(message: string, context?: DiagnosticContext): void {
    write('INFO', message, context);
  },

  warn(message: string, context?: DiagnosticContext): void {
    write('WARNING', message, context);
  },

  error(message: string, context?: DiagnosticContext): void {
    write('ERROR', message, context);
  },

  debug(message: string, context?: DiagnosticContext): void {
    write('DEBUG', message, context);
  },
};

export type DiagnosticLog = typeof log;
