/**
 * Writer capabilities and backend contracts.
 *
 * The structured-logging front end (pino) hands every serialized record
 * to a Writer. A LevelWriter additionally receives the record's level so
 * severities survive the trip to Cloud Logging.
 */

import type { RawPayload } from './raw-payload';

/** Log record bytes as produced by the front end. */
export type LogBytes = Uint8Array | string;

export interface Writer {
  /** Returns the number of bytes accepted. */
  write(p: LogBytes): number;
}

export interface LevelWriter extends Writer {
  writeLevel(level: number, p: LogBytes): number;
}

/** Secondary writer receiving a copy of every record; fixed at construction. */
export type Tee =
  | { kind: 'none' }
  | { kind: 'plain'; writer: Writer }
  | { kind: 'leveled'; writer: LevelWriter };

/** Cloud Logging LogSeverity names */
export type Severity = 'DEFAULT' | 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

/** Cloud Logging monitored resource, e.g. { type: 'global' } */
export interface MonitoredResource {
  type: string;
  labels?: Record<string, string>;
}

/** Entry handed to the backend logger */
export interface BackendEntry {
  payload: RawPayload | string | Record<string, unknown>;
  severity?: Severity;
  /** Defaults to the time the entry was logged */
  timestamp?: Date;
  insertId?: string;
}

export interface LoggerSettings {
  commonLabels: Record<string, string>;
  commonResource: MonitoredResource;
  /** Milliseconds a buffered entry may wait before its batch is sent */
  delayThreshold: number;
  /** Pending entries that trigger an immediate send */
  entryCountThreshold: number;
  /** Pending entries beyond which new entries are dropped */
  bufferedEntryLimit: number;
}

/** Options are merged left to right; later options win. */
export type LoggerOption = Partial<LoggerSettings>;

/** A handle on one named log. log() never blocks and never throws for delivery problems. */
export interface BackendLogger {
  log(entry: BackendEntry): void;
  flush(): Promise<void>;
}

/** Connection to the logging backend. The owner must close() it before exit. */
export interface LoggingClient {
  ping(): Promise<void>;
  logger(logId: string, ...options: LoggerOption[]): BackendLogger;
  flush(): Promise<void>;
  close(): Promise<void>;
}
