/**
 * Cloud Logging client wrapper.
 *
 * Wraps @google-cloud/logging behind LoggingClient and provides:
 * - A connectivity check (ping)
 * - Per-log batching: log() buffers synchronously and a batch is sent
 *   on a count or delay threshold
 * - flush()/close() that wait for everything buffered to be delivered
 *
 * Credentials are resolved by @google-cloud/logging itself (ADC).
 */

import { Logging } from '@google-cloud/logging';
import type { Entry, Log, LoggingOptions } from '@google-cloud/logging';
import { CloudLoggingError } from '../shared/errors';
import { log } from '../shared/logger';
import { RawPayload } from '../shared/raw-payload';
import { LogIdSchema, ProjectIdSchema, parseOrThrow } from '../shared/schema';
import type { BackendEntry, BackendLogger, LoggerOption, LoggerSettings, LoggingClient } from '../shared/types';
import { resolveSettings } from './options';

export type ErrorHandler = (err: unknown) => void;

export interface ClientOptions {
  /** Receives failures of background sends. Defaults to the diagnostic log. */
  onError?: ErrorHandler;
  /** Passed through to @google-cloud/logging (credentials, apiEndpoint, ...) */
  logging?: Omit<LoggingOptions, 'projectId'>;
}

const PING_LOG_ID = 'ping';

function reportToDiagnosticLog(err: unknown): void {
  log.error('Cloud Logging write failed', { component: 'cloud-logging-client', err });
}

/**
 * Convert an entry payload to what Log.entry() expects: objects become
 * jsonPayload, everything else textPayload.
 */
export function toEntryData(payload: BackendEntry['payload']): string | Record<string, unknown> {
  if (!(payload instanceof RawPayload)) {
    return payload;
  }
  const value = payload.toJSON();
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return { ...value };
  }
  return payload.toString();
}

// ── Batching logger ────────────────────────────────────────

class BatchingLogger implements BackendLogger {
  private pending: Entry[] = [];
  private timer: NodeJS.Timeout | null = null;
  private readonly inFlight = new Set<Promise<void>>();
  /** First send error since the last flush; later ones only go to onError */
  private firstFailure: unknown = undefined;
  private failed = false;
  private closed = false;

  constructor(
    private readonly target: Log,
    private readonly settings: LoggerSettings,
    private readonly onError: ErrorHandler,
  ) {}

  log(entry: BackendEntry): void {
    if (this.closed) {
      this.onError(new CloudLoggingError(`log "${this.target.name}" is closed; entry dropped`, 'CLOSED'));
      return;
    }
    if (this.pending.length >= this.settings.bufferedEntryLimit) {
      this.onError(
        new CloudLoggingError(
          `buffered entry limit (${this.settings.bufferedEntryLimit}) reached for log "${this.target.name}"; entry dropped`,
          'OVERFLOW',
        ),
      );
      return;
    }

    this.pending.push(
      this.target.entry(
        {
          severity: entry.severity ?? 'DEFAULT',
          timestamp: entry.timestamp ?? new Date(),
          ...(entry.insertId !== undefined ? { insertId: entry.insertId } : {}),
        },
        toEntryData(entry.payload),
      ),
    );

    if (this.pending.length >= this.settings.entryCountThreshold) {
      this.send();
    } else if (this.timer === null) {
      this.timer = setTimeout(() => this.send(), this.settings.delayThreshold);
      this.timer.unref();
    }
  }

  async flush(): Promise<void> {
    this.send();
    await Promise.all(this.inFlight);
    const { failed, firstFailure } = this;
    this.failed = false;
    this.firstFailure = undefined;
    if (failed) {
      throw firstFailure;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.flush();
  }

  private send(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.pending.length === 0) return;

    const batch = this.pending;
    this.pending = [];
    const sending: Promise<void> = this.target
      .write(batch, {
        labels: this.settings.commonLabels,
        resource: this.settings.commonResource,
      })
      .then(
        () => undefined,
        (err: unknown) => {
          if (!this.failed) {
            this.failed = true;
            this.firstFailure = err;
          }
          this.onError(err);
        },
      )
      .finally(() => {
        this.inFlight.delete(sending);
      });
    this.inFlight.add(sending);
  }
}

// ── Client ─────────────────────────────────────────────────

export class CloudLoggingClient implements LoggingClient {
  private readonly loggers: BatchingLogger[] = [];
  private closed = false;

  private constructor(
    private readonly logging: Logging,
    private readonly onError: ErrorHandler,
  ) {}

  /** Throws ValidationError if the project ID is malformed. */
  static create(projectId: string, options: ClientOptions = {}): CloudLoggingClient {
    const id = parseOrThrow(ProjectIdSchema, projectId, 'project ID');
    const logging = new Logging({ ...options.logging, projectId: id });
    return new CloudLoggingClient(logging, options.onError ?? reportToDiagnosticLog);
  }

  get projectId(): string {
    return this.logging.projectId;
  }

  /**
   * Write an entry to the "ping" log. The epoch timestamp keeps it out of
   * current log views, and the fixed insert ID deduplicates repeated pings.
   */
  async ping(): Promise<void> {
    const target = this.logging.log(PING_LOG_ID);
    const entry = target.entry({ timestamp: new Date(0), insertId: 'ping' }, 'ping');
    await target.write(entry, { resource: { type: 'global' } });
  }

  /** Throws ValidationError for a malformed log ID or options. */
  logger(logId: string, ...options: LoggerOption[]): BackendLogger {
    if (this.closed) {
      throw new CloudLoggingError('client is closed', 'CLOSED');
    }
    const id = parseOrThrow(LogIdSchema, logId, 'log ID');
    const logger = new BatchingLogger(this.logging.log(id), resolveSettings(options), this.onError);
    this.loggers.push(logger);
    return logger;
  }

  async flush(): Promise<void> {
    await Promise.all(this.loggers.map((l) => l.flush()));
  }

  /** Flush everything and refuse further entries. */
  async close(): Promise<void> {
    this.closed = true;
    await Promise.all(this.loggers.map((l) => l.close()));
  }
}
