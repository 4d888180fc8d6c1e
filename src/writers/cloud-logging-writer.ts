/**
 * CloudLoggingWriter accepts pre-encoded JSON records and logs them to
 * Cloud Logging, mapping application levels to severities. If a tee is
 * configured it receives a copy of each write.
 *
 * The writer adds no locking: it is as safe under concurrent use as the
 * backend logger and tee it holds.
 */

import { log } from '../shared/logger';
import { RawPayload } from '../shared/raw-payload';
import { severityFor } from '../shared/severity';
import type { BackendLogger, LevelWriter, LogBytes, Severity, Tee, Writer } from '../shared/types';

export function noTee(): Tee {
  return { kind: 'none' };
}

export function plainTee(writer: Writer): Tee {
  return { kind: 'plain', writer };
}

export function leveledTee(writer: LevelWriter): Tee {
  return { kind: 'leveled', writer };
}

export class CloudLoggingWriter implements LevelWriter {
  constructor(
    readonly logger: BackendLogger,
    readonly tee: Tee = noTee(),
  ) {}

  /** Logs with DEFAULT severity. Always returns the byte length of p. */
  write(p: LogBytes): number {
    const payload = this.emit('DEFAULT', p);
    this.copyToTee((tee) => tee.writer.write(p));
    return payload.byteLength;
  }

  /** Always returns the byte length of p. */
  writeLevel(level: number, p: LogBytes): number {
    const payload = this.emit(severityFor(level), p);
    this.copyToTee((tee) => (tee.kind === 'leveled' ? tee.writer.writeLevel(level, p) : tee.writer.write(p)));
    return payload.byteLength;
  }

  /** Rejects with the backend's error as is. */
  flush(): Promise<void> {
    return this.logger.flush();
  }

  private emit(severity: Severity, p: LogBytes): RawPayload {
    const payload = new RawPayload(p);
    this.logger.log({ payload, severity });
    return payload;
  }

  private copyToTee(copy: (tee: Exclude<Tee, { kind: 'none' }>) => void): void {
    const tee = this.tee;
    if (tee.kind === 'none') return;
    try {
      copy(tee);
    } catch (err) {
      log.warn('Tee write failed', { component: 'cloud-logging-writer', err });
    }
  }
}
