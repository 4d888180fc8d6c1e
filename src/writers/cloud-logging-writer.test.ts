import { describe, expect, it, vi } from 'vitest';
import { log } from '../shared/logger';
import { RawPayload } from '../shared/raw-payload';
import { Level } from '../shared/severity';
import type { LevelWriter, LogBytes, Writer } from '../shared/types';
import { FakeBackendLogger } from '../testing/fake-logging-client';
import { CloudLoggingWriter, leveledTee, plainTee } from './cloud-logging-writer';

class RecordingWriter implements Writer {
  readonly writes: LogBytes[] = [];

  write(p: LogBytes): number {
    this.writes.push(p);
    return 0;
  }
}

class RecordingLevelWriter extends RecordingWriter implements LevelWriter {
  readonly leveled: Array<{ level: number; p: LogBytes }> = [];

  writeLevel(level: number, p: LogBytes): number {
    this.leveled.push({ level, p });
    return 0;
  }
}

function payloadText(backend: FakeBackendLogger, index: number): string {
  const { payload } = backend.entries[index];
  if (!(payload instanceof RawPayload)) {
    throw new Error('expected a RawPayload');
  }
  return payload.encode().toString('utf-8');
}

describe('CloudLoggingWriter', () => {
  it('logs a leveled record with its severity and raw bytes', () => {
    const backend = new FakeBackendLogger();
    const writer = new CloudLoggingWriter(backend);

    const n = writer.writeLevel(Level.Error, '{"msg":"x"}');

    expect(n).toBe(11);
    expect(backend.entries).toHaveLength(1);
    expect(backend.entries[0].severity).toBe('ERROR');
    expect(payloadText(backend, 0)).toBe('{"msg":"x"}');
  });

  it('logs plain writes with DEFAULT severity', () => {
    const backend = new FakeBackendLogger();
    const writer = new CloudLoggingWriter(backend);

    const n = writer.write(Buffer.from('{"a":true}'));

    expect(n).toBe(10);
    expect(backend.entries[0].severity).toBe('DEFAULT');
    expect(payloadText(backend, 0)).toBe('{"a":true}');
  });

  it('returns 0 for empty records', () => {
    const writer = new CloudLoggingWriter(new FakeBackendLogger());
    expect(writer.write(new Uint8Array(0))).toBe(0);
    expect(writer.writeLevel(Level.Info, '')).toBe(0);
  });

  it('maps unknown levels to DEFAULT', () => {
    const backend = new FakeBackendLogger();
    new CloudLoggingWriter(backend).writeLevel(Level.Trace, '{}');
    expect(backend.entries[0].severity).toBe('DEFAULT');
  });

  it('forwards level and bytes unchanged to a leveled tee', () => {
    const tee = new RecordingLevelWriter();
    const writer = new CloudLoggingWriter(new FakeBackendLogger(), leveledTee(tee));
    const line = Buffer.from('{"msg":"y"}');

    writer.writeLevel(Level.Warn, line);

    expect(tee.leveled).toEqual([{ level: Level.Warn, p: line }]);
    expect(tee.writes).toEqual([]);
  });

  it('uses the plain write path of a plain tee', () => {
    const tee = new RecordingLevelWriter();
    const writer = new CloudLoggingWriter(new FakeBackendLogger(), plainTee(tee));

    writer.writeLevel(Level.Warn, '{"msg":"y"}');

    expect(tee.writes).toEqual(['{"msg":"y"}']);
    expect(tee.leveled).toEqual([]);
  });

  it('copies plain writes to the tee', () => {
    const tee = new RecordingWriter();
    const writer = new CloudLoggingWriter(new FakeBackendLogger(), plainTee(tee));

    writer.write('{"msg":"z"}');

    expect(tee.writes).toEqual(['{"msg":"z"}']);
  });

  it('reports tee failures without failing the write', () => {
    const warn = vi.spyOn(log, 'warn').mockImplementation(() => undefined);
    const broken: Writer = {
      write: () => {
        throw new Error('EPIPE');
      },
    };
    const backend = new FakeBackendLogger();
    const writer = new CloudLoggingWriter(backend, plainTee(broken));

    expect(writer.write('{}')).toBe(2);
    expect(backend.entries).toHaveLength(1);
    expect(warn).toHaveBeenCalledWith(
      'Tee write failed',
      expect.objectContaining({ component: 'cloud-logging-writer' }),
    );
  });

  it('propagates flush errors unchanged', async () => {
    const backend = new FakeBackendLogger();
    const failure = new Error('deadline exceeded');
    backend.flushError = failure;

    await expect(new CloudLoggingWriter(backend).flush()).rejects.toBe(failure);
    expect(backend.flushCalls).toBe(1);
  });

  it('resolves flush when the backend does', async () => {
    const backend = new FakeBackendLogger();
    await expect(new CloudLoggingWriter(backend).flush()).resolves.toBeUndefined();
  });
});
