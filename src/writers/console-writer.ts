/**
 * Human-readable output for interactive terminals.
 *
 * Off a terminal, output is expected to go through CloudLoggingWriter,
 * so the selector hands back a writer that drops everything.
 */

import { prettyFactory } from 'pino-pretty';
import { byteLength } from '../shared/raw-payload';
import type { LogBytes, Writer } from '../shared/types';

/** A writable stream that may be attached to a terminal (process.stdout, process.stderr) */
export interface OutputStream extends NodeJS.WritableStream {
  isTTY?: boolean;
}

/** Renders pino JSON lines with pino-pretty and writes them to out. */
export class ConsoleWriter implements Writer {
  private readonly format: (line: string) => string;

  constructor(
    private readonly out: NodeJS.WritableStream,
    colorful: boolean,
  ) {
    this.format = prettyFactory({
      colorize: colorful,
      messageKey: 'message',
      customLevels: 'panic:70',
      useOnlyCustomProps: false,
      ignore: 'pid,hostname',
    });
  }

  write(p: LogBytes): number {
    const line = typeof p === 'string' ? p : Buffer.from(p).toString('utf-8');
    this.out.write(this.format(line.trimEnd()));
    return byteLength(p);
  }
}

export const discardWriter: Writer = {
  write: (p) => byteLength(p),
};

export function consoleWriterIfTerminal(stream: OutputStream, colorful: boolean): Writer {
  if (stream.isTTY === true) {
    return new ConsoleWriter(stream, colorful);
  }
  return discardWriter;
}
