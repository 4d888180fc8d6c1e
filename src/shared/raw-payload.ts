/**
 * Pre-encoded payload carried verbatim to the backend.
 */

import type { LogBytes } from './types';

export class RawPayload {
  private readonly bytes: Buffer;

  constructor(p: LogBytes) {
    this.bytes = typeof p === 'string' ? Buffer.from(p, 'utf-8') : Buffer.from(p);
  }

  static decode(p: LogBytes): RawPayload {
    return new RawPayload(p);
  }

  /** The wrapped bytes, unchanged. */
  encode(): Buffer {
    return Buffer.from(this.bytes);
  }

  get byteLength(): number {
    return this.bytes.length;
  }

  toString(): string {
    return this.bytes.toString('utf-8');
  }

  /**
   * The value the bytes encode, so JSON.stringify embeds it instead of
   * escaping it as a string. Bytes that are not JSON stay text.
   */
  toJSON(): unknown {
    const text = this.toString();
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }
}

/** Length of p in bytes, UTF-8 for strings. */
export function byteLength(p: LogBytes): number {
  return typeof p === 'string' ? Buffer.byteLength(p, 'utf-8') : p.byteLength;
}
