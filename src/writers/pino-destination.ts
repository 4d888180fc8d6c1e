/**
 * Bridge from pino to a LevelWriter.
 *
 * pino only passes the serialized line to a destination. Marking the
 * destination with needsMetadataGsym makes pino set lastLevel (and the
 * other last* fields) before every write, which is how the record's
 * numeric level reaches writeLevel().
 */

import pino from 'pino';
import { CUSTOM_LEVELS } from '../shared/severity';
import { levelFromEnv } from '../shared/schema';
import type { LevelName } from '../shared/schema';
import type { LevelWriter } from '../shared/types';

export type AppLogger = pino.Logger<keyof typeof CUSTOM_LEVELS>;

export function pinoDestination(writer: LevelWriter): pino.DestinationStream {
  const destination = {
    [pino.symbols.needsMetadataGsym]: true,
    lastLevel: 0,
    write(line: string): void {
      writer.writeLevel(destination.lastLevel, line);
    },
  };
  return destination;
}

/**
 * pino logger with the `panic` level, records keyed by `message` (the
 * field Cloud Logging shows as the entry summary) and ISO timestamps.
 */
export function createLogger(
  destination: pino.DestinationStream = pino.destination(1),
  level: LevelName = levelFromEnv(),
): AppLogger {
  return pino(
    {
      level,
      customLevels: CUSTOM_LEVELS,
      messageKey: 'message',
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  );
}
