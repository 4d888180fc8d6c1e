/**
 * Route pino's structured records to Google Cloud Logging.
 *
 *   const client = await mustUseCloudLogging('my-project', 'my-app', { env: 'prod' });
 *   getLogger().info({ orderId }, 'order placed');
 *   ...
 *   await client.close();
 *
 * For a tee to the terminal, build the writer yourself:
 *
 *   const writer = new CloudLoggingWriter(
 *     client.logger('my-app'),
 *     plainTee(consoleWriterIfTerminal(process.stderr, true)),
 *   );
 *   const logger = createLogger(pinoDestination(writer));
 */

export * from './shared';
export { CloudLoggingClient, toEntryData } from './client/cloud-logging-client';
export type { ClientOptions, ErrorHandler } from './client/cloud-logging-client';
export {
  DEFAULT_LOGGER_SETTINGS,
  commonLabels,
  commonResource,
  delayThreshold,
  entryCountThreshold,
  bufferedEntryLimit,
  resolveSettings,
} from './client/options';
export { CloudLoggingWriter, noTee, plainTee, leveledTee } from './writers/cloud-logging-writer';
export { ConsoleWriter, consoleWriterIfTerminal, discardWriter } from './writers/console-writer';
export type { OutputStream } from './writers/console-writer';
export { pinoDestination, createLogger } from './writers/pino-destination';
export type { AppLogger } from './writers/pino-destination';
export { setupCloudLogging, useCloudLogging, mustUseCloudLogging, getLogger, setLogger } from './bootstrap';
export type { ClientFactory, CloudLoggingSettings, CloudLoggingSetup } from './bootstrap';
