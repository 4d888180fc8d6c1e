/**
 * Cloud Logging setup.
 *
 * setupCloudLogging() returns explicit handles and installs nothing.
 * useCloudLogging() additionally makes the new logger the process-wide
 * default, and mustUseCloudLogging() exits the process when setup fails.
 * Use the latter two at startup only.
 */

import { CloudLoggingClient } from './client/cloud-logging-client';
import { commonLabels } from './client/options';
import { BootstrapError } from './shared/errors';
import { log } from './shared/logger';
import { levelFromEnv, parseOrThrow, SetupSettingsSchema } from './shared/schema';
import type { SetupSettingsInput } from './shared/schema';
import type { LoggerOption, LoggingClient, Tee } from './shared/types';
import { CloudLoggingWriter, noTee } from './writers/cloud-logging-writer';
import { createLogger, pinoDestination } from './writers/pino-destination';
import type { AppLogger } from './writers/pino-destination';

export type ClientFactory = (projectId: string) => LoggingClient | Promise<LoggingClient>;

export interface CloudLoggingSettings extends SetupSettingsInput {
  /** Applied after the labels option, so a commonLabels() here replaces `labels`. */
  options?: LoggerOption[];
  tee?: Tee;
  /** Defaults to CloudLoggingClient.create */
  createClient?: ClientFactory;
}

export interface CloudLoggingSetup {
  /** Owned by the caller: close() it before the process exits. */
  client: LoggingClient;
  writer: CloudLoggingWriter;
  logger: AppLogger;
}

const defaultClientFactory: ClientFactory = (projectId) => CloudLoggingClient.create(projectId);

// ── Default logger ─────────────────────────────────────────

let defaultLogger: AppLogger | null = null;

/** The process-wide default logger; plain pino on stdout until replaced. */
export function getLogger(): AppLogger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}

export function setLogger(logger: AppLogger): void {
  defaultLogger = logger;
}

// ── Setup ──────────────────────────────────────────────────

async function closeAfterFailure(client: LoggingClient): Promise<void> {
  try {
    await client.close();
  } catch (err) {
    log.warn('Closing Cloud Logging client after failed setup', { component: 'bootstrap', err });
  }
}

/**
 * Create a client, check that Cloud Logging is reachable, and build a
 * pino logger that writes to `logId`.
 *
 * Rejects with BootstrapError (step "create client" or "ping") when the
 * backend cannot be used, or ValidationError for malformed settings.
 */
export async function setupCloudLogging(settings: CloudLoggingSettings): Promise<CloudLoggingSetup> {
  const { projectId, logId, labels, level } = parseOrThrow(SetupSettingsSchema, settings, 'Cloud Logging settings');
  const createClient = settings.createClient ?? defaultClientFactory;

  let client: LoggingClient;
  try {
    client = await createClient(projectId);
  } catch (err) {
    throw new BootstrapError('create client', err);
  }

  try {
    await client.ping();
  } catch (err) {
    await closeAfterFailure(client);
    throw new BootstrapError('ping', err);
  }

  // labels go first so that any commonLabels in options take precedence
  const options: LoggerOption[] = [commonLabels(labels), ...(settings.options ?? [])];

  let writer: CloudLoggingWriter;
  try {
    writer = new CloudLoggingWriter(client.logger(logId, ...options), settings.tee ?? noTee());
  } catch (err) {
    await closeAfterFailure(client);
    throw err;
  }

  const logger = createLogger(pinoDestination(writer), level ?? levelFromEnv());
  return { client, writer, logger };
}

/**
 * Make the default logger write structured, leveled entries to Cloud
 * Logging. The default logger is left untouched if setup fails.
 *
 * The labels argument is ignored if options include commonLabels().
 */
export async function useCloudLogging(
  projectId: string,
  logId: string,
  labels: Record<string, string>,
  ...options: LoggerOption[]
): Promise<LoggingClient> {
  const { client, logger } = await setupCloudLogging({ projectId, logId, labels, options });
  setLogger(logger);
  return client;
}

/** useCloudLogging, exiting the process with status 1 if it fails. */
export async function mustUseCloudLogging(
  projectId: string,
  logId: string,
  labels: Record<string, string>,
  ...options: LoggerOption[]
): Promise<LoggingClient> {
  try {
    return await useCloudLogging(projectId, logId, labels, ...options);
  } catch (err) {
    log.error('Cloud Logging setup failed', { component: 'bootstrap', err, projectId, logId });
    return process.exit(1);
  }
}
