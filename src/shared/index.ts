export { Level, CUSTOM_LEVELS, severityFor } from './severity';
export { RawPayload, byteLength } from './raw-payload';
export { CloudLoggingError, ValidationError, BootstrapError, errorMessage } from './errors';
export type { BootstrapStep } from './errors';
export { levelFromEnv, parseOrThrow } from './schema';
export type { LevelName } from './schema';
export { log } from './logger';
export type { DiagnosticLog, DiagnosticContext } from './logger';
export type {
  LogBytes,
  Writer,
  LevelWriter,
  Tee,
  Severity,
  MonitoredResource,
  BackendEntry,
  LoggerSettings,
  LoggerOption,
  BackendLogger,
  LoggingClient,
} from './types';
