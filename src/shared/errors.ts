export class CloudLoggingError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CloudLoggingError';
    this.code = code;
  }
}

export class ValidationError extends CloudLoggingError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'VALIDATION', options);
    this.name = 'ValidationError';
  }
}

/** Step of setup that failed */
export type BootstrapStep = 'create client' | 'ping';

export class BootstrapError extends CloudLoggingError {
  readonly step: BootstrapStep;

  constructor(step: BootstrapStep, cause: unknown) {
    super(`${step}: ${errorMessage(cause)}`, 'BOOTSTRAP', { cause });
    this.name = 'BootstrapError';
    this.step = step;
  }
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return 'Unknown error';
  return String(value);
}
