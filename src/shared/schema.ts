/**
 * Validation for identifiers and setup settings.
 * Uses Zod so bad input fails before any client is created.
 */

import { z } from 'zod';
import { ValidationError } from './errors';

/** GCP project IDs, including legacy domain-scoped ones (example.com:my-project) */
export const ProjectIdSchema = z
  .string()
  .min(1, 'project ID is required')
  .regex(/^[a-z][a-z0-9.:-]*[a-z0-9]$/, 'invalid project ID');

export const LogIdSchema = z
  .string()
  .min(1, 'log ID is required')
  .max(511, 'log ID must be less than 512 characters')
  .regex(/^[A-Za-z0-9/_.-]+$/, 'log ID may only contain [A-Za-z0-9/_.-]');

export const LabelsSchema = z.record(z.string());

export const LevelNameSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'panic', 'silent']);

export type LevelName = z.infer<typeof LevelNameSchema>;

/** The project ID is checked when the client is created, not here. */
export const SetupSettingsSchema = z.object({
  projectId: z.string(),
  logId: LogIdSchema,
  labels: LabelsSchema.default({}),
  level: LevelNameSchema.optional(),
});

export type SetupSettingsInput = z.input<typeof SetupSettingsSchema>;

/**
 * Parse with the given schema, throwing a ValidationError that lists
 * every issue.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, raw: unknown, what: string): z.infer<T> {
  const result = schema.safeParse(raw);
  if (result.success) {
    return result.data;
  }
  const issues = result.error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
  throw new ValidationError(`Invalid ${what}: ${issues}`);
}

/** Level from LOG_LEVEL, falling back to info for unset or unknown values. */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LevelName {
  const result = LevelNameSchema.safeParse(env.LOG_LEVEL?.toLowerCase());
  return result.success ? result.data : 'info';
}

export const LoggerSettingsSchema = z.object({
  commonLabels: LabelsSchema,
  commonResource: z.object({
    type: z.string().min(1),
    labels: LabelsSchema.optional(),
  }),
  delayThreshold: z.number().int().nonnegative(),
  entryCountThreshold: z.number().int().positive(),
  bufferedEntryLimit: z.number().int().positive(),
});
