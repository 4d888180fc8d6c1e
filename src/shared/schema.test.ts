import { describe, expect, it } from 'vitest';
import { ValidationError } from './errors';
import { LogIdSchema, ProjectIdSchema, levelFromEnv, parseOrThrow } from './schema';

describe('ProjectIdSchema', () => {
  it.each(['my-project', 'example.com:my-project', 'proj123'])('accepts %s', (id) => {
    expect(ProjectIdSchema.safeParse(id).success).toBe(true);
  });

  it.each(['', 'My Project', 'projects/my-project', 'trailing-'])('rejects %j', (id) => {
    expect(ProjectIdSchema.safeParse(id).success).toBe(false);
  });
});

describe('LogIdSchema', () => {
  it('accepts slashes, dots, hyphens and underscores', () => {
    expect(LogIdSchema.safeParse('app/requests_v1.2-beta').success).toBe(true);
  });

  it('rejects other characters', () => {
    expect(LogIdSchema.safeParse('my log').success).toBe(false);
  });

  it('rejects IDs of 512 characters or more', () => {
    expect(LogIdSchema.safeParse('a'.repeat(512)).success).toBe(false);
    expect(LogIdSchema.safeParse('a'.repeat(511)).success).toBe(true);
  });
});

describe('parseOrThrow', () => {
  it('returns parsed data', () => {
    expect(parseOrThrow(LogIdSchema, 'app', 'log ID')).toBe('app');
  });

  it('throws a ValidationError naming the input', () => {
    expect(() => parseOrThrow(LogIdSchema, 'my log', 'log ID')).toThrow(ValidationError);
    expect(() => parseOrThrow(LogIdSchema, 'my log', 'log ID')).toThrow(
      'Invalid log ID: log ID may only contain [A-Za-z0-9/_.-]',
    );
  });
});

describe('levelFromEnv', () => {
  it('reads LOG_LEVEL case-insensitively', () => {
    expect(levelFromEnv({ LOG_LEVEL: 'DEBUG' })).toBe('debug');
  });

  it('falls back to info', () => {
    expect(levelFromEnv({})).toBe('info');
    expect(levelFromEnv({ LOG_LEVEL: 'verbose' })).toBe('info');
  });
});
