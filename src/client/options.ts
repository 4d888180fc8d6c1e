/**
 * Logger options.
 *
 * Options are plain partial settings applied left to right, so a later
 * commonLabels() replaces an earlier one instead of merging with it.
 */

import { LoggerSettingsSchema, parseOrThrow } from '../shared/schema';
import type { LoggerOption, LoggerSettings, MonitoredResource } from '../shared/types';

export const DEFAULT_LOGGER_SETTINGS: Readonly<LoggerSettings> = {
  commonLabels: {},
  commonResource: { type: 'global' },
  delayThreshold: 1000,
  entryCountThreshold: 1000,
  bufferedEntryLimit: 100_000,
};

export function commonLabels(labels: Record<string, string>): LoggerOption {
  return { commonLabels: { ...labels } };
}

export function commonResource(resource: MonitoredResource): LoggerOption {
  return { commonResource: resource };
}

export function delayThreshold(ms: number): LoggerOption {
  return { delayThreshold: ms };
}

export function entryCountThreshold(count: number): LoggerOption {
  return { entryCountThreshold: count };
}

export function bufferedEntryLimit(count: number): LoggerOption {
  return { bufferedEntryLimit: count };
}

export function resolveSettings(options: readonly LoggerOption[]): LoggerSettings {
  const merged = options.reduce<LoggerSettings>(
    (settings, option) => ({
      commonLabels: option.commonLabels ?? settings.commonLabels,
      commonResource: option.commonResource ?? settings.commonResource,
      delayThreshold: option.delayThreshold ?? settings.delayThreshold,
      entryCountThreshold: option.entryCountThreshold ?? settings.entryCountThreshold,
      bufferedEntryLimit: option.bufferedEntryLimit ?? settings.bufferedEntryLimit,
    }),
    DEFAULT_LOGGER_SETTINGS,
  );
  return parseOrThrow(LoggerSettingsSchema, merged, 'logger options');
}
