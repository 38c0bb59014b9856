// ─────────────────────────────────────────────
//  PlaybackSettingsLoader
//  Reads persisted playback preferences (parsed JSON)
//  over DEFAULT_PLAYBACK_SETTINGS. Bad fields fall back
//  to their default with a warning.
// ─────────────────────────────────────────────

import type { PlaybackSettings } from '@/config';
import { DEFAULT_PLAYBACK_SETTINGS } from '@/config';
import type { AudioAttributes, AudioContentType, AudioStreamType, AudioUsage } from '@/engine/data/types/Audio';
import { isAudioBitrate } from '@/engine/data/types/Audio';

const USAGES: readonly AudioUsage[] = ['media', 'alarm'];
const CONTENT_TYPES: readonly AudioContentType[] = ['movie', 'music', 'speech', 'sonification'];
const STREAM_TYPES: readonly AudioStreamType[] = ['music', 'alarm'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function oneOf<T extends string>(options: readonly T[], value: unknown): value is T {
  return options.some(option => option === value);
}

function warn(field: string, value: unknown): void {
  console.warn(`[PlaybackSettingsLoader] Ignoring invalid ${field}: ${JSON.stringify(value)}`);
}

function readDuration(raw: Record<string, unknown>, field: string, fallback: number): number {
  const value = raw[field];
  if (value === undefined) return fallback;
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0) return value;
  warn(field, value);
  return fallback;
}

function readAttributes(value: unknown, fallback: AudioAttributes): AudioAttributes {
  if (value === undefined) return fallback;
  if (isRecord(value)) {
    const usage = value['usage'];
    const contentType = value['contentType'];
    const legacyStreamType = value['legacyStreamType'];
    if (
      oneOf(USAGES, usage)
      && oneOf(CONTENT_TYPES, contentType)
      && oneOf(STREAM_TYPES, legacyStreamType)
    ) {
      return { usage, contentType, legacyStreamType };
    }
  }
  warn('audioAttributes', value);
  return fallback;
}

/**
 * Build PlaybackSettings from an untrusted value, typically `JSON.parse` output.
 * Anything that is not an object yields the defaults.
 */
export function loadPlaybackSettings(raw: unknown): PlaybackSettings {
  const defaults = DEFAULT_PLAYBACK_SETTINGS;
  if (!isRecord(raw)) {
    if (raw !== undefined && raw !== null) warn('settings', raw);
    return { ...defaults };
  }

  const settings: PlaybackSettings = {
    ...defaults,
    fadeInDurationMs: readDuration(raw, 'fadeInDurationMs', defaults.fadeInDurationMs),
    fadeOutDurationMs: readDuration(raw, 'fadeOutDurationMs', defaults.fadeOutDurationMs),
    audioAttributes: readAttributes(raw['audioAttributes'], defaults.audioAttributes),
  };

  const premium = raw['premiumSegmentsEnabled'];
  if (typeof premium === 'boolean') settings.premiumSegmentsEnabled = premium;
  else if (premium !== undefined) warn('premiumSegmentsEnabled', premium);

  const bitrate = raw['audioBitrate'];
  if (typeof bitrate === 'string') {
    // Unknown bitrates still pass through; the player decides what they mean.
    if (!isAudioBitrate(bitrate)) {
      console.warn(`[PlaybackSettingsLoader] Unrecognised audioBitrate: ${bitrate}`);
    }
    settings.audioBitrate = bitrate;
  } else if (bitrate !== undefined) {
    warn('audioBitrate', bitrate);
  }

  const volume = raw['volume'];
  if (typeof volume === 'number' && volume >= 0 && volume <= 1) settings.volume = volume;
  else if (volume !== undefined) warn('volume', volume);

  const focus = raw['audioFocusManagementEnabled'];
  if (typeof focus === 'boolean') settings.audioFocusManagementEnabled = focus;
  else if (focus !== undefined) warn('audioFocusManagementEnabled', focus);

  return settings;
}
