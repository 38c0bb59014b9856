// ─────────────────────────────────────────────
//  Audio Data Types
//  Player and manager states, stream attributes,
//  bitrates and preset volume maps.
// ─────────────────────────────────────────────

/** Playback state of a single sound's player. */
export type SoundPlayerState =
  | 'BUFFERING'
  | 'PLAYING'
  | 'PAUSING'
  | 'PAUSED'
  | 'STOPPING'
  | 'STOPPED';

export const SOUND_PLAYER_STATES: readonly SoundPlayerState[] = [
  'BUFFERING', 'PLAYING', 'PAUSING', 'PAUSED', 'STOPPING', 'STOPPED',
];

/**
 * Aggregate playback state of the whole mix.
 * STOPPED is both the initial state and re-enterable; there is no terminal state.
 * PAUSING and STOPPING are held only while every sound is on its way there.
 */
export type SoundPlayerManagerState =
  | 'PLAYING'
  | 'PAUSING'
  | 'PAUSED'
  | 'STOPPING'
  | 'STOPPED';

/** Streaming bitrates understood by the players. */
export type AudioBitrate = '128k' | '192k' | '256k' | '320k';

export const AUDIO_BITRATES: readonly AudioBitrate[] = ['128k', '192k', '256k', '320k'];

export type AudioUsage = 'media' | 'alarm';
export type AudioContentType = 'movie' | 'music' | 'speech' | 'sonification';
export type AudioStreamType = 'music' | 'alarm';

/** Describes the output stream the sounds play on. */
export interface AudioAttributes {
  usage: AudioUsage;
  contentType: AudioContentType;
  legacyStreamType: AudioStreamType;
}

/** Playback on the music stream. */
export const DEFAULT_AUDIO_ATTRIBUTES: Readonly<AudioAttributes> = Object.freeze({
  usage: 'media',
  contentType: 'movie',
  legacyStreamType: 'music',
});

/** Playback on the alarm stream (e.g. alarm clock presets). */
export const ALARM_AUDIO_ATTRIBUTES: Readonly<AudioAttributes> = Object.freeze({
  usage: 'alarm',
  contentType: 'movie',
  legacyStreamType: 'alarm',
});

export function audioAttributesEqual(a: AudioAttributes, b: AudioAttributes): boolean {
  return a.usage === b.usage
    && a.contentType === b.contentType
    && a.legacyStreamType === b.legacyStreamType;
}

/** Sound id → volume (0.0–1.0) of a desired mix. */
export type PresetVolumes = Record<string, number>;

export function isAudioBitrate(value: string): value is AudioBitrate {
  return AUDIO_BITRATES.some(bitrate => bitrate === value);
}

/** Throws a RangeError unless 0 <= volume <= 1. */
export function requireVolume(volume: number): void {
  if (!(volume >= 0 && volume <= 1)) {
    throw new RangeError(`volume must be in range [0, 1], got ${volume}`);
  }
}
