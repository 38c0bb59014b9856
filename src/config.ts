import type { AudioAttributes } from '@/engine/data/types/Audio';
import { DEFAULT_AUDIO_ATTRIBUTES } from '@/engine/data/types/Audio';

/** Buffer delay of the simulated player before it reports PLAYING. */
export const SIMULATED_BUFFER_MS = 50;

/** User-facing playback preferences applied to the manager as a whole. */
export interface PlaybackSettings {
  fadeInDurationMs: number;
  fadeOutDurationMs: number;
  premiumSegmentsEnabled: boolean;
  /** One of '128k', '192k', '256k', '320k'; other strings pass through to the players. */
  audioBitrate: string;
  audioAttributes: AudioAttributes;
  /** Global volume multiplier, 0.0–1.0 */
  volume: number;
  audioFocusManagementEnabled: boolean;
}

export const DEFAULT_PLAYBACK_SETTINGS: Readonly<PlaybackSettings> = Object.freeze({
  fadeInDurationMs: 0,
  fadeOutDurationMs: 0,
  premiumSegmentsEnabled: false,
  audioBitrate: '128k',
  audioAttributes: DEFAULT_AUDIO_ATTRIBUTES,
  volume: 1,
  audioFocusManagementEnabled: true,
});
