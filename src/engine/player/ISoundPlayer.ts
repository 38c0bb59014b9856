// ─────────────────────────────────────────────
//  ISoundPlayer Interface
//  Per-sound playback capability. The manager depends
//  on this contract only, never on a concrete player.
//  Implementations: SimulatedSoundPlayer (headless)
// ─────────────────────────────────────────────

import type { AudioAttributes, SoundPlayerState } from '@/engine/data/types/Audio';

export type SoundPlayerStateListener = (state: SoundPlayerState) => void;

export interface ISoundPlayer {
  /**
   * Current playback state. A freshly built player is PAUSED until play() is
   * called; STOPPED is terminal for the instance.
   */
  readonly state: SoundPlayerState;

  /** Start or resume playback, fading in. */
  play(): void;

  /** Pause playback; `immediate` skips the fade-out. */
  pause(immediate: boolean): void;

  /** Stop playback for good; `immediate` skips the fade-out. */
  stop(immediate: boolean): void;

  /** Effective output volume (0.0–1.0). */
  setVolume(volume: number): void;

  setFadeInDuration(ms: number): void;
  setFadeOutDuration(ms: number): void;
  setPremiumSegmentsEnabled(enabled: boolean): void;
  setAudioBitrate(bitrate: string): void;
  setAudioAttributes(attrs: AudioAttributes): void;

  /** Register the single state-change callback; null detaches it. */
  setStateChangeListener(listener: SoundPlayerStateListener | null): void;
}

/** Builds players for sound ids. Factories are compared by identity. */
export interface SoundPlayerFactory {
  buildPlayer(soundId: string): ISoundPlayer;
}
