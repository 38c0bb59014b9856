// ─────────────────────────────────────────────
//  SimulatedSoundPlayer
//  ISoundPlayer that walks the playback state machine
//  on timers without decoding any audio. Fades take
//  their configured duration, buffering a fixed delay.
// ─────────────────────────────────────────────

import type { AudioAttributes, SoundPlayerState } from '@/engine/data/types/Audio';
import { DEFAULT_AUDIO_ATTRIBUTES } from '@/engine/data/types/Audio';
import type { ISoundPlayer, SoundPlayerFactory, SoundPlayerStateListener } from './ISoundPlayer';
import { SIMULATED_BUFFER_MS } from '@/config';

export class SimulatedSoundPlayer implements ISoundPlayer {
  readonly soundId: string;
  private readonly bufferMs: number;

  private _state: SoundPlayerState = 'PAUSED';
  private listener: SoundPlayerStateListener | null = null;
  private pending: ReturnType<typeof setTimeout> | null = null;

  private _volume = 1;
  private _fadeInDurationMs = 0;
  private _fadeOutDurationMs = 0;
  private _premiumSegmentsEnabled = false;
  private _audioBitrate = '128k';
  private _audioAttributes: AudioAttributes = DEFAULT_AUDIO_ATTRIBUTES;

  constructor(soundId: string, bufferMs: number = SIMULATED_BUFFER_MS) {
    this.soundId = soundId;
    this.bufferMs = bufferMs;
  }

  get state(): SoundPlayerState { return this._state; }
  get volume(): number { return this._volume; }
  get fadeInDurationMs(): number { return this._fadeInDurationMs; }
  get fadeOutDurationMs(): number { return this._fadeOutDurationMs; }
  get premiumSegmentsEnabled(): boolean { return this._premiumSegmentsEnabled; }
  get audioBitrate(): string { return this._audioBitrate; }
  get audioAttributes(): AudioAttributes { return this._audioAttributes; }

  play(): void {
    if (this._state === 'STOPPED' || this._state === 'PLAYING' || this._state === 'BUFFERING') {
      return;
    }

    // Interrupting a fade-out starts over from buffering.
    this.cancelPending();
    this.transition('BUFFERING');
    this.schedule(this.bufferMs, () => this.transition('PLAYING'));
  }

  pause(immediate: boolean): void {
    if (this._state === 'STOPPED' || this._state === 'STOPPING' || this._state === 'PAUSED') {
      return;
    }
    if (this._state === 'PAUSING' && !immediate) return;

    this.cancelPending();
    if (immediate || this._fadeOutDurationMs <= 0) {
      this.transition('PAUSED');
      return;
    }

    this.transition('PAUSING');
    this.schedule(this._fadeOutDurationMs, () => this.transition('PAUSED'));
  }

  stop(immediate: boolean): void {
    if (this._state === 'STOPPED') return;
    if (this._state === 'STOPPING' && !immediate) return;

    this.cancelPending();
    // A paused sound is already silent, there is nothing to fade.
    if (immediate || this._fadeOutDurationMs <= 0 || this._state === 'PAUSED') {
      this.transition('STOPPED');
      return;
    }

    this.transition('STOPPING');
    this.schedule(this._fadeOutDurationMs, () => this.transition('STOPPED'));
  }

  setVolume(volume: number): void {
    this._volume = volume;
  }

  setFadeInDuration(ms: number): void {
    this._fadeInDurationMs = ms;
  }

  setFadeOutDuration(ms: number): void {
    this._fadeOutDurationMs = ms;
  }

  setPremiumSegmentsEnabled(enabled: boolean): void {
    this._premiumSegmentsEnabled = enabled;
  }

  setAudioBitrate(bitrate: string): void {
    this._audioBitrate = bitrate;
  }

  setAudioAttributes(attrs: AudioAttributes): void {
    this._audioAttributes = attrs;
  }

  setStateChangeListener(listener: SoundPlayerStateListener | null): void {
    this.listener = listener;
  }

  // ── Private ───────────────────────────────────

  private transition(next: SoundPlayerState): void {
    if (next === this._state) return;
    this._state = next;
    this.listener?.(next);
  }

  private schedule(delayMs: number, fn: () => void): void {
    this.pending = setTimeout(() => {
      this.pending = null;
      fn();
    }, delayMs);
  }

  private cancelPending(): void {
    if (this.pending !== null) {
      clearTimeout(this.pending);
      this.pending = null;
    }
  }
}

/** Builds SimulatedSoundPlayers and keeps every instance it built. */
export class SimulatedSoundPlayerFactory implements SoundPlayerFactory {
  private readonly bufferMs: number;
  private readonly built: SimulatedSoundPlayer[] = [];

  constructor(bufferMs: number = SIMULATED_BUFFER_MS) {
    this.bufferMs = bufferMs;
  }

  buildPlayer(soundId: string): SimulatedSoundPlayer {
    const player = new SimulatedSoundPlayer(soundId, this.bufferMs);
    this.built.push(player);
    return player;
  }

  /** Every player built so far, oldest first. */
  get players(): readonly SimulatedSoundPlayer[] {
    return this.built;
  }

  /** Most recently built player for a sound, or undefined. */
  latest(soundId: string): SimulatedSoundPlayer | undefined {
    for (let i = this.built.length - 1; i >= 0; i--) {
      const p = this.built[i];
      if (p && p.soundId === soundId) return p;
    }
    return undefined;
  }
}
