// ─────────────────────────────────────────────
//  SoundPlayerManager
//  Owns one ISoundPlayer per active sound, derives the
//  aggregate playback state from theirs and arbitrates
//  audio focus for the whole mix.
//  No concrete player imports: depends on ISoundPlayer only.
// ─────────────────────────────────────────────

import type {
  AudioAttributes,
  PresetVolumes,
  SoundPlayerManagerState,
  SoundPlayerState,
} from '@/engine/data/types/Audio';
import { DEFAULT_AUDIO_ATTRIBUTES, audioAttributesEqual, requireVolume } from '@/engine/data/types/Audio';
import type { ISoundPlayer, SoundPlayerFactory } from '@/engine/player/ISoundPlayer';
import type { AudioFocusListener, IAudioFocusManager } from '@/engine/focus/IAudioFocusManager';
import type { AudioFocusBroker } from '@/engine/focus/AudioFocusBroker';
import { audioFocusBroker } from '@/engine/focus/AudioFocusBroker';
import { DefaultAudioFocusManager } from '@/engine/focus/DefaultAudioFocusManager';
import { NullAudioFocusManager } from '@/engine/focus/NullAudioFocusManager';
import { Logger } from '@/engine/utils/Logger';

/** Observes the manager's aggregate state and volume, and those of its sounds. */
export interface SoundPlayerManagerListener {
  onStateChange(state: SoundPlayerManagerState): void;
  onVolumeChange(volume: number): void;
  onSoundStateChange(soundId: string, state: SoundPlayerState): void;
  onSoundVolumeChange(soundId: string, volume: number): void;
}

export interface SoundPlayerManagerOptions {
  /** Arbitration context for the default focus manager. Defaults to the shared broker. */
  focusBroker?: AudioFocusBroker;
  /** When false, focus is never requested and always considered held. */
  focusManagementEnabled?: boolean;
}

/**
 * Aggregate state of a mix, first matching rule wins:
 * no sounds → STOPPED; all STOPPING → STOPPING; all PAUSED → PAUSED;
 * only PAUSING/STOPPING → PAUSING; anything else → PLAYING.
 *
 * The PAUSING rule covers sounds that were removed from a preset and are still
 * fading out while the rest of the mix pauses.
 */
export function reconcileManagerState(states: readonly SoundPlayerState[]): SoundPlayerManagerState {
  if (states.length === 0) return 'STOPPED';
  if (states.every(s => s === 'STOPPING')) return 'STOPPING';
  if (states.every(s => s === 'PAUSED')) return 'PAUSED';
  if (states.every(s => s === 'PAUSING' || s === 'STOPPING')) return 'PAUSING';
  return 'PLAYING';
}

export class SoundPlayerManager implements AudioFocusListener {
  private factory: SoundPlayerFactory;
  private readonly focusBroker: AudioFocusBroker;

  private fadeInDurationMs = 0;
  private fadeOutDurationMs = 0;
  private premiumSegmentsEnabled = false;
  private audioBitrate = '128k';
  private audioAttrs: AudioAttributes = DEFAULT_AUDIO_ATTRIBUTES;
  private volume = 1;

  private listener: SoundPlayerManagerListener | null = null;
  private focusManagementEnabled: boolean;
  private focusManager: IAudioFocusManager;
  private shouldResumeOnFocusGain = false;

  private readonly players = new Map<string, ISoundPlayer>();
  private readonly soundVolumes = new Map<string, number>();

  private _state: SoundPlayerManagerState = 'STOPPED';

  constructor(factory: SoundPlayerFactory, options: SoundPlayerManagerOptions = {}) {
    this.factory = factory;
    this.focusBroker = options.focusBroker ?? audioFocusBroker;
    this.focusManagementEnabled = options.focusManagementEnabled ?? true;
    this.focusManager = this.createFocusManager();
  }

  get state(): SoundPlayerManagerState { return this._state; }

  /** Whether a focus gain will resume playback (set by transient loss or a deferred resume). */
  get resumeOnFocusGain(): boolean { return this.shouldResumeOnFocusGain; }

  setListener(listener: SoundPlayerManagerListener | null): void {
    this.listener = listener;
  }

  // ── Audio focus ───────────────────────────────

  onFocusGained(): void {
    if (this.shouldResumeOnFocusGain) {
      this.shouldResumeOnFocusGain = false;
      this.resume();
    }
  }

  onFocusLost(transient: boolean): void {
    if (this._state === 'PAUSED' || this._state === 'STOPPED') {
      return;
    }

    Logger.log(`pausing playback after ${transient ? 'transient' : 'permanent'} focus loss`, 'focus');
    this.pauseAll(true);
    this.shouldResumeOnFocusGain = transient;
  }

  setAudioFocusManagementEnabled(enabled: boolean): void {
    if (enabled === this.focusManagementEnabled) return;

    const wasPlaying = this._state === 'PLAYING';
    this.pauseAll(true);
    this.focusManager.abandonFocus();

    this.focusManagementEnabled = enabled;
    this.focusManager = this.createFocusManager();
    this.shouldResumeOnFocusGain = false;
    Logger.log(`audio focus management ${enabled ? 'enabled' : 'disabled'}`, 'debug');

    if (wasPlaying) {
      this.resume();
    }
  }

  // ── Settings ──────────────────────────────────

  setFadeInDuration(ms: number): void {
    if (ms === this.fadeInDurationMs) return;
    this.fadeInDurationMs = ms;
    this.forEachPlayer(p => p.setFadeInDuration(ms));
  }

  setFadeOutDuration(ms: number): void {
    if (ms === this.fadeOutDurationMs) return;
    this.fadeOutDurationMs = ms;
    this.forEachPlayer(p => p.setFadeOutDuration(ms));
  }

  setPremiumSegmentsEnabled(enabled: boolean): void {
    if (enabled === this.premiumSegmentsEnabled) return;
    this.premiumSegmentsEnabled = enabled;
    this.forEachPlayer(p => p.setPremiumSegmentsEnabled(enabled));
  }

  /** @param bitrate one of `128k`, `192k`, `256k` or `320k`. */
  setAudioBitrate(bitrate: string): void {
    if (bitrate === this.audioBitrate) return;
    this.audioBitrate = bitrate;
    this.forEachPlayer(p => p.setAudioBitrate(bitrate));
  }

  setAudioAttributes(attrs: AudioAttributes): void {
    if (audioAttributesEqual(attrs, this.audioAttrs)) return;

    const usageChanged = attrs.usage !== this.audioAttrs.usage;
    this.audioAttrs = attrs;
    this.forEachPlayer(p => p.setAudioAttributes(attrs));

    // Focus is arbitrated per usage, so the default manager must be rebuilt.
    // A resume still waiting for its grant must be re-queued on the new manager.
    if (usageChanged && this.focusManagementEnabled) {
      const wantsFocus = this.focusManager.hasFocus() || this.shouldResumeOnFocusGain;
      this.focusManager.abandonFocus();
      this.focusManager = this.createFocusManager();
      if (wantsFocus) this.focusManager.requestFocus();
    }
  }

  /**
   * Swap the engine that builds players. Paused sounds come back paused, the
   * rest start playing again on players from the new factory.
   */
  setSoundPlayerFactory(factory: SoundPlayerFactory): void {
    if (factory === this.factory) return;
    this.factory = factory;

    const soundIds: string[] = [];
    const pausedSoundIds = new Set<string>();
    const discardedIds: string[] = [];
    for (const [soundId, player] of this.players) {
      if (player.state === 'STOPPING' || player.state === 'STOPPED') {
        discardedIds.push(soundId);
        continue;
      }
      soundIds.push(soundId);
      if (player.state === 'PAUSING' || player.state === 'PAUSED') pausedSoundIds.add(soundId);
    }

    const discarded = [...this.players.values()];
    this.players.clear();
    for (const player of discarded) {
      player.setStateChangeListener(null);
      player.stop(true);
    }
    Logger.log(`player factory replaced, rebuilding ${soundIds.length} sound(s)`, 'debug');

    for (const soundId of discardedIds) {
      this.listener?.onSoundStateChange(soundId, 'STOPPED');
    }

    for (const soundId of soundIds) {
      if (pausedSoundIds.has(soundId)) {
        const player = this.initPlayer(soundId);
        this.listener?.onSoundStateChange(soundId, player.state);
      } else {
        this.playSound(soundId);
      }
    }

    this.reconcileState();
  }

  // ── Volume ────────────────────────────────────

  /**
   * Set the global multiplier applied to every sound's own volume.
   * Always notifies the listener, even when unchanged.
   * @throws RangeError if volume is outside [0, 1].
   */
  setVolume(volume: number): void {
    requireVolume(volume);
    this.volume = volume;
    for (const [soundId, player] of [...this.players]) {
      player.setVolume(volume * this.getSoundVolume(soundId));
    }
    this.listener?.onVolumeChange(volume);
  }

  /**
   * Set the volume of one sound; remembered even if it is not playing.
   * @throws RangeError if volume is outside [0, 1].
   */
  setSoundVolume(soundId: string, volume: number): void {
    requireVolume(volume);
    this.soundVolumes.set(soundId, volume);
    this.players.get(soundId)?.setVolume(this.volume * volume);
    this.listener?.onSoundVolumeChange(soundId, volume);
  }

  getVolume(): number {
    return this.volume;
  }

  getSoundVolume(soundId: string): number {
    return this.soundVolumes.get(soundId) ?? 1;
  }

  /** State of the sound's live player; STOPPED when it has none. */
  getSoundState(soundId: string): SoundPlayerState {
    return this.players.get(soundId)?.state ?? 'STOPPED';
  }

  // ── Playback ──────────────────────────────────

  /**
   * Play a sound. If the mix is paused (or focus is not held) everything is
   * resumed with it, so a new sound never plays alone over a paused mix.
   */
  playSound(soundId: string): void {
    const player = this.initPlayer(soundId);
    if (!this.focusManager.hasFocus() || this._state === 'PAUSING' || this._state === 'PAUSED') {
      this.resume();
      // resume() passes over fading-out sounds; this one was asked for by name.
      if (player.state === 'STOPPING' && this.focusManager.hasFocus()) player.play();
    } else {
      player.play();
    }

    // Deferred until focus is granted: the idle player still counts toward the aggregate.
    if (!this.focusManager.hasFocus()) this.reconcileState();
  }

  /** Fade out and stop one sound. Unknown ids are ignored. */
  stopSound(soundId: string): void {
    this.players.get(soundId)?.stop(false);
  }

  stop(immediate: boolean): void {
    this.shouldResumeOnFocusGain = false;
    this.forEachPlayer(p => p.stop(immediate));
  }

  pause(immediate: boolean): void {
    this.shouldResumeOnFocusGain = false;
    this.pauseAll(immediate);
  }

  /**
   * Resume every sound now if focus is held, otherwise once it is gained.
   * Sounds fading out to STOPPED stay stopping.
   */
  resume(): void {
    if (this.focusManager.hasFocus()) {
      this.forEachPlayer(p => {
        if (p.state !== 'STOPPING') p.play();
      });
    } else {
      this.shouldResumeOnFocusGain = true;
      this.focusManager.requestFocus();
    }
  }

  /**
   * Switch to the given mix: sounds not in `volumes` fade out, the rest get their
   * volume and are started unless already playing.
   * @throws RangeError if any volume is outside [0, 1]; nothing changes then.
   */
  playPreset(volumes: PresetVolumes): void {
    const desired = Object.entries(volumes);
    for (const [, volume] of desired) requireVolume(volume);

    const desiredIds = new Set(Object.keys(volumes));
    for (const soundId of [...this.players.keys()]) {
      if (!desiredIds.has(soundId)) this.stopSound(soundId);
    }

    for (const [soundId, volume] of desired) {
      this.setSoundVolume(soundId, volume);
      if (this.players.get(soundId)?.state !== 'PLAYING') {
        this.playSound(soundId);
      }
    }
  }

  /** Ids of buffering, playing, pausing or paused sounds with their volumes. */
  getCurrentPreset(): PresetVolumes {
    const preset: PresetVolumes = {};
    for (const [soundId, player] of this.players) {
      if (player.state === 'STOPPING' || player.state === 'STOPPED') continue;
      preset[soundId] = this.getSoundVolume(soundId);
    }
    return preset;
  }

  /** Stop everything immediately and release focus. The manager stays usable. */
  destroy(): void {
    this.listener = null;
    this.shouldResumeOnFocusGain = false;
    const players = [...this.players.values()];
    this.players.clear();
    for (const player of players) {
      player.setStateChangeListener(null);
      player.stop(true);
    }
    this.focusManager.abandonFocus();
    this._state = 'STOPPED';
  }

  // ── Private ───────────────────────────────────

  /** Returns the live player for a sound, building one if it has none or it stopped. */
  private initPlayer(soundId: string): ISoundPlayer {
    const existing = this.players.get(soundId);
    if (existing && existing.state !== 'STOPPED') {
      return existing;
    }
    existing?.setStateChangeListener(null);

    const player = this.factory.buildPlayer(soundId);
    player.setFadeInDuration(this.fadeInDurationMs);
    player.setFadeOutDuration(this.fadeOutDurationMs);
    player.setPremiumSegmentsEnabled(this.premiumSegmentsEnabled);
    player.setAudioBitrate(this.audioBitrate);
    player.setAudioAttributes(this.audioAttrs);
    player.setVolume(this.volume * this.getSoundVolume(soundId));

    this.players.set(soundId, player);
    player.setStateChangeListener(state => this.onSoundPlayerStateChange(soundId, player, state));
    return player;
  }

  private onSoundPlayerStateChange(soundId: string, player: ISoundPlayer, playerState: SoundPlayerState): void {
    // Reports from a replaced player must not touch its successor.
    if (this.players.get(soundId) !== player) return;

    if (playerState === 'STOPPED') {
      this.players.delete(soundId);
    }

    this.reconcileState();
    if ((this._state === 'PAUSED' || this._state === 'STOPPED') && this.focusManager.hasFocus()) {
      this.focusManager.abandonFocus();
    }

    this.listener?.onSoundStateChange(soundId, playerState);
  }

  private reconcileState(): void {
    const states = [...this.players.values()].map(p => p.state);
    this.setState(reconcileManagerState(states));
  }

  private setState(next: SoundPlayerManagerState): void {
    if (next === this._state) return;
    this._state = next;
    this.listener?.onStateChange(next);
  }

  private pauseAll(immediate: boolean): void {
    this.forEachPlayer(p => p.pause(immediate));
  }

  /** Runs `fn` over a snapshot of the registry so callbacks may mutate it. */
  private forEachPlayer(fn: (player: ISoundPlayer) => void): void {
    for (const player of [...this.players.values()]) fn(player);
  }

  private createFocusManager(): IAudioFocusManager {
    return this.focusManagementEnabled
      ? new DefaultAudioFocusManager(this.focusBroker, this.audioAttrs, this)
      : new NullAudioFocusManager(this);
  }
}
