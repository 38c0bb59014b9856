// ─────────────────────────────────────────────
//  Playback Test Helpers
//  Passive fake players: they record calls and only
//  change state when a test calls report().
// ─────────────────────────────────────────────

import { vi } from 'vitest';
import type { AudioAttributes, SoundPlayerManagerState, SoundPlayerState } from '@/engine/data/types/Audio';
import type { ISoundPlayer, SoundPlayerFactory, SoundPlayerStateListener } from '@/engine/player/ISoundPlayer';
import type { SoundPlayerManagerListener } from '@/engine/coordinator/SoundPlayerManager';

export class FakeSoundPlayer implements ISoundPlayer {
  readonly soundId: string;
  state: SoundPlayerState = 'PAUSED';
  listener: SoundPlayerStateListener | null = null;

  play = vi.fn(() => {});
  pause = vi.fn((_immediate: boolean) => {});
  stop = vi.fn((_immediate: boolean) => {});
  setVolume = vi.fn((_volume: number) => {});
  setFadeInDuration = vi.fn((_ms: number) => {});
  setFadeOutDuration = vi.fn((_ms: number) => {});
  setPremiumSegmentsEnabled = vi.fn((_enabled: boolean) => {});
  setAudioBitrate = vi.fn((_bitrate: string) => {});
  setAudioAttributes = vi.fn((_attrs: AudioAttributes) => {});
  setStateChangeListener = vi.fn((listener: SoundPlayerStateListener | null) => {
    this.listener = listener;
  });

  constructor(soundId: string) {
    this.soundId = soundId;
  }

  /** Transition and notify, as the real player would from its own context. */
  report(state: SoundPlayerState): void {
    this.state = state;
    this.listener?.(state);
  }

  /** Last volume pushed to the player. */
  get lastVolume(): number | undefined {
    const calls = this.setVolume.mock.calls;
    return calls[calls.length - 1]?.[0];
  }
}

export class FakeSoundPlayerFactory implements SoundPlayerFactory {
  readonly players: FakeSoundPlayer[] = [];

  buildPlayer = vi.fn((soundId: string): FakeSoundPlayer => {
    const player = new FakeSoundPlayer(soundId);
    this.players.push(player);
    return player;
  });

  latest(soundId: string): FakeSoundPlayer {
    const found = this.players.filter(p => p.soundId === soundId).pop();
    if (!found) throw new Error(`no player built for ${soundId}`);
    return found;
  }

  builtFor(soundId: string): number {
    return this.players.filter(p => p.soundId === soundId).length;
  }
}

/** Listener that records every callback in order. */
export function createRecordingListener() {
  const states: SoundPlayerManagerState[] = [];
  const volumes: number[] = [];
  const soundStates: Array<[string, SoundPlayerState]> = [];
  const soundVolumes: Array<[string, number]> = [];

  const listener: SoundPlayerManagerListener = {
    onStateChange: (state) => { states.push(state); },
    onVolumeChange: (volume) => { volumes.push(volume); },
    onSoundStateChange: (soundId, state) => { soundStates.push([soundId, state]); },
    onSoundVolumeChange: (soundId, volume) => { soundVolumes.push([soundId, volume]); },
  };

  return {
    listener,
    states,
    volumes,
    soundStates,
    soundVolumes,
    statesOf(soundId: string): SoundPlayerState[] {
      return soundStates.filter(([id]) => id === soundId).map(([, s]) => s);
    },
  };
}

/** Deterministic PRNG (mulberry32) so generated cases are reproducible. */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6D2B79F5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function pick<T>(rand: () => number, items: readonly T[]): T {
  const item = items[Math.floor(rand() * items.length)];
  if (item === undefined) throw new Error('pick from empty list');
  return item;
}
