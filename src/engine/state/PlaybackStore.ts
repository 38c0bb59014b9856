// ─────────────────────────────────────────────
//  Playback Store: what the host renders
//  Folds playback notifications from the EventBus
//  into an immutable snapshot.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import { produce } from 'immer';
import type { SoundPlayerManagerState, SoundPlayerState } from '@/engine/data/types/Audio';
import { EventBus } from '@/engine/utils/EventBus';
import type { PlaybackEventMap } from '@/engine/utils/EventBus';

export interface PlaybackState {
  state: SoundPlayerManagerState;
  volume: number;
  /** Sounds that have a live player; removed once they report STOPPED. */
  sounds: Record<string, SoundPlayerState>;
  /** Every per-sound volume reported so far. */
  soundVolumes: Record<string, number>;
}

type StoreListener = (state: PlaybackState) => void;

function initialState(): PlaybackState {
  return { state: 'STOPPED', volume: 1, sounds: {}, soundVolumes: {} };
}

export class PlaybackStore {
  private state: PlaybackState = initialState();
  private listeners: StoreListener[] = [];

  private readonly onManagerState = (p: PlaybackEventMap['managerStateChanged']) =>
    this.update(draft => { draft.state = p.state; });

  private readonly onManagerVolume = (p: PlaybackEventMap['managerVolumeChanged']) =>
    this.update(draft => { draft.volume = p.volume; });

  private readonly onSoundState = (p: PlaybackEventMap['soundStateChanged']) =>
    this.update(draft => {
      if (p.state === 'STOPPED') {
        delete draft.sounds[p.soundId];
      } else {
        draft.sounds[p.soundId] = p.state;
      }
    });

  private readonly onSoundVolume = (p: PlaybackEventMap['soundVolumeChanged']) =>
    this.update(draft => { draft.soundVolumes[p.soundId] = p.volume; });

  constructor() {
    EventBus.on('managerStateChanged', this.onManagerState);
    EventBus.on('managerVolumeChanged', this.onManagerVolume);
    EventBus.on('soundStateChanged', this.onSoundState);
    EventBus.on('soundVolumeChanged', this.onSoundVolume);
  }

  getState(): PlaybackState { return this.state; }

  subscribe(listener: StoreListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  reset(): void {
    this.state = initialState();
    this.notify();
  }

  destroy(): void {
    EventBus.off('managerStateChanged', this.onManagerState);
    EventBus.off('managerVolumeChanged', this.onManagerVolume);
    EventBus.off('soundStateChanged', this.onSoundState);
    EventBus.off('soundVolumeChanged', this.onSoundVolume);
    this.listeners = [];
  }

  private update(recipe: (draft: Draft<PlaybackState>) => void): void {
    const next = produce(this.state, recipe);
    if (next === this.state) return;
    this.state = next;
    this.notify();
  }

  private notify(): void {
    for (const listener of this.listeners) listener(this.state);
  }
}
