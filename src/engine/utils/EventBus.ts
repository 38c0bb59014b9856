// ─────────────────────────────────────────────
//  Typed Event Bus
//  Host commands flow in, playback notifications
//  flow out. No direct host → manager calls.
// ─────────────────────────────────────────────

import type { PresetVolumes, SoundPlayerManagerState, SoundPlayerState } from '@/engine/data/types/Audio';
import type { PlaybackSettings } from '@/config';

/** Centralised map of all playback events and their payload types */
export interface PlaybackEventMap {
  // Commands (host → engine)
  soundPlayRequested:     { soundId: string };
  soundStopRequested:     { soundId: string };
  soundVolumeRequested:   { soundId: string; volume: number };
  presetRequested:        { volumes: PresetVolumes };
  playbackPauseRequested: { immediate: boolean };
  playbackResumeRequested: Record<string, never>;
  playbackStopRequested:  { immediate: boolean };
  volumeRequested:        { volume: number };
  settingsChanged:        { settings: Partial<PlaybackSettings> };

  // Notifications (engine → host)
  managerStateChanged:    { state: SoundPlayerManagerState };
  managerVolumeChanged:   { volume: number };
  soundStateChanged:      { soundId: string; state: SoundPlayerState };
  soundVolumeChanged:     { soundId: string; volume: number };

  // Diagnostics
  logMessage:             { text: string; cls: string };
}

type Listener<T> = (payload: T) => void;

/** One listener list per event, each typed by its own payload. */
type ListenerTable = { [K in keyof PlaybackEventMap]?: Listener<PlaybackEventMap[K]>[] };

class TypedEventBus {
  private table: ListenerTable = {};

  on<K extends keyof PlaybackEventMap>(event: K, listener: Listener<PlaybackEventMap[K]>): void {
    const table: { [P in K]?: Listener<PlaybackEventMap[P]>[] } = this.table;
    const listeners = table[event];
    if (listeners) {
      listeners.push(listener);
    } else {
      table[event] = [listener];
    }
  }

  off<K extends keyof PlaybackEventMap>(event: K, listener: Listener<PlaybackEventMap[K]>): void {
    const listeners = this.table[event];
    if (!listeners) return;
    const idx = listeners.indexOf(listener);
    if (idx === -1) return;
    listeners.splice(idx, 1);
    if (listeners.length === 0) delete this.table[event];
  }

  emit<K extends keyof PlaybackEventMap>(event: K, payload: PlaybackEventMap[K]): void {
    const listeners = this.table[event];
    if (!listeners) return;
    // Handlers may unsubscribe while we deliver.
    for (const listener of [...listeners]) listener(payload);
  }

  /** Number of handlers bound to an event. */
  listenerCount(event: keyof PlaybackEventMap): number {
    return this.table[event]?.length ?? 0;
  }

  /** Drop every handler; tests call this between cases. */
  clear(): void {
    this.table = {};
  }
}

/** Singleton event bus, import this directly anywhere */
export const EventBus = new TypedEventBus();
