// ─────────────────────────────────────────────
//  Entry point: ambience engine
//
//  createPlaybackEngine() wires a SoundPlayerManager,
//  the EventBus coordinator and the snapshot store.
//  Hosts drive it by emitting command events and read
//  it through PlaybackStore.
// ─────────────────────────────────────────────

import { loadPlaybackSettings } from './engine/loader/PlaybackSettingsLoader';
import { SoundPlayerManager } from './engine/coordinator/SoundPlayerManager';
import { PlaybackCoordinator } from './engine/coordinator/PlaybackCoordinator';
import { PlaybackStore } from './engine/state/PlaybackStore';
import { SimulatedSoundPlayerFactory } from './engine/player/SimulatedSoundPlayer';
import type { SoundPlayerFactory } from './engine/player/ISoundPlayer';
import type { AudioFocusBroker } from './engine/focus/AudioFocusBroker';
import type { PlaybackSettings } from './config';

export interface PlaybackEngine {
  settings: PlaybackSettings;
  manager: SoundPlayerManager;
  coordinator: PlaybackCoordinator;
  store: PlaybackStore;
  destroy(): void;
}

export interface PlaybackEngineOptions {
  /** Persisted preferences, usually JSON.parse output. */
  settings?: unknown;
  /** Player engine; defaults to the simulated, timer-driven player. */
  playerFactory?: SoundPlayerFactory;
  focusBroker?: AudioFocusBroker;
}

export function createPlaybackEngine(options: PlaybackEngineOptions = {}): PlaybackEngine {
  const settings = loadPlaybackSettings(options.settings);
  const manager = new SoundPlayerManager(options.playerFactory ?? new SimulatedSoundPlayerFactory(), {
    focusBroker: options.focusBroker,
    focusManagementEnabled: settings.audioFocusManagementEnabled,
  });

  // Store first so it sees the notifications produced while settings apply.
  const store = new PlaybackStore();
  const coordinator = new PlaybackCoordinator(manager, settings);

  return {
    settings,
    manager,
    coordinator,
    store,
    destroy: () => {
      coordinator.destroy();
      store.destroy();
    },
  };
}

export { SoundPlayerManager, reconcileManagerState } from './engine/coordinator/SoundPlayerManager';
export type { SoundPlayerManagerListener, SoundPlayerManagerOptions } from './engine/coordinator/SoundPlayerManager';
export { PlaybackCoordinator } from './engine/coordinator/PlaybackCoordinator';
export { PlaybackStore } from './engine/state/PlaybackStore';
export type { PlaybackState } from './engine/state/PlaybackStore';
export { SimulatedSoundPlayer, SimulatedSoundPlayerFactory } from './engine/player/SimulatedSoundPlayer';
export type { ISoundPlayer, SoundPlayerFactory, SoundPlayerStateListener } from './engine/player/ISoundPlayer';
export { AudioFocusBroker, audioFocusBroker } from './engine/focus/AudioFocusBroker';
export type { FocusRequest, FocusRequestResult } from './engine/focus/AudioFocusBroker';
export { DefaultAudioFocusManager } from './engine/focus/DefaultAudioFocusManager';
export { NullAudioFocusManager } from './engine/focus/NullAudioFocusManager';
export type { AudioFocusListener, IAudioFocusManager } from './engine/focus/IAudioFocusManager';
export { EventBus } from './engine/utils/EventBus';
export type { PlaybackEventMap } from './engine/utils/EventBus';
export { loadPlaybackSettings } from './engine/loader/PlaybackSettingsLoader';
export { DEFAULT_PLAYBACK_SETTINGS } from './config';
export type { PlaybackSettings } from './config';
export * from './engine/data/types/Audio';
