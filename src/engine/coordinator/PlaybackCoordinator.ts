// ─────────────────────────────────────────────
//  PlaybackCoordinator
//  Subscribes to EventBus commands and routes them to
//  SoundPlayerManager calls; republishes the manager's
//  listener callbacks as EventBus notifications.
// ─────────────────────────────────────────────

import { EventBus } from '@/engine/utils/EventBus';
import type { PlaybackEventMap } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';
import type { SoundPlayerManager, SoundPlayerManagerListener } from './SoundPlayerManager';
import type { PlaybackSettings } from '@/config';

export class PlaybackCoordinator {
  private manager: SoundPlayerManager;

  // Removal closures for every bound handler
  private unbinders: Array<() => void> = [];

  private readonly relay: SoundPlayerManagerListener = {
    onStateChange: (state) => EventBus.emit('managerStateChanged', { state }),
    onVolumeChange: (volume) => EventBus.emit('managerVolumeChanged', { volume }),
    onSoundStateChange: (soundId, state) => EventBus.emit('soundStateChanged', { soundId, state }),
    onSoundVolumeChange: (soundId, volume) => EventBus.emit('soundVolumeChanged', { soundId, volume }),
  };

  constructor(manager: SoundPlayerManager, settings?: Partial<PlaybackSettings>) {
    this.manager = manager;
    this.manager.setListener(this.relay);
    if (settings) this.applySettings(settings);

    this.bindEvents();
  }

  // ── Public API ────────────────────────────────

  /** Push every present field through the matching manager setter. */
  applySettings(settings: Partial<PlaybackSettings>): void {
    const m = this.manager;
    if (settings.fadeInDurationMs !== undefined) m.setFadeInDuration(settings.fadeInDurationMs);
    if (settings.fadeOutDurationMs !== undefined) m.setFadeOutDuration(settings.fadeOutDurationMs);
    if (settings.premiumSegmentsEnabled !== undefined) m.setPremiumSegmentsEnabled(settings.premiumSegmentsEnabled);
    if (settings.audioBitrate !== undefined) m.setAudioBitrate(settings.audioBitrate);
    if (settings.audioAttributes !== undefined) m.setAudioAttributes(settings.audioAttributes);
    if (settings.audioFocusManagementEnabled !== undefined) {
      m.setAudioFocusManagementEnabled(settings.audioFocusManagementEnabled);
    }
    const volume = settings.volume;
    if (volume !== undefined) {
      this.guardVolume('volume', () => m.setVolume(volume));
    }
  }

  destroy(): void {
    this.unbindEvents();
    this.manager.destroy();
  }

  // ── Private: Event Bindings ───────────────────

  private bindEvents(): void {
    this.on('soundPlayRequested', (p) => this.manager.playSound(p.soundId));
    this.on('soundStopRequested', (p) => this.manager.stopSound(p.soundId));
    this.on('soundVolumeRequested', (p) =>
      this.guardVolume(`sound ${p.soundId}`, () => this.manager.setSoundVolume(p.soundId, p.volume)));
    this.on('presetRequested', (p) =>
      this.guardVolume('preset', () => this.manager.playPreset(p.volumes)));

    this.on('playbackPauseRequested', (p) => this.manager.pause(p.immediate));
    this.on('playbackResumeRequested', () => this.manager.resume());
    this.on('playbackStopRequested', (p) => this.manager.stop(p.immediate));

    this.on('volumeRequested', (p) =>
      this.guardVolume('volume', () => this.manager.setVolume(p.volume)));
    this.on('settingsChanged', (p) => this.applySettings(p.settings));
  }

  private unbindEvents(): void {
    for (const unbind of this.unbinders) unbind();
    this.unbinders = [];
  }

  /** Type-safe wrapper: subscribe + store for later removal */
  private on<K extends keyof PlaybackEventMap>(
    event: K,
    handler: (payload: PlaybackEventMap[K]) => void,
  ): void {
    EventBus.on(event, handler);
    this.unbinders.push(() => EventBus.off(event, handler));
  }

  /** Bus commands cannot throw back to the sender; rejected volumes are logged. */
  private guardVolume(target: string, apply: () => void): void {
    try {
      apply();
    } catch (err) {
      if (!(err instanceof RangeError)) throw err;
      Logger.log(`rejected ${target}: ${err.message}`, 'warn');
    }
  }
}
