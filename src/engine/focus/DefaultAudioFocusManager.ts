// ─────────────────────────────────────────────
//  DefaultAudioFocusManager
//  IAudioFocusManager backed by an AudioFocusBroker.
//  Alarm-stream playback asks for exclusive focus.
// ─────────────────────────────────────────────

import type { AudioAttributes } from '@/engine/data/types/Audio';
import type { AudioFocusBroker } from './AudioFocusBroker';
import type { AudioFocusListener, IAudioFocusManager } from './IAudioFocusManager';
import { Logger } from '@/engine/utils/Logger';

export class DefaultAudioFocusManager implements IAudioFocusManager {
  readonly attributes: AudioAttributes;
  private broker: AudioFocusBroker;
  private listener: AudioFocusListener;

  private focused = false;
  /** Holding focus, waiting for a delayed grant or transiently displaced. */
  private registered = false;

  // Identity handed to the broker; stays stable for the manager's lifetime.
  private readonly client: AudioFocusListener = {
    onFocusGained: () => {
      this.focused = true;
      Logger.log('audio focus gained', 'focus');
      this.listener.onFocusGained();
    },
    onFocusLost: (transient: boolean) => {
      this.focused = false;
      if (!transient) this.registered = false;
      Logger.log(`audio focus lost (${transient ? 'transient' : 'permanent'})`, 'focus');
      this.listener.onFocusLost(transient);
    },
  };

  constructor(broker: AudioFocusBroker, attributes: AudioAttributes, listener: AudioFocusListener) {
    this.broker = broker;
    this.attributes = attributes;
    this.listener = listener;
  }

  requestFocus(): void {
    if (this.focused) return;

    const result = this.broker.request(this.client, {
      transient: false,
      exclusive: this.attributes.usage === 'alarm',
    });
    this.registered = true;

    if (result === 'granted') {
      this.focused = true;
      Logger.log('audio focus granted', 'focus');
      this.listener.onFocusGained();
    } else {
      Logger.log('audio focus request delayed', 'focus');
    }
  }

  abandonFocus(): void {
    if (!this.registered) return;
    this.registered = false;
    this.focused = false;
    this.broker.abandon(this.client);
  }

  hasFocus(): boolean {
    return this.focused;
  }
}
