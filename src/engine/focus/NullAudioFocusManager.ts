// ─────────────────────────────────────────────
//  NullAudioFocusManager
//  Used when focus management is disabled: always
//  holds focus, requests succeed immediately.
// ─────────────────────────────────────────────

import type { AudioFocusListener, IAudioFocusManager } from './IAudioFocusManager';

export class NullAudioFocusManager implements IAudioFocusManager {
  private listener: AudioFocusListener;

  constructor(listener: AudioFocusListener) {
    this.listener = listener;
  }

  requestFocus(): void {
    this.listener.onFocusGained();
  }

  abandonFocus(): void {}

  hasFocus(): boolean { return true; }
}
