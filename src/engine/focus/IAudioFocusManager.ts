// ─────────────────────────────────────────────
//  IAudioFocusManager Interface
//  Access to the shared, exclusive right to play audio.
//  Implementations: DefaultAudioFocusManager (arbitrated),
//  NullAudioFocusManager (focus management disabled)
// ─────────────────────────────────────────────

export interface AudioFocusListener {
  /** Focus was granted, either right away or after a delay/transient loss. */
  onFocusGained(): void;

  /** Another client took focus. `transient` losses are expected to come back. */
  onFocusLost(transient: boolean): void;
}

export interface IAudioFocusManager {
  /** Ask for focus; the outcome is reported through the listener. */
  requestFocus(): void;

  /** Give focus back so other clients may play. */
  abandonFocus(): void;

  hasFocus(): boolean;
}
