// ─────────────────────────────────────────────
//  AudioFocusBroker
//  In-process arbitration of the exclusive audio output.
//  Holders form a stack; the top entry owns focus.
//  Transient grants push on top of the previous holder,
//  permanent grants displace everyone below.
// ─────────────────────────────────────────────

import type { AudioFocusListener } from './IAudioFocusManager';

export interface FocusRequest {
  /** The requester expects to give focus back soon (e.g. a notification or call). */
  transient: boolean;
  /** While held, other requests are queued instead of granted (e.g. an alarm). */
  exclusive: boolean;
}

export type FocusRequestResult = 'granted' | 'delayed';

interface FocusEntry {
  client: AudioFocusListener;
  request: FocusRequest;
}

const DEFAULT_REQUEST: FocusRequest = { transient: false, exclusive: false };

export class AudioFocusBroker {
  private stack: FocusEntry[] = [];

  /** Current focus holder, or null when nobody plays. */
  get holder(): AudioFocusListener | null {
    return this.top()?.client ?? null;
  }

  /** Number of clients holding or waiting for focus. */
  get size(): number {
    return this.stack.length;
  }

  isRegistered(client: AudioFocusListener): boolean {
    return this.stack.some(e => e.client === client);
  }

  /**
   * Ask for focus on behalf of `client`. A 'granted' result is final and is not
   * repeated through `onFocusGained()`; a 'delayed' one is answered later.
   */
  request(client: AudioFocusListener, request: FocusRequest = DEFAULT_REQUEST): FocusRequestResult {
    const top = this.top();
    if (top?.client === client) {
      top.request = request;
      return 'granted';
    }

    this.remove(client);

    if (top && top.request.exclusive) {
      // Wait directly below the exclusive holder.
      this.stack.splice(this.stack.length - 1, 0, { client, request });
      return 'delayed';
    }

    if (request.transient) {
      this.stack.push({ client, request });
      top?.client.onFocusLost(true);
      return 'granted';
    }

    const displaced = this.stack;
    this.stack = [{ client, request }];
    for (let i = displaced.length - 1; i >= 0; i--) {
      displaced[i]?.client.onFocusLost(false);
    }
    return 'granted';
  }

  /** Withdraw `client`; if it held focus the next holder down regains it. */
  abandon(client: AudioFocusListener): void {
    const idx = this.stack.findIndex(e => e.client === client);
    if (idx === -1) return;

    const wasHolder = idx === this.stack.length - 1;
    this.stack.splice(idx, 1);
    if (wasHolder) {
      this.top()?.client.onFocusGained();
    }
  }

  /** Drop every entry without notifying anyone. */
  reset(): void {
    this.stack = [];
  }

  private top(): FocusEntry | undefined {
    return this.stack[this.stack.length - 1];
  }

  private remove(client: AudioFocusListener): void {
    this.stack = this.stack.filter(e => e.client !== client);
  }
}

/** Shared arbitration context for every manager in the process. */
export const audioFocusBroker = new AudioFocusBroker();
