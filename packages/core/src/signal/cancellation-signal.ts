// packages/core/src/signal/cancellation-signal.ts — One-shot broadcast state shared by a source and its tokens

import type { Waker } from '../types/poll.js';
import { SIGNAL_CHANNEL_CAPACITY } from '../utils/constants.js';
import { invariant } from '../utils/errors.js';
import { Channel } from './channel.js';
import type { WaitRegistration } from './wait-registry.js';

export type SignalCheck = { ready: true } | { ready: false; registration: WaitRegistration };

/**
 * A channel nothing is ever sent on. Triggering closes it; the closed state
 * is the flag and the channel's receivers are the wait registry.
 */
export class CancellationSignal {
  private readonly channel = new Channel<never>({ capacity: SIGNAL_CHANNEL_CAPACITY });

  get isTriggered(): boolean {
    return this.channel.isClosed;
  }

  /** Parties currently registered to be woken. */
  get waiting(): number {
    return this.channel.waitingReceivers;
  }

  /**
   * Set the flag and wake every registered party once. Returns false when
   * the signal was already triggered. Rethrows waker failures after all
   * parties are woken.
   */
  trigger(): boolean {
    if (this.channel.isClosed) return false;
    const transitioned = this.channel.close();
    invariant(this.channel.isClosed, 'stop signal reopened after trigger');
    return transitioned;
  }

  /**
   * Ready when already triggered; otherwise register `waker` for the
   * trigger. Registers first and reads the flag again, so a trigger racing
   * the registration is seen either by the trigger or by the re-check.
   */
  checkOrRegister(waker: Waker): SignalCheck {
    if (this.isTriggered) return { ready: true };
    const registration = this.channel.registerReceiver(waker);
    if (this.isTriggered) {
      registration.cancel();
      return { ready: true };
    }
    return { ready: false, registration };
  }
}
