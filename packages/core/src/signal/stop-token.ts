// packages/core/src/signal/stop-token.ts

import type { UntilOptions, Operation } from '../combinators/until.js';
import { until } from '../combinators/until.js';
import type { SequenceSource, StopStreamOptions, StoppableStream } from '../combinators/stop-stream.js';
import { stopStream } from '../combinators/stop-stream.js';
import { drive } from '../runtime/driver.js';
import type { Scheduler } from '../runtime/scheduler.js';
import type { Outcome } from '../types/outcome.js';
import type { Pollable, Poll, Waker } from '../types/poll.js';
import { PENDING, ready } from '../types/poll.js';
import { CancellationError } from '../utils/errors.js';
import type { CancellationSignal } from './cancellation-signal.js';
import type { WaitRegistration } from './wait-registry.js';

interface CachedWait {
  waker: Waker;
  registration: WaitRegistration;
}

/**
 * Observes a StopSource. Completes (as a Pollable, or through `wait()`)
 * once the source is stopped.
 *
 * A token keeps at most one registration with the signal, for the last
 * waker it was polled with. Poll a token from one party at a time and hand
 * each concurrent waiter its own `clone()`.
 */
export class StopToken implements Pollable<void> {
  private cached: CachedWait | undefined;

  /** @internal Tokens come from `StopSource.token()` or `clone()`. */
  constructor(private readonly signal: CancellationSignal) {}

  get isStopped(): boolean {
    return this.signal.isTriggered;
  }

  poll(waker: Waker): Poll<void> {
    if (this.signal.isTriggered) {
      this.detach();
      return ready(undefined);
    }
    if (this.cached?.waker === waker && this.cached.registration.active) {
      return PENDING;
    }
    // A different waker means a different party is waiting now.
    this.detach();
    const check = this.signal.checkOrRegister(waker);
    if (check.ready) return ready(undefined);
    this.cached = { waker, registration: check.registration };
    return PENDING;
  }

  /** Drop the registration kept by `poll()`, if any. */
  detach(): void {
    this.cached?.registration.cancel();
    this.cached = undefined;
  }

  /** Another token on the same signal, with its own registration. */
  clone(): StopToken {
    return new StopToken(this.signal);
  }

  /** Resolves once the source is stopped. */
  wait(scheduler?: Scheduler): Promise<void> {
    return drive(this.clone(), scheduler);
  }

  /**
   * Run `callback` when the source stops, or right away if it already has.
   * The same callback registered twice runs once. Returns an unsubscribe
   * function.
   */
  onStop(callback: () => void): () => void {
    const check = this.signal.checkOrRegister(callback);
    if (check.ready) {
      callback();
      return () => {};
    }
    const { registration } = check;
    return () => registration.cancel();
  }

  /** Throw if already stopped. Call before starting expensive work. */
  throwIfStopped(): void {
    if (this.signal.isTriggered) {
      throw new CancellationError();
    }
  }

  /** An AbortSignal aborted with a CancellationError when the source stops. */
  toAbortSignal(): AbortSignal {
    const controller = new AbortController();
    this.onStop(() => controller.abort(new CancellationError()));
    return controller.signal;
  }

  /** Race `operation` against this token. */
  race<T>(operation: Operation<T>, options?: UntilOptions): Promise<Outcome<T>> {
    return until(operation, this, options);
  }

  /** Stop pulling from `source` once this token stops. */
  stopStream<T>(source: SequenceSource<T>, options?: StopStreamOptions): StoppableStream<T> {
    return stopStream(source, this, options);
  }
}
