// packages/core/src/deadline/deadline.ts — Time values and tokens as one kind of stop signal

import { getDefaultRuntime } from '../runtime/runtime.js';
import type { ScheduledWake, Timer } from '../runtime/timer.js';
import { StopToken } from '../signal/stop-token.js';
import type { Pollable, Poll, Waker } from '../types/poll.js';
import { ready } from '../types/poll.js';
import { InvariantError } from '../utils/errors.js';

/**
 * What a combinator can be stopped by: a token, a deadline, a duration in
 * milliseconds, or an absolute instant.
 */
export type DeadlineTarget = StopToken | Deadline | number | Date;

type Origin =
  | { kind: 'token'; token: StopToken }
  | { kind: 'duration'; ms: number; at: number }
  | { kind: 'instant'; at: number };

/**
 * A single-use signal with no payload. Ready once its token stops or its
 * instant has passed on the timer's clock; never earlier.
 */
export class Deadline implements Pollable<void> {
  private wake: ScheduledWake | undefined;
  private elapsed = false;
  private disposed = false;
  private readonly logger = getDefaultRuntime().logger.child('deadline');

  private constructor(
    private readonly origin: Origin,
    private readonly timer: Timer,
  ) {}

  static fromToken(token: StopToken, timer?: Timer): Deadline {
    return new Deadline({ kind: 'token', token }, timer ?? getDefaultRuntime().timer);
  }

  /** Ready `ms` milliseconds after now. */
  static after(ms: number, timer?: Timer): Deadline {
    if (!Number.isFinite(ms) || ms < 0) {
      throw new RangeError(`Deadline duration must be a non-negative finite number, got ${ms}`);
    }
    const clock = timer ?? getDefaultRuntime().timer;
    return new Deadline({ kind: 'duration', ms, at: clock.now() + ms }, clock);
  }

  /** Ready at `instant`: a Date, or milliseconds on the timer's clock. */
  static at(instant: Date | number, timer?: Timer): Deadline {
    const at = instant instanceof Date ? instant.getTime() : instant;
    if (Number.isNaN(at)) {
      throw new RangeError('Deadline instant is not a valid time');
    }
    return new Deadline({ kind: 'instant', at }, timer ?? getDefaultRuntime().timer);
  }

  /** The instant this deadline fires at, or undefined for token deadlines. */
  get at(): number | undefined {
    return this.origin.kind === 'token' ? undefined : this.origin.at;
  }

  get isElapsed(): boolean {
    if (this.elapsed) return true;
    if (this.origin.kind === 'token') return this.origin.token.isStopped;
    return this.timer.now() >= this.origin.at;
  }

  poll(waker: Waker): Poll<void> {
    if (this.elapsed) return ready(undefined);
    if (this.disposed) {
      throw new InvariantError('deadline polled after dispose()');
    }
    const result = this.pollOrigin(waker);
    if (result.ready) {
      this.elapsed = true;
      this.releaseWait();
    }
    return result;
  }

  /** Release the timer or token registration. Safe to call more than once. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.releaseWait();
  }

  /**
   * A fresh deadline for the same target. Durations are measured from now
   * again; instants and tokens carry over as they are.
   */
  clone(): Deadline {
    switch (this.origin.kind) {
      case 'token':
        return Deadline.fromToken(this.origin.token.clone(), this.timer);
      case 'duration':
        return Deadline.after(this.origin.ms, this.timer);
      case 'instant':
        return Deadline.at(this.origin.at, this.timer);
    }
  }

  private pollOrigin(waker: Waker): Poll<void> {
    if (this.origin.kind === 'token') {
      return this.origin.token.poll(waker);
    }
    if (!this.wake) {
      this.wake = this.timer.schedule(this.origin.at);
      this.logger.debug(`wake scheduled at ${this.origin.at}`);
    }
    return this.wake.poll(waker);
  }

  private releaseWait(): void {
    if (this.origin.kind === 'token') {
      this.origin.token.detach();
      return;
    }
    this.wake?.cancel();
    this.wake = undefined;
  }
}

/**
 * Convert a target to a Deadline. Tokens are cloned so the caller's token
 * keeps its own registration; a Deadline is taken as is.
 */
export function toDeadline(target: DeadlineTarget, timer?: Timer): Deadline {
  if (target instanceof Deadline) return target;
  if (target instanceof StopToken) return Deadline.fromToken(target.clone(), timer);
  if (target instanceof Date) return Deadline.at(target, timer);
  return Deadline.after(target, timer);
}
