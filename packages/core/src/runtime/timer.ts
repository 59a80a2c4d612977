// packages/core/src/runtime/timer.ts — Timer capability and its backends

import type { TimerKind } from '../types/config.js';
import type { Pollable, Poll, Waker } from '../types/poll.js';
import { PENDING, ready } from '../types/poll.js';
import { MAX_TIMEOUT_MS } from '../utils/constants.js';
import { InvariantError } from '../utils/errors.js';

/** A wake scheduled for an instant. Ready once the timer's clock reaches `at`. */
export interface ScheduledWake extends Pollable<void> {
  readonly at: number;
  /** Release the underlying timer. The wake must not be polled afterwards. */
  cancel(): void;
}

export interface Timer {
  readonly kind: string;
  /** Current instant in milliseconds on this timer's clock. */
  now(): number;
  schedule(at: number): ScheduledWake;
}

/**
 * Shared poll logic: report ready once the clock has passed `at`, otherwise
 * remember the latest waker and arm the backend once.
 */
abstract class TimerWake implements ScheduledWake {
  private waker: Waker | undefined;
  private armed = false;
  private cancelled = false;

  constructor(
    readonly at: number,
    private readonly clock: () => number,
  ) {}

  poll(waker: Waker): Poll<void> {
    if (this.cancelled) {
      throw new InvariantError('scheduled wake polled after cancel()');
    }
    if (this.clock() >= this.at) {
      this.waker = undefined;
      this.disarmIfArmed();
      return ready(undefined);
    }
    this.waker = waker;
    if (!this.armed) {
      this.armed = true;
      this.arm();
    }
    return PENDING;
  }

  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.waker = undefined;
    this.disarmIfArmed();
  }

  /** Backend callback. Early fires are fine: the next poll re-checks the clock and re-arms. */
  protected fire(): void {
    this.armed = false;
    const waker = this.waker;
    this.waker = undefined;
    waker?.();
  }

  private disarmIfArmed(): void {
    if (!this.armed) return;
    this.armed = false;
    this.disarm();
  }

  protected abstract arm(): void;
  protected abstract disarm(): void;
}

class SystemWake extends TimerWake {
  private handle: ReturnType<typeof setTimeout> | undefined;

  protected arm(): void {
    // Instants further away than setTimeout's limit fire early and re-arm.
    const delay = Math.min(Math.max(this.at - Date.now(), 0), MAX_TIMEOUT_MS);
    this.handle = setTimeout(() => {
      this.handle = undefined;
      this.fire();
    }, delay);
  }

  protected disarm(): void {
    if (this.handle !== undefined) {
      clearTimeout(this.handle);
      this.handle = undefined;
    }
  }
}

/** Wall-clock timer on `Date.now()` and `setTimeout`. */
export class SystemTimer implements Timer {
  readonly kind = 'system';

  now(): number {
    return Date.now();
  }

  schedule(at: number): ScheduledWake {
    return new SystemWake(at, () => Date.now());
  }
}

class ManualWake extends TimerWake {
  constructor(
    at: number,
    private readonly timer: ManualTimer,
  ) {
    super(at, () => timer.now());
  }

  expire(): void {
    this.fire();
  }

  protected arm(): void {
    this.timer.track(this);
  }

  protected disarm(): void {
    this.timer.untrack(this);
  }
}

/**
 * Virtual clock that only moves when told to. Deterministic stand-in for
 * the system timer.
 */
export class ManualTimer implements Timer {
  readonly kind = 'manual';
  private current: number;
  private readonly armed = new Set<ManualWake>();

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  schedule(at: number): ScheduledWake {
    return new ManualWake(at, this);
  }

  /** Number of wakes currently armed and waiting for the clock. */
  get pendingCount(): number {
    return this.armed.size;
  }

  advance(ms: number): void {
    if (!Number.isFinite(ms) || ms < 0) {
      throw new RangeError(`ManualTimer.advance expects a non-negative duration, got ${ms}`);
    }
    this.setTime(this.current + ms);
  }

  /** Move the clock to `at` and fire every wake that is now due, earliest first. */
  setTime(at: number): void {
    if (at < this.current) {
      throw new RangeError(`ManualTimer cannot move backwards (${this.current} -> ${at})`);
    }
    this.current = at;
    const due = [...this.armed].filter((wake) => wake.at <= at).sort((a, b) => a.at - b.at);
    for (const wake of due) {
      this.armed.delete(wake);
      wake.expire();
    }
  }

  /** @internal */
  track(wake: ManualWake): void {
    this.armed.add(wake);
  }

  /** @internal */
  untrack(wake: ManualWake): void {
    this.armed.delete(wake);
  }
}

export function createTimer(kind: TimerKind): Timer {
  return kind === 'manual' ? new ManualTimer() : new SystemTimer();
}
