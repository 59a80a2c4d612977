// packages/core/src/combinators/until.ts — Race one operation against a stop signal

import type { DeadlineTarget } from '../deadline/deadline.js';
import { Deadline, toDeadline } from '../deadline/deadline.js';
import { drive } from '../runtime/driver.js';
import { getDefaultRuntime } from '../runtime/runtime.js';
import type { Scheduler } from '../runtime/scheduler.js';
import type { Timer } from '../runtime/timer.js';
import type { Outcome } from '../types/outcome.js';
import { CANCELLED, completed } from '../types/outcome.js';
import type { Pollable, Poll, Waker } from '../types/poll.js';
import { PENDING, ready } from '../types/poll.js';
import { CancellationError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { PromisePollable, isPollable } from './adapters.js';

export type Operation<T> = PromiseLike<T> | Pollable<T>;

/** A task handle that can be told to stop, e.g. a spawned job. */
export interface Cancellable {
  cancel(): void;
}

export interface UntilOptions {
  /** Clock for duration and instant targets. */
  timer?: Timer;
  scheduler?: Scheduler;
  logger?: Logger;
}

export type StopFutureState = 'pending' | 'completed' | 'cancelled';

function isCancellable(value: object): value is Cancellable {
  return 'cancel' in value && typeof value.cancel === 'function';
}

/**
 * Pending until either the deadline or the operation is ready. The
 * deadline is checked first on every poll; the operation is only polled
 * while the deadline is not ready, and is never polled again after a
 * terminal state.
 */
export class StopFuture<T> implements Pollable<Outcome<T>> {
  private outcome: Outcome<T> | undefined;

  constructor(
    private readonly operation: Pollable<T>,
    private readonly deadline: Deadline,
    private readonly onAbandon?: () => void,
  ) {}

  get state(): StopFutureState {
    return this.outcome?.status ?? 'pending';
  }

  poll(waker: Waker): Poll<Outcome<T>> {
    if (this.outcome) return ready(this.outcome);

    if (this.deadline.poll(waker).ready) {
      this.outcome = CANCELLED;
      this.onAbandon?.();
      return ready(this.outcome);
    }

    let result: Poll<T>;
    try {
      result = this.operation.poll(waker);
    } catch (error) {
      this.deadline.dispose();
      throw error;
    }
    if (!result.ready) return PENDING;

    this.outcome = completed(result.value);
    this.deadline.dispose();
    return ready(this.outcome);
  }
}

/**
 * Resolve to the operation's value, or to `{ status: 'cancelled' }` if the
 * target fires first. A rejected operation rejects. An operation with a
 * `cancel()` method is told to cancel when it loses.
 *
 * @example
 * const outcome = await until(fetchPage(), 5_000);
 * if (outcome.status === 'cancelled') retryLater();
 */
export function until<T>(
  operation: Operation<T>,
  target: DeadlineTarget,
  options: UntilOptions = {},
): Promise<Outcome<T>> {
  const logger = options.logger ?? getDefaultRuntime().logger;
  // The operation is subscribed to before the target is validated.
  const pollable = isPollable(operation) ? operation : new PromisePollable(operation);
  let deadline: Deadline;
  try {
    deadline = toDeadline(target, options.timer);
  } catch (error) {
    return Promise.reject(error);
  }
  const cancellable = isCancellable(operation) ? operation : undefined;
  const onAbandon = cancellable ? () => cancellable.cancel() : undefined;

  const future = new StopFuture(pollable, deadline, onAbandon);
  return drive(future, options.scheduler).then((outcome) => {
    logger.debug(`operation ${outcome.status}`);
    return outcome;
  });
}

/** Like `until`, but throws CancellationError instead of resolving cancelled. */
export async function untilOrThrow<T>(
  operation: Operation<T>,
  target: DeadlineTarget,
  options?: UntilOptions,
): Promise<T> {
  const outcome = await until(operation, target, options);
  if (outcome.status === 'cancelled') {
    throw new CancellationError();
  }
  return outcome.value;
}

/** Ready once the deadline is, with no value. */
export async function wait(target: DeadlineTarget, options: UntilOptions = {}): Promise<void> {
  return drive(toDeadline(target, options.timer), options.scheduler);
}
