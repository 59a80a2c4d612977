// packages/core/src/combinators/adapters.ts — Promises and async iterables as pollables

import type { BufferedStream, Pollable, PollableStream, Poll, Waker } from '../types/poll.js';
import { PENDING, STREAM_DONE, ready } from '../types/poll.js';
import type { Logger } from '../utils/logger.js';

type Settlement<T> = { ok: true; value: T } | { ok: false; error: unknown };

export function isPollable<T>(value: PromiseLike<T> | Pollable<T>): value is Pollable<T> {
  return 'poll' in value && typeof value.poll === 'function';
}

export function isPollableStream<T>(value: AsyncIterable<T> | PollableStream<T>): value is PollableStream<T> {
  return 'pollNext' in value && typeof value.pollNext === 'function';
}

/** Subscribes at construction, so a rejection is always handled. */
export class PromisePollable<T> implements Pollable<T> {
  private settlement: Settlement<T> | undefined;
  private waker: Waker | undefined;

  constructor(promise: PromiseLike<T>) {
    promise.then(
      (value) => this.settle({ ok: true, value }),
      (error: unknown) => this.settle({ ok: false, error }),
    );
  }

  poll(waker: Waker): Poll<T> {
    const settlement = this.settlement;
    if (!settlement) {
      this.waker = waker;
      return PENDING;
    }
    this.waker = undefined;
    if (!settlement.ok) {
      throw settlement.error;
    }
    return ready(settlement.value);
  }

  private settle(settlement: Settlement<T>): void {
    this.settlement = settlement;
    const waker = this.waker;
    this.waker = undefined;
    waker?.();
  }
}

/**
 * Pulls from an async iterator one request at a time. An answered request
 * counts as one buffered item until it is taken.
 */
export class AsyncIterablePollable<T> implements BufferedStream<T> {
  private iterator: AsyncIterator<T> | undefined;
  private inFlight = false;
  private settlement: Settlement<IteratorResult<T>> | undefined;
  private waker: Waker | undefined;
  private released = false;

  constructor(
    private readonly iterable: AsyncIterable<T>,
    private readonly logger: Logger,
  ) {}

  get size(): number {
    return this.settlement?.ok && !this.settlement.value.done ? 1 : 0;
  }

  pollNext(waker: Waker): Poll<IteratorResult<T, void>> {
    const settlement = this.settlement;
    if (settlement) {
      this.settlement = undefined;
      if (!settlement.ok) throw settlement.error;
      const result = settlement.value;
      return ready(result.done ? STREAM_DONE : { done: false, value: result.value });
    }
    this.waker = waker;
    if (!this.inFlight && !this.released) {
      this.request();
    }
    return PENDING;
  }

  /** Close the underlying iterator. A request still in flight is discarded when it lands. */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.waker = undefined;
    const iterator = this.iterator;
    if (iterator?.return) {
      iterator.return().then(undefined, (error: unknown) => {
        this.logger.warn('Source iterator failed to close', error);
      });
    }
  }

  private request(): void {
    this.inFlight = true;
    this.iterator ??= this.iterable[Symbol.asyncIterator]();
    this.iterator.next().then(
      (value) => this.settle({ ok: true, value }),
      (error: unknown) => this.settle({ ok: false, error }),
    );
  }

  private settle(settlement: Settlement<IteratorResult<T>>): void {
    this.inFlight = false;
    if (this.released) {
      if (!settlement.ok) {
        this.logger.warn('Source iterator failed after the consumer stopped', settlement.error);
      }
      return;
    }
    this.settlement = settlement;
    const waker = this.waker;
    this.waker = undefined;
    waker?.();
  }
}
