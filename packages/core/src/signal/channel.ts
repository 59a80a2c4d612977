// packages/core/src/signal/channel.ts — Bounded multi-producer multi-consumer channel

import { drive, driveStream } from '../runtime/driver.js';
import { getDefaultRuntime } from '../runtime/runtime.js';
import type { Scheduler } from '../runtime/scheduler.js';
import type { BufferedStream, Poll, Waker } from '../types/poll.js';
import { PENDING, STREAM_DONE, ready } from '../types/poll.js';
import { ChannelClosedError, throwCollected } from '../utils/errors.js';
import type { WaitRegistration } from './wait-registry.js';
import { WaitRegistry } from './wait-registry.js';

export interface ChannelOptions {
  /** Defaults to the runtime's `channelCapacity`. */
  capacity?: number;
  /** Scheduler for `send()` and async iteration. */
  scheduler?: Scheduler;
}

/**
 * FIFO buffer of at most `capacity` items. Every item goes to exactly one
 * receiver. After `close()` no more items are accepted, and receivers drain
 * what is buffered before they see the end.
 */
export class Channel<T> implements BufferedStream<T>, AsyncIterable<T> {
  readonly capacity: number;
  private readonly buffer: T[] = [];
  private closed = false;
  private readonly receivers = new WaitRegistry();
  private readonly senders = new WaitRegistry();
  private readonly scheduler: Scheduler | undefined;

  constructor(options: ChannelOptions = {}) {
    const capacity = options.capacity ?? getDefaultRuntime().config.channelCapacity;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.scheduler = options.scheduler;
  }

  /** Items buffered and not yet received. */
  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isFull(): boolean {
    return this.buffer.length >= this.capacity;
  }

  /** Parties currently waiting to receive. */
  get waitingReceivers(): number {
    return this.receivers.size;
  }

  /** Buffer `item` if there is room. Throws ChannelClosedError once closed. */
  trySend(item: T): boolean {
    if (this.closed) {
      throw new ChannelClosedError();
    }
    if (this.isFull) return false;
    this.buffer.push(item);
    throwCollected(this.receivers.wakeAll(), 'Channel receiver wakers failed');
    return true;
  }

  /** Buffer `item`, waiting for room while the channel is full. */
  send(item: T): Promise<void> {
    return drive(
      {
        poll: (waker) => {
          if (this.trySend(item)) return ready(undefined);
          const registration = this.senders.register(waker);
          // Room may have appeared between the failed attempt and the registration.
          if (!this.isFull || this.closed) {
            registration.cancel();
            if (this.trySend(item)) return ready(undefined);
          }
          return PENDING;
        },
      },
      this.scheduler,
    );
  }

  /**
   * Stop accepting items and wake everyone waiting. Returns false when the
   * channel was already closed. Rethrows what the wakers threw, after all of
   * them ran.
   */
  close(): boolean {
    if (this.closed) return false;
    this.closed = true;
    const failures = [...this.receivers.wakeAll(), ...this.senders.wakeAll()];
    throwCollected(failures, 'Channel wakers failed');
    return true;
  }

  /** Receive without waiting: an item, the end, or pending when empty and open. */
  tryReceive(): Poll<IteratorResult<T, void>> {
    if (this.buffer.length > 0) {
      const [item] = this.buffer.splice(0, 1);
      throwCollected(this.senders.wakeAll(), 'Channel sender wakers failed');
      return ready({ done: false, value: item });
    }
    if (this.closed) return ready(STREAM_DONE);
    return PENDING;
  }

  /**
   * Register `waker` for the next item or the close. Does not check state;
   * callers re-check after registering.
   */
  registerReceiver(waker: Waker): WaitRegistration {
    return this.receivers.register(waker);
  }

  pollNext(waker: Waker): Poll<IteratorResult<T, void>> {
    const first = this.tryReceive();
    if (first.ready) return first;
    const registration = this.registerReceiver(waker);
    const second = this.tryReceive();
    if (second.ready) {
      registration.cancel();
    }
    return second;
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return driveStream(this, this.scheduler);
  }
}
