// packages/core/src/types/poll.ts — Poll/wake protocol shared by every suspension point

/** Asks the scheduler to poll the owner of this waker again. Spurious calls are allowed. */
export type Waker = () => void;

export interface Ready<T> {
  ready: true;
  value: T;
}

export interface Pending {
  ready: false;
}

export type Poll<T> = Ready<T> | Pending;

/** A suspended computation that makes progress only when polled. */
export interface Pollable<T> {
  /**
   * Advance the computation. Returns the result when it is available,
   * otherwise arranges for `waker` to be called once progress is possible.
   */
  poll(waker: Waker): Poll<T>;
}

/** A sequence of items produced one poll at a time. `done` marks the end. */
export interface PollableStream<T> {
  pollNext(waker: Waker): Poll<IteratorResult<T, void>>;
  /** Release whatever the stream holds. Called once the consumer stops pulling. */
  release?(): void;
}

/** A stream that can tell how many produced items it is holding right now. */
export interface BufferedStream<T> extends PollableStream<T> {
  readonly size: number;
}

export const PENDING: Pending = Object.freeze({ ready: false });

export const STREAM_DONE: IteratorReturnResult<void> = Object.freeze({ done: true, value: undefined });

export function ready<T>(value: T): Ready<T> {
  return { ready: true, value };
}

export function isBufferedStream<T>(stream: PollableStream<T>): stream is BufferedStream<T> {
  return 'size' in stream && typeof stream.size === 'number';
}
