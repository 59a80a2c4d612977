// packages/core/src/combinators/stop-stream.ts — Stop pulling from a sequence once a signal fires

import type { DeadlineTarget } from '../deadline/deadline.js';
import { Deadline, toDeadline } from '../deadline/deadline.js';
import { driveStream } from '../runtime/driver.js';
import { getDefaultRuntime } from '../runtime/runtime.js';
import type { Poll, PollableStream, Waker } from '../types/poll.js';
import { STREAM_DONE, isBufferedStream, ready } from '../types/poll.js';
import type { Logger } from '../utils/logger.js';
import { AsyncIterablePollable, isPollableStream } from './adapters.js';
import type { UntilOptions } from './until.js';

export type SequenceSource<T> = AsyncIterable<T> | PollableStream<T>;

export type StopStreamOptions = UntilOptions;

/** Why a stopped stream ended: its source finished, or the signal fired. */
export type StopStreamEnd = 'natural' | 'stopped';

export interface StoppableStream<T> extends AsyncIterableIterator<T> {
  /** True once the stream ended because the signal fired. */
  readonly stopped: boolean;
  return(): Promise<IteratorResult<T, void>>;
}

const noopWaker: Waker = () => {};

/**
 * Passes items through until the deadline fires, checking it before every
 * request to the source. Items the source had already produced when the
 * signal fired are still delivered; nothing is requested afterwards.
 */
export class StopStream<T> implements PollableStream<T> {
  private ended: StopStreamEnd | undefined;
  private released = false;
  /** Set when the signal is observed: produced items still owed to the consumer. */
  private owed: number | undefined;
  private waker: Waker | undefined;

  private readonly deadlineWaker: Waker = () => {
    if (this.ended || this.released) return;
    // Polling again re-arms a wake that fired before the deadline.
    if (this.owed === undefined && this.deadline.poll(this.deadlineWaker).ready) {
      this.observeStop();
    }
    this.waker?.();
  };

  constructor(
    private readonly source: PollableStream<T>,
    private readonly deadline: Deadline,
    private readonly logger: Logger,
  ) {
    // Register now so buffered items are counted the moment the signal fires.
    if (this.deadline.poll(this.deadlineWaker).ready) this.observeStop();
  }

  get endReason(): StopStreamEnd | undefined {
    return this.ended;
  }

  get stopped(): boolean {
    return this.ended === 'stopped';
  }

  pollNext(waker: Waker): Poll<IteratorResult<T, void>> {
    if (this.ended || this.released) return ready(STREAM_DONE);
    this.waker = waker;

    if (this.owed === undefined && this.deadline.poll(this.deadlineWaker).ready) {
      this.observeStop();
    }
    if (this.owed !== undefined) return this.drain();

    const result = this.source.pollNext(waker);
    if (result.ready && result.value.done) this.end('natural');
    return result;
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.waker = undefined;
    this.deadline.dispose();
    this.source.release?.();
  }

  private drain(): Poll<IteratorResult<T, void>> {
    const owed = this.owed ?? 0;
    if (owed > 0 && isBufferedStream(this.source) && this.source.size > 0) {
      // Buffered items are handed out without waiting.
      const result = this.source.pollNext(noopWaker);
      if (result.ready) {
        if (result.value.done) {
          this.end('natural');
        } else {
          this.owed = owed - 1;
        }
        return result;
      }
    }
    this.end('stopped');
    return ready(STREAM_DONE);
  }

  private observeStop(): void {
    if (this.owed !== undefined || this.ended) return;
    this.owed = isBufferedStream(this.source) ? this.source.size : 0;
  }

  private end(reason: StopStreamEnd): void {
    if (this.ended) return;
    this.ended = reason;
    this.logger.debug(`stream ended (${reason})`);
    this.release();
  }
}

/**
 * Pass `source` through until `target` fires, then end the sequence at the
 * next item boundary.
 *
 * @example
 * for await (const event of stopStream(events, source.token())) {
 *   await handle(event); // never interrupted halfway
 * }
 */
export function stopStream<T>(
  source: SequenceSource<T>,
  target: DeadlineTarget,
  options: StopStreamOptions = {},
): StoppableStream<T> {
  const logger = options.logger ?? getDefaultRuntime().logger;
  const pollable = isPollableStream(source) ? source : new AsyncIterablePollable(source, logger);
  const stream = new StopStream(pollable, toDeadline(target, options.timer), logger);
  const iterator = driveStream(stream, options.scheduler);

  return {
    next: () => iterator.next(),
    return: () => iterator.return(),
    get stopped() {
      return stream.stopped;
    },
    [Symbol.asyncIterator]() {
      return this;
    },
  };
}
