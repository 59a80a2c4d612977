// packages/core/src/runtime/driver.ts — Drives pollables to completion on a Scheduler

import type { Pollable, PollableStream, Waker } from '../types/poll.js';
import { STREAM_DONE, ready } from '../types/poll.js';
import type { Scheduler } from './scheduler.js';
import { getDefaultRuntime } from './runtime.js';

/**
 * Poll `pollable` now and again after every wake until it is ready.
 * Wakes that arrive before the scheduled resume collapse into one poll,
 * wakes after settlement are ignored.
 */
export function drive<T>(pollable: Pollable<T>, scheduler?: Scheduler): Promise<T> {
  const sched = scheduler ?? getDefaultRuntime().scheduler;

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    let scheduled = false;

    const waker = (): void => {
      if (settled || scheduled) return;
      scheduled = true;
      sched.schedule(resume);
    };

    function resume(): void {
      scheduled = false;
      if (settled) return;
      try {
        const result = pollable.poll(waker);
        if (result.ready) {
          settled = true;
          resolve(result.value);
        }
      } catch (error) {
        settled = true;
        reject(error);
      }
    }

    resume();
  });
}

export interface StreamIterator<T> extends AsyncIterableIterator<T> {
  return(): Promise<IteratorResult<T, void>>;
}

/**
 * Expose a pollable stream as an async iterator. `next()` calls are
 * serialized; `return()` releases the stream at once, and a `next()` still
 * in flight then resolves done.
 */
export function driveStream<T>(
  stream: PollableStream<T>,
  scheduler?: Scheduler,
): StreamIterator<T> {
  const sched = scheduler ?? getDefaultRuntime().scheduler;
  let finished = false;
  let tail: Promise<unknown> = Promise.resolve();
  // Waker of the drive() behind the current next(), if one is waiting.
  let inFlight: Waker | undefined;

  const finish = (): void => {
    if (finished) return;
    finished = true;
    stream.release?.();
    const waker = inFlight;
    inFlight = undefined;
    waker?.();
  };

  const current: Pollable<IteratorResult<T, void>> = {
    poll: (waker) => {
      if (finished) return ready(STREAM_DONE);
      inFlight = waker;
      return stream.pollNext(waker);
    },
  };

  const step = async (): Promise<IteratorResult<T, void>> => {
    if (finished) return { done: true, value: undefined };
    try {
      const result = await drive(current, sched);
      inFlight = undefined;
      if (result.done) finish();
      return result;
    } catch (error) {
      inFlight = undefined;
      finish();
      throw error;
    }
  };

  return {
    next() {
      const result = tail.then(step, step);
      tail = result;
      return result;
    },
    async return() {
      finish();
      return { done: true, value: undefined };
    },
    [Symbol.asyncIterator]() {
      return this;
    },
  };
}
