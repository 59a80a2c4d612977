// packages/core/src/runtime/scheduler.ts — Where woken computations get polled again

import type { SchedulerKind } from '../types/config.js';

export interface Scheduler {
  readonly kind: string;
  /** Run `callback` later, never synchronously inside the call. */
  schedule(callback: () => void): void;
}

export const microtaskScheduler: Scheduler = {
  kind: 'microtask',
  schedule(callback) {
    queueMicrotask(callback);
  },
};

/** Yields to I/O between resumes; useful when a stream wakes itself in a tight loop. */
export const macrotaskScheduler: Scheduler = {
  kind: 'macrotask',
  schedule(callback) {
    setImmediate(callback);
  },
};

export function createScheduler(kind: SchedulerKind): Scheduler {
  return kind === 'macrotask' ? macrotaskScheduler : microtaskScheduler;
}
