// packages/core/src/types/index.ts -- barrel re-export

export type { Waker, Ready, Pending, Poll, Pollable, PollableStream, BufferedStream } from './poll.js';
export { PENDING, STREAM_DONE, ready, isBufferedStream } from './poll.js';
export type { Completed, Cancelled, Outcome } from './outcome.js';
export { CANCELLED, completed, isCancelled } from './outcome.js';
export type { TimerKind, SchedulerKind, LogLevel, RuntimeConfig } from './config.js';
