// packages/core/src/combinators/index.ts -- barrel re-export

export { StopFuture, until, untilOrThrow, wait } from './until.js';
export type { Cancellable, Operation, StopFutureState, UntilOptions } from './until.js';
export { StopStream, stopStream } from './stop-stream.js';
export type {
  SequenceSource,
  StopStreamEnd,
  StopStreamOptions,
  StoppableStream,
} from './stop-stream.js';
export { AsyncIterablePollable, PromisePollable, isPollable, isPollableStream } from './adapters.js';
