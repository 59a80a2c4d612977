// packages/core/src/signal/stop-source.ts

import { getDefaultRuntime } from '../runtime/runtime.js';
import { SOURCE_ID_PREFIX } from '../utils/constants.js';
import { generateId } from '../utils/id.js';
import type { Logger } from '../utils/logger.js';
import { CancellationSignal } from './cancellation-signal.js';
import { StopToken } from './stop-token.js';

export interface StopSourceOptions {
  logger?: Logger;
}

interface Unreleased {
  id: string;
  signal: CancellationSignal;
  logger: Logger;
}

// A source dropped without stop() still stops its tokens, once collected.
const finalizer = new FinalizationRegistry<Unreleased>(({ id, signal, logger }) => {
  if (signal.isTriggered) return;
  logger.warn(`Stop source ${id} was garbage collected without stop(); stopping its tokens`);
  try {
    signal.trigger();
  } catch (error) {
    logger.error(`Stopping tokens of collected source ${id} failed`, error);
  }
});

/**
 * Owns a stop signal. Hands out any number of StopTokens and stops all of
 * them, once, when released with `stop()`.
 *
 * @example
 * const source = new StopSource();
 * scheduleWork(source.token());
 * source.stop(); // scheduled work notices at its next check
 */
export class StopSource {
  readonly id = generateId(SOURCE_ID_PREFIX);
  private readonly signal = new CancellationSignal();
  private readonly initial: StopToken;
  private readonly logger: Logger;

  constructor(options: StopSourceOptions = {}) {
    this.logger = (options.logger ?? getDefaultRuntime().logger).child(this.id);
    this.initial = new StopToken(this.signal);
    finalizer.register(this, { id: this.id, signal: this.signal, logger: this.logger }, this);
  }

  /**
   * Run `fn` with a token and release the source when `fn` settles, whether
   * it returns or throws.
   */
  static async scope<T>(
    fn: (token: StopToken) => T | PromiseLike<T>,
    options?: StopSourceOptions,
  ): Promise<T> {
    const source = new StopSource(options);
    try {
      return await fn(source.token());
    } finally {
      source.stop();
    }
  }

  get isStopped(): boolean {
    return this.signal.isTriggered;
  }

  /** The token created with the source. */
  get stopToken(): StopToken {
    return this.initial;
  }

  /** A new token for this source. */
  token(): StopToken {
    return this.initial.clone();
  }

  /**
   * Release the source: every token observes the stop. Calling it again does
   * nothing. Errors thrown by `onStop` callbacks surface here after every
   * party was woken.
   */
  stop(): void {
    if (this.signal.isTriggered) return;
    finalizer.unregister(this);
    const waiting = this.signal.waiting;
    this.signal.trigger();
    this.logger.debug(`stopped, woke ${waiting} waiting part${waiting === 1 ? 'y' : 'ies'}`);
  }
}
