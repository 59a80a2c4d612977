// packages/core/src/utils/sleep.ts — Shared async delay utility

import { until } from '../combinators/until.js';
import { Deadline } from '../deadline/deadline.js';
import { drive } from '../runtime/driver.js';
import type { Scheduler } from '../runtime/scheduler.js';
import type { Timer } from '../runtime/timer.js';
import type { StopToken } from '../signal/stop-token.js';

export interface SleepOptions {
  /** Wake early when this token stops. */
  token?: StopToken;
  timer?: Timer;
  scheduler?: Scheduler;
}

/**
 * Promise-based delay on the runtime timer.
 * Returns true if the delay elapsed, false if the token stopped first.
 */
export async function sleep(ms: number, options: SleepOptions = {}): Promise<boolean> {
  const delay = Deadline.after(ms, options.timer);
  if (!options.token) {
    await drive(delay, options.scheduler);
    return true;
  }
  try {
    const outcome = await until(delay, options.token, options);
    return outcome.status === 'completed';
  } finally {
    delay.dispose();
  }
}
