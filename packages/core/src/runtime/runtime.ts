// packages/core/src/runtime/runtime.ts — Timer, scheduler and logger chosen by config

import { loadConfig } from '../config/loader.js';
import type { RuntimeConfigInput } from '../config/schema.js';
import { validateConfig } from '../config/schema.js';
import type { RuntimeConfig } from '../types/config.js';
import type { Logger } from '../utils/logger.js';
import { createLogger } from '../utils/logger.js';
import type { Scheduler } from './scheduler.js';
import { createScheduler } from './scheduler.js';
import type { Timer } from './timer.js';
import { createTimer } from './timer.js';

export interface Runtime {
  readonly config: RuntimeConfig;
  readonly timer: Timer;
  readonly scheduler: Scheduler;
  readonly logger: Logger;
}

/** Backends injected directly instead of picked from the config. */
export interface RuntimeOverrides {
  timer?: Timer;
  scheduler?: Scheduler;
  logger?: Logger;
}

export function createRuntime(input: RuntimeConfigInput = {}, overrides?: RuntimeOverrides): Runtime {
  const config = validateConfig(input);
  return {
    config,
    timer: overrides?.timer ?? createTimer(config.timer),
    scheduler: overrides?.scheduler ?? createScheduler(config.scheduler),
    logger: overrides?.logger ?? createLogger(config.logLevel, 'stopline'),
  };
}

let defaultRuntime: Runtime | undefined;

/** Process-wide runtime, built from STOPLINE_* environment variables on first use. */
export function getDefaultRuntime(): Runtime {
  defaultRuntime ??= createRuntime(loadConfig());
  return defaultRuntime;
}

/** Replace the process-wide runtime. `undefined` resets it to the environment default. */
export function setDefaultRuntime(runtime: Runtime | undefined): void {
  defaultRuntime = runtime;
}
