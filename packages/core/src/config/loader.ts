// packages/core/src/config/loader.ts

import type { RuntimeConfig } from '../types/config.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './schema.js';

const ENV_PREFIX = 'STOPLINE_';

type Env = Record<string, string | undefined>;

function readEnv(env: Env): Partial<Record<keyof RuntimeConfig, unknown>> {
  const fromEnv: Partial<Record<keyof RuntimeConfig, unknown>> = {};
  const timer = env[`${ENV_PREFIX}TIMER`];
  const scheduler = env[`${ENV_PREFIX}SCHEDULER`];
  const logLevel = env[`${ENV_PREFIX}LOG_LEVEL`];
  const capacity = env[`${ENV_PREFIX}CHANNEL_CAPACITY`];

  if (timer) fromEnv.timer = timer;
  if (scheduler) fromEnv.scheduler = scheduler;
  if (logLevel) fromEnv.logLevel = logLevel.toLowerCase();
  if (capacity) {
    const parsed = Number(capacity);
    if (Number.isNaN(parsed)) {
      throw new ConfigError(
        `${ENV_PREFIX}CHANNEL_CAPACITY must be a number, got "${capacity}"`,
        'channelCapacity',
      );
    }
    fromEnv.channelCapacity = parsed;
  }
  return fromEnv;
}

/**
 * Load runtime config with precedence: overrides > environment > defaults.
 *
 * 1. Start with hardcoded defaults
 * 2. Merge STOPLINE_* environment variables on top
 * 3. Merge programmatic overrides on top
 * 4. Validate the final result
 */
export function loadConfig(options?: {
  env?: Env;
  overrides?: Partial<RuntimeConfig>;
}): RuntimeConfig {
  const env = options?.env ?? process.env;
  const merged = {
    ...DEFAULT_CONFIG,
    ...readEnv(env),
    ...options?.overrides,
  };
  return validateConfig(merged);
}
