// packages/core/src/config/schema.ts

import { z } from 'zod';
import type { RuntimeConfig } from '../types/config.js';
import { DEFAULT_CHANNEL_CAPACITY } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

export const timerKindSchema = z.enum(['system', 'manual']);

export const schedulerKindSchema = z.enum(['microtask', 'macrotask']);

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const runtimeConfigSchema = z
  .object({
    timer: timerKindSchema.default('system'),
    scheduler: schedulerKindSchema.default('microtask'),
    logLevel: logLevelSchema.default('warn'),
    channelCapacity: z.number().int().positive().default(DEFAULT_CHANNEL_CAPACITY),
  })
  .strict();

export type RuntimeConfigInput = z.input<typeof runtimeConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input,
 * naming the first offending field.
 */
export function validateConfig(config: unknown): RuntimeConfig {
  const result = runtimeConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    const field = result.error.issues[0]?.path.join('.');
    throw new ConfigError(`Invalid configuration: ${issues}`, field || undefined);
  }
  return result.data;
}
