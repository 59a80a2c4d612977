// packages/core/src/config/defaults.ts

import type { RuntimeConfig } from '../types/config.js';
import { DEFAULT_CHANNEL_CAPACITY } from '../utils/constants.js';

export const DEFAULT_CONFIG: RuntimeConfig = {
  timer: 'system',
  scheduler: 'microtask',
  logLevel: 'warn',
  channelCapacity: DEFAULT_CHANNEL_CAPACITY,
};
