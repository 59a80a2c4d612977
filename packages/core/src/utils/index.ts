// packages/core/src/utils/index.ts -- barrel re-export

export { generateId } from './id.js';
export {
  CancellationError,
  ConfigError,
  ChannelClosedError,
  InvariantError,
  invariant,
  throwCollected,
} from './errors.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
export { sleep } from './sleep.js';
export type { SleepOptions } from './sleep.js';
export {
  DEFAULT_CHANNEL_CAPACITY,
  SIGNAL_CHANNEL_CAPACITY,
  MAX_TIMEOUT_MS,
} from './constants.js';
