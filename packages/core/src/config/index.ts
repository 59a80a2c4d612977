// packages/core/src/config/index.ts -- barrel re-export

export { DEFAULT_CONFIG } from './defaults.js';
export {
  runtimeConfigSchema,
  timerKindSchema,
  schedulerKindSchema,
  logLevelSchema,
  validateConfig,
} from './schema.js';
export type { RuntimeConfigInput } from './schema.js';
export { loadConfig } from './loader.js';
