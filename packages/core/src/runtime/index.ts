// packages/core/src/runtime/index.ts -- barrel re-export

export { drive, driveStream } from './driver.js';
export type { StreamIterator } from './driver.js';
export { createRuntime, getDefaultRuntime, setDefaultRuntime } from './runtime.js';
export type { Runtime, RuntimeOverrides } from './runtime.js';
export { createScheduler, microtaskScheduler, macrotaskScheduler } from './scheduler.js';
export type { Scheduler } from './scheduler.js';
export { createTimer, ManualTimer, SystemTimer } from './timer.js';
export type { ScheduledWake, Timer } from './timer.js';
