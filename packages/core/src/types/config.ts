// packages/core/src/types/config.ts

export type TimerKind = 'system' | 'manual';

export type SchedulerKind = 'microtask' | 'macrotask';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface RuntimeConfig {
  timer: TimerKind;
  scheduler: SchedulerKind;
  logLevel: LogLevel;
  /** Default capacity of a Channel created without one. */
  channelCapacity: number;
}
