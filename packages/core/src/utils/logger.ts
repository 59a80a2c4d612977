// packages/core/src/utils/logger.ts

import type { LogLevel } from '../types/config.js';

export type { LogLevel };

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type EmitLevel = Exclude<LogLevel, 'silent'>;

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** Same threshold, with `scope` appended to the prefix. */
  child(scope: string): Logger;
}

export function createLogger(level: LogLevel = 'warn', scope?: string): Logger {
  const threshold = LOG_LEVELS[level];

  function log(msgLevel: EmitLevel, message: string, args: unknown[]): void {
    if (LOG_LEVELS[msgLevel] < threshold) return;
    const timestamp = new Date().toISOString();
    const tag = scope ? ` [${scope}]` : '';
    const prefix = `[${timestamp}] ${msgLevel.toUpperCase()}${tag}:`;
    const method = msgLevel === 'debug' ? 'log' : msgLevel;
    if (args.length > 0) {
      console[method](prefix, message, ...args);
    } else {
      console[method](prefix, message);
    }
  }

  return {
    level,
    debug: (message, ...args) => log('debug', message, args),
    info: (message, ...args) => log('info', message, args),
    warn: (message, ...args) => log('warn', message, args),
    error: (message, ...args) => log('error', message, args),
    child: (childScope) => createLogger(level, scope ? `${scope}:${childScope}` : childScope),
  };
}
