// @stopline/core - Cooperative cancellation for promises and async iterables

export const VERSION = '0.1.0';

export * from './types/index.js';
export * from './utils/index.js';
export * from './config/index.js';
export * from './runtime/index.js';
export * from './signal/index.js';
export * from './deadline/index.js';
export * from './combinators/index.js';
