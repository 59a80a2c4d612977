// packages/core/src/signal/index.ts -- barrel re-export

export { CancellationSignal } from './cancellation-signal.js';
export type { SignalCheck } from './cancellation-signal.js';
export { Channel } from './channel.js';
export type { ChannelOptions } from './channel.js';
export { StopSource } from './stop-source.js';
export type { StopSourceOptions } from './stop-source.js';
export { StopToken } from './stop-token.js';
export { WaitRegistry } from './wait-registry.js';
export type { WaitRegistration } from './wait-registry.js';
