// packages/core/src/utils/constants.ts — Shared magic number constants

/** Default buffer size of a Channel */
export const DEFAULT_CHANNEL_CAPACITY = 16;

/** Capacity of the channel backing a stop signal; nothing is ever sent on it */
export const SIGNAL_CHANNEL_CAPACITY = 1;

/** Largest delay setTimeout accepts before it overflows and fires at once */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** Prefix of wait registration ids */
export const REGISTRATION_ID_PREFIX = 'reg';

/** Prefix of stop source ids */
export const SOURCE_ID_PREFIX = 'src';
