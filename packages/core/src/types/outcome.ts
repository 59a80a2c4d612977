// packages/core/src/types/outcome.ts

export interface Completed<T> {
  status: 'completed';
  value: T;
}

export interface Cancelled {
  status: 'cancelled';
}

/** Result of racing an operation against a stop signal. Exactly one per race. */
export type Outcome<T> = Completed<T> | Cancelled;

export const CANCELLED: Cancelled = Object.freeze({ status: 'cancelled' });

export function completed<T>(value: T): Completed<T> {
  return { status: 'completed', value };
}

export function isCancelled<T>(outcome: Outcome<T>): outcome is Cancelled {
  return outcome.status === 'cancelled';
}
