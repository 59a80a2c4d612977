// packages/core/src/signal/wait-registry.ts

import { EventEmitter } from 'eventemitter3';
import type { Waker } from '../types/poll.js';
import { REGISTRATION_ID_PREFIX } from '../utils/constants.js';
import { generateId } from '../utils/id.js';

interface WaitRegistryEvents {
  wake: (failures: unknown[]) => void;
}

/** One party waiting to be woken. Woken at most once. */
export interface WaitRegistration {
  readonly id: string;
  /** False once woken or cancelled. */
  readonly active: boolean;
  cancel(): void;
}

interface Entry {
  waker: Waker;
  listener: (failures: unknown[]) => void;
  holders: number;
  woken: boolean;
}

/**
 * Parties waiting for a state change. A waker registered several times is
 * woken once; it stays registered until every registration holding it is
 * cancelled.
 */
export class WaitRegistry {
  private readonly emitter = new EventEmitter<WaitRegistryEvents>();
  private readonly entries = new Map<Waker, Entry>();

  /** Distinct wakers currently registered. */
  get size(): number {
    return this.entries.size;
  }

  register(waker: Waker): WaitRegistration {
    const entry = this.entries.get(waker) ?? this.createEntry(waker);
    entry.holders += 1;

    let cancelled = false;
    let id: string | undefined;
    return {
      get id() {
        id ??= generateId(REGISTRATION_ID_PREFIX);
        return id;
      },
      get active() {
        return !cancelled && !entry.woken;
      },
      cancel: () => {
        if (cancelled || entry.woken) return;
        cancelled = true;
        entry.holders -= 1;
        if (entry.holders === 0) this.remove(entry);
      },
    };
  }

  /**
   * Wake every party registered at the time of the call, each exactly once.
   * Parties registering while this runs wait for the next call.
   * Returns what the wakers threw; every party is woken regardless.
   */
  wakeAll(): unknown[] {
    const failures: unknown[] = [];
    if (this.entries.size > 0) {
      this.emitter.emit('wake', failures);
    }
    return failures;
  }

  private createEntry(waker: Waker): Entry {
    const entry: Entry = {
      waker,
      holders: 0,
      woken: false,
      listener: (failures) => {
        // Removed by an earlier waker of the same round.
        if (entry.woken || this.entries.get(waker) !== entry) return;
        entry.woken = true;
        this.entries.delete(waker);
        try {
          waker();
        } catch (error) {
          failures.push(error);
        }
      },
    };
    this.entries.set(waker, entry);
    this.emitter.once('wake', entry.listener);
    return entry;
  }

  private remove(entry: Entry): void {
    this.entries.delete(entry.waker);
    this.emitter.off('wake', entry.listener);
  }
}
