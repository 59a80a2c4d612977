import { describe, expect, it, vi } from 'vitest';
import { WaitRegistry } from '../../../src/signal/wait-registry.js';

describe('WaitRegistry', () => {
  it('wakes every registered waker once', () => {
    const registry = new WaitRegistry();
    const first = vi.fn();
    const second = vi.fn();
    registry.register(first);
    registry.register(second);

    expect(registry.wakeAll()).toEqual([]);
    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledTimes(1);
    expect(registry.size).toBe(0);

    registry.wakeAll();
    expect(first).toHaveBeenCalledTimes(1);
  });

  it('gives registrations a reg_ prefixed id', () => {
    const registry = new WaitRegistry();
    const registration = registry.register(() => {});
    expect(registration.id).toMatch(/^reg_/);
    expect(registration.active).toBe(true);
  });

  it('keeps one id per registration', () => {
    const registry = new WaitRegistry();
    const first = registry.register(() => {});
    const second = registry.register(() => {});
    expect(first.id).toBe(first.id);
    expect(first.id).not.toBe(second.id);
  });

  it('wakes a waker registered twice only once', () => {
    const registry = new WaitRegistry();
    const waker = vi.fn();
    registry.register(waker);
    registry.register(waker);
    expect(registry.size).toBe(1);

    registry.wakeAll();
    expect(waker).toHaveBeenCalledTimes(1);
  });

  it('keeps a shared waker until every registration is cancelled', () => {
    const registry = new WaitRegistry();
    const waker = vi.fn();
    const a = registry.register(waker);
    const b = registry.register(waker);

    a.cancel();
    expect(a.active).toBe(false);
    expect(b.active).toBe(true);
    expect(registry.size).toBe(1);

    registry.wakeAll();
    expect(waker).toHaveBeenCalledTimes(1);
    expect(b.active).toBe(false);
  });

  it('does not wake cancelled registrations', () => {
    const registry = new WaitRegistry();
    const waker = vi.fn();
    const registration = registry.register(waker);
    registration.cancel();
    registration.cancel();

    expect(registry.size).toBe(0);
    registry.wakeAll();
    expect(waker).not.toHaveBeenCalled();
  });

  it('leaves wakers registered during a round for the next round', () => {
    const registry = new WaitRegistry();
    const late = vi.fn();
    registry.register(() => {
      registry.register(late);
    });

    registry.wakeAll();
    expect(late).not.toHaveBeenCalled();
    expect(registry.size).toBe(1);

    registry.wakeAll();
    expect(late).toHaveBeenCalledTimes(1);
  });

  it('skips a waker cancelled by an earlier waker of the same round', () => {
    const registry = new WaitRegistry();
    const victim = vi.fn();
    let cancelVictim = (): void => {};
    registry.register(() => cancelVictim());
    const victimRegistration = registry.register(victim);
    cancelVictim = () => victimRegistration.cancel();

    registry.wakeAll();
    expect(victim).not.toHaveBeenCalled();
  });

  it('collects waker failures and still wakes the rest', () => {
    const registry = new WaitRegistry();
    const failure = new Error('waker failed');
    const after = vi.fn();
    registry.register(() => {
      throw failure;
    });
    registry.register(after);

    expect(registry.wakeAll()).toEqual([failure]);
    expect(after).toHaveBeenCalledTimes(1);
  });
});
