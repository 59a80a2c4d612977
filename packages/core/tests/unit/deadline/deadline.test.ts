import { afterEach, describe, expect, it, vi } from 'vitest';
import { Deadline, toDeadline } from '../../../src/deadline/deadline.js';
import { createRuntime, setDefaultRuntime } from '../../../src/runtime/runtime.js';
import { ManualTimer } from '../../../src/runtime/timer.js';
import { StopSource } from '../../../src/signal/stop-source.js';
import { InvariantError } from '../../../src/utils/errors.js';
import type { Logger } from '../../../src/utils/logger.js';

function createFakeLogger(): Logger {
  const logger: Logger = {
    level: 'debug',
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

describe('Deadline', () => {
  afterEach(() => {
    setDefaultRuntime(undefined);
  });

  it('becomes ready exactly when its duration has passed', () => {
    const timer = new ManualTimer();
    const deadline = Deadline.after(100, timer);
    const waker = vi.fn();

    expect(deadline.at).toBe(100);
    expect(deadline.poll(waker)).toEqual({ ready: false });

    timer.advance(99);
    expect(waker).not.toHaveBeenCalled();
    expect(deadline.isElapsed).toBe(false);

    timer.advance(1);
    expect(waker).toHaveBeenCalledTimes(1);
    expect(deadline.poll(waker)).toEqual({ ready: true, value: undefined });
    expect(deadline.isElapsed).toBe(true);
  });

  it('anchors durations to the timer clock', () => {
    const timer = new ManualTimer(1_000);
    expect(Deadline.after(250, timer).at).toBe(1_250);
  });

  it('takes Date instants as they are', () => {
    const timer = new ManualTimer();
    const instant = new Date(5_000);
    expect(Deadline.at(instant, timer).at).toBe(5_000);
  });

  it('rejects invalid durations and instants', () => {
    const timer = new ManualTimer();
    expect(() => Deadline.after(-1, timer)).toThrow(RangeError);
    expect(() => Deadline.after(Number.NaN, timer)).toThrow(RangeError);
    expect(() => Deadline.after(Number.POSITIVE_INFINITY, timer)).toThrow(RangeError);
    expect(() => Deadline.at(new Date('not a date'), timer)).toThrow(RangeError);
  });

  it('schedules its wake lazily and releases it once elapsed', () => {
    const timer = new ManualTimer();
    const deadline = Deadline.after(10, timer);
    expect(timer.pendingCount).toBe(0);

    deadline.poll(() => {});
    expect(timer.pendingCount).toBe(1);

    timer.advance(10);
    deadline.poll(() => {});
    expect(timer.pendingCount).toBe(0);
  });

  it('logs once when it schedules its wake', () => {
    const logger = createFakeLogger();
    setDefaultRuntime(createRuntime({}, { logger }));
    const timer = new ManualTimer(5);
    const deadline = Deadline.after(10, timer);

    deadline.poll(() => {});
    deadline.poll(() => {});
    expect(logger.debug).toHaveBeenCalledTimes(1);
    expect(logger.debug).toHaveBeenCalledWith('wake scheduled at 15');
  });

  it('dispose() cancels the scheduled wake', () => {
    const timer = new ManualTimer();
    const deadline = Deadline.after(10, timer);
    deadline.poll(() => {});

    deadline.dispose();
    deadline.dispose();
    expect(timer.pendingCount).toBe(0);
    expect(() => deadline.poll(() => {})).toThrow(InvariantError);
  });

  it('follows a token', () => {
    const source = new StopSource();
    const deadline = Deadline.fromToken(source.token(), new ManualTimer());
    const waker = vi.fn();

    expect(deadline.at).toBeUndefined();
    expect(deadline.poll(waker)).toEqual({ ready: false });

    source.stop();
    expect(waker).toHaveBeenCalledTimes(1);
    expect(deadline.poll(waker)).toEqual({ ready: true, value: undefined });
  });

  describe('clone()', () => {
    it('re-anchors a duration deadline to now', () => {
      const timer = new ManualTimer();
      const deadline = Deadline.after(100, timer);
      timer.advance(40);
      expect(deadline.clone().at).toBe(140);
    });

    it('keeps an instant deadline as it is', () => {
      const timer = new ManualTimer();
      const deadline = Deadline.at(300, timer);
      timer.advance(40);
      expect(deadline.clone().at).toBe(300);
    });

    it('gives a token deadline its own registration', () => {
      const source = new StopSource();
      const deadline = Deadline.fromToken(source.token(), new ManualTimer());
      const copy = deadline.clone();
      const first = vi.fn();
      const second = vi.fn();
      deadline.poll(first);
      copy.poll(second);

      deadline.dispose();
      source.stop();
      expect(first).not.toHaveBeenCalled();
      expect(second).toHaveBeenCalledTimes(1);
    });
  });
});

describe('toDeadline', () => {
  it('converts durations, instants and tokens', () => {
    const timer = new ManualTimer(10);
    const source = new StopSource();

    expect(toDeadline(50, timer).at).toBe(60);
    expect(toDeadline(new Date(70), timer).at).toBe(70);
    expect(toDeadline(source.token(), timer).at).toBeUndefined();
  });

  it('passes a deadline through', () => {
    const deadline = Deadline.after(5, new ManualTimer());
    expect(toDeadline(deadline)).toBe(deadline);
  });

  it('leaves the caller token registration alone', () => {
    const source = new StopSource();
    const token = source.token();
    const waker = vi.fn();
    token.poll(waker);

    const deadline = toDeadline(token, new ManualTimer());
    deadline.poll(() => {});
    deadline.dispose();

    source.stop();
    expect(waker).toHaveBeenCalledTimes(1);
  });
});
