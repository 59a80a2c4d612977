import { describe, expect, it, vi } from 'vitest';
import { StopSource } from '../../../src/signal/stop-source.js';
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

describe('StopSource', () => {
  it('starts with an unstopped initial token', () => {
    const source = new StopSource();
    expect(source.isStopped).toBe(false);
    expect(source.stopToken.isStopped).toBe(false);
    expect(source.id).toMatch(/^src_/);
  });

  it('stops every token it produced', () => {
    const source = new StopSource();
    const tokens = [source.token(), source.token(), source.stopToken];
    source.stop();

    expect(source.isStopped).toBe(true);
    expect(tokens.map((token) => token.isStopped)).toEqual([true, true, true]);
  });

  it('hands out already stopped tokens after the stop', () => {
    const source = new StopSource();
    source.stop();
    expect(source.token().isStopped).toBe(true);
  });

  it('stop() is idempotent', () => {
    const source = new StopSource();
    const callback = vi.fn();
    source.token().onStop(callback);

    source.stop();
    source.stop();
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('surfaces a failing onStop callback after waking the others', () => {
    const source = new StopSource();
    const other = vi.fn();
    source.token().onStop(() => {
      throw new Error('callback error');
    });
    source.token().onStop(other);

    expect(() => source.stop()).toThrow('callback error');
    expect(other).toHaveBeenCalledTimes(1);
    expect(source.isStopped).toBe(true);
    expect(() => source.stop()).not.toThrow();
  });

  it('logs how many parties were woken', () => {
    const logger = createFakeLogger();
    const source = new StopSource({ logger });
    source.token().onStop(() => {});
    source.token().onStop(() => {});

    source.stop();
    expect(logger.debug).toHaveBeenCalledWith('stopped, woke 2 waiting parties');
  });

  describe('scope()', () => {
    it('returns the result and stops the token afterwards', async () => {
      let seen: boolean | undefined;
      let captured: { isStopped: boolean } | undefined;

      const result = await StopSource.scope(async (token) => {
        seen = token.isStopped;
        captured = token;
        return 42;
      });

      expect(result).toBe(42);
      expect(seen).toBe(false);
      expect(captured?.isStopped).toBe(true);
    });

    it('stops the token when the body throws', async () => {
      let captured: { isStopped: boolean } | undefined;

      await expect(
        StopSource.scope((token) => {
          captured = token;
          throw new Error('body failed');
        }),
      ).rejects.toThrow('body failed');
      expect(captured?.isStopped).toBe(true);
    });
  });
});
