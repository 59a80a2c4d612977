import { describe, expect, it } from 'vitest';
import { loadConfig } from '../../../src/config/loader.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('loadConfig', () => {
  it('returns defaults with an empty environment', () => {
    expect(loadConfig({ env: {} })).toEqual({
      timer: 'system',
      scheduler: 'microtask',
      logLevel: 'warn',
      channelCapacity: 16,
    });
  });

  it('reads STOPLINE_* variables', () => {
    const config = loadConfig({
      env: {
        STOPLINE_TIMER: 'manual',
        STOPLINE_SCHEDULER: 'macrotask',
        STOPLINE_LOG_LEVEL: 'DEBUG',
        STOPLINE_CHANNEL_CAPACITY: '8',
      },
    });
    expect(config).toEqual({
      timer: 'manual',
      scheduler: 'macrotask',
      logLevel: 'debug',
      channelCapacity: 8,
    });
  });

  it('lets overrides win over the environment', () => {
    const config = loadConfig({
      env: { STOPLINE_LOG_LEVEL: 'info' },
      overrides: { logLevel: 'error' },
    });
    expect(config.logLevel).toBe('error');
  });

  it('rejects a non-numeric capacity', () => {
    expect(() => loadConfig({ env: { STOPLINE_CHANNEL_CAPACITY: 'lots' } })).toThrow(ConfigError);
  });

  it('rejects an unknown timer backend', () => {
    expect(() => loadConfig({ env: { STOPLINE_TIMER: 'hardware' } })).toThrow(
      /Invalid configuration: timer:/,
    );
  });
});
