import { describe, it, expect } from 'vitest';
import { loadPoolConfig } from '../config.js';
import { PoolConfigError } from '../errors.js';

describe('loadPoolConfig', () => {
  it('returns the defaults for an empty environment', () => {
    expect(loadPoolConfig({})).toEqual({
      staleConnectionMs: 5_000,
      maxQueuedPerRelay: 10,
      reconcileIntervalMs: 30_000,
      networkPollIntervalMs: 5_000,
      logging: { level: 'info' },
    });
  });

  it('coerces numeric variables and reads the log level', () => {
    const config = loadPoolConfig({
      TETHER_STALE_CONNECTION_MS: '2500',
      TETHER_MAX_QUEUED_PER_RELAY: '3',
      TETHER_RECONCILE_INTERVAL_MS: '0',
      TETHER_NETWORK_POLL_MS: '1000',
      TETHER_LOG_LEVEL: 'debug',
    });

    expect(config).toEqual({
      staleConnectionMs: 2_500,
      maxQueuedPerRelay: 3,
      reconcileIntervalMs: 0,
      networkPollIntervalMs: 1_000,
      logging: { level: 'debug' },
    });
  });

  it('ignores unrelated variables', () => {
    expect(loadPoolConfig({ HOME: '/home/test', TETHER_MAX_QUEUED_PER_RELAY: '4' }).maxQueuedPerRelay).toBe(4);
  });

  it('throws PoolConfigError listing each invalid variable', () => {
    let caught: unknown;
    try {
      loadPoolConfig({ TETHER_MAX_QUEUED_PER_RELAY: 'lots', TETHER_LOG_LEVEL: 'loud' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(PoolConfigError);
    if (!(caught instanceof PoolConfigError)) return;
    expect(caught.issues).toHaveLength(2);
    expect(caught.issues[0]).toMatch(/^TETHER_MAX_QUEUED_PER_RELAY: /);
    expect(caught.issues[1]).toMatch(/^TETHER_LOG_LEVEL: /);
  });

  it('rejects a blank numeric variable instead of reading it as 0', () => {
    let caught: unknown;
    try {
      loadPoolConfig({ TETHER_MAX_QUEUED_PER_RELAY: '' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(PoolConfigError);
    if (!(caught instanceof PoolConfigError)) return;
    expect(caught.issues).toEqual(['TETHER_MAX_QUEUED_PER_RELAY: must not be empty']);
  });

  it('rejects a poll interval below 100ms', () => {
    expect(() => loadPoolConfig({ TETHER_NETWORK_POLL_MS: '10' })).toThrow(PoolConfigError);
  });
});
