import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Logger } from '@toolgate/core';
import { StaticConfigProvider } from '@toolgate/core';
import { ConnectionError, RedisConnectionManager } from '../src/index.js';

const constructed: Array<{ url: string; options: Record<string, unknown> }> = [];
let connectError: Error | null = null;

vi.mock('ioredis', () => {
  return {
    Redis: class MockRedis {
      status = 'wait';
      constructor(url: string, options: Record<string, unknown>) {
        constructed.push({ url, options });
      }
      connect = vi.fn(async () => {
        if (connectError) throw connectError;
        this.status = 'ready';
      });
      disconnect = vi.fn(() => {
        this.status = 'end';
      });
      quit = vi.fn(async () => {
        this.status = 'end';
        return 'OK';
      });
    },
  };
});

function createLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('RedisConnectionManager', () => {
  beforeEach(() => {
    constructed.length = 0;
    connectError = null;
  });

  function createManager(redis: Record<string, unknown>) {
    return new RedisConnectionManager({
      config: new StaticConfigProvider({ cache: { redis } }),
      logger: createLogger(),
    });
  }

  it('connects lazily with the configured options', async () => {
    const manager = createManager({ url: 'redis://localhost:6379', keyPrefix: 'tg:' });
    expect(constructed).toHaveLength(0);

    const client = await manager.getClient();

    expect(client.status).toBe('ready');
    expect(constructed).toEqual([
      {
        url: 'redis://localhost:6379',
        options: { lazyConnect: true, connectTimeout: 5000, keyPrefix: 'tg:', maxRetriesPerRequest: 1 },
      },
    ]);
  });

  it('requires a url', async () => {
    const manager = createManager({ keyPrefix: 'tg:' });
    await expect(manager.getClient()).rejects.toThrow(
      'Missing required configuration for "cache.redis": url',
    );
    expect(constructed).toHaveLength(0);
  });

  it('wraps a refused connection and drops the half-open client', async () => {
    connectError = new Error('connect ECONNREFUSED 127.0.0.1:6379');
    const manager = createManager({ url: 'redis://localhost:6379' });

    await expect(manager.getClient()).rejects.toBeInstanceOf(ConnectionError);
    expect(manager.isConnected()).toBe(false);
  });

  it('quits the client on closeAll()', async () => {
    const manager = createManager({ url: 'redis://localhost:6379' });
    const client = await manager.getClient();

    await manager.closeAll();

    expect(client.quit).toHaveBeenCalledTimes(1);
    expect(client.status).toBe('end');
    expect(manager.isConnected()).toBe(false);
  });
});
