import { Redis } from 'ioredis';
import type { ConfigCategory, ResolvedConfig } from '@toolgate/core';
import { getNumber, getString } from '@toolgate/core';
import { BackendManager } from './backend-manager.js';

const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;

/** Redis client for the `cache.redis` category. */
export class RedisConnectionManager extends BackendManager<Redis> {
  readonly kind = 'cache';

  getConfigCategory(): ConfigCategory {
    return 'cache.redis';
  }

  protected override requiredKeys(): readonly string[] {
    return ['url'];
  }

  protected async connect(config: ResolvedConfig): Promise<Redis> {
    const client = new Redis(getString(config, 'url') ?? '', {
      lazyConnect: true,
      connectTimeout: getNumber(config, 'connectTimeoutMs') ?? DEFAULT_CONNECT_TIMEOUT_MS,
      keyPrefix: getString(config, 'keyPrefix'),
      // Fail fast instead of queueing commands while disconnected
      maxRetriesPerRequest: 1,
    });
    try {
      await client.connect();
    } catch (err) {
      client.disconnect();
      throw err;
    }
    return client;
  }

  protected async disconnect(client: Redis): Promise<void> {
    await client.quit();
  }
}
