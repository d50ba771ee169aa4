/**
 * backend/src/shared/cache/redis-cache.ts
 *
 * WHY:
 * - Redis implementation of Cache: session envelopes and the view refresh lock.
 *
 * IMPORTANT:
 * - The client type is derived from createClient() instead of importing RedisClientType,
 *   which conflicts when several copies of @redis/client are installed.
 * - Connection errors are client-level events with no request around them:
 *   they go to the global logger.
 */

import { createClient } from 'redis';

import { logger } from '../logger/logger';
import type { Cache, CacheSetOptions } from './cache';

type RedisClient = ReturnType<typeof createClient>;

const DEL_IF_EQUALS_SCRIPT = `if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0`;

export class RedisCache implements Cache {
  private constructor(private readonly client: RedisClient) {}

  static async connect(redisUrl: string): Promise<RedisCache> {
    const client = createClient({ url: redisUrl });

    client.on('error', (err: Error) => {
      logger.error('redis.client_error', { flow: 'redis', message: err.message, stack: err.stack });
    });

    await client.connect();
    logger.info('redis.connected', { flow: 'redis' });

    return new RedisCache(client);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    if (opts?.ttlSeconds) {
      await this.client.set(key, value, { EX: opts.ttlSeconds });
    } else {
      await this.client.set(key, value);
    }
  }

  async del(key: string): Promise<void> {
    await this.client.del(key);
  }

  async setIfAbsent(key: string, value: string, opts: { ttlSeconds: number }): Promise<boolean> {
    // One round trip: SET key value NX EX ttl answers OK or nil.
    const reply = await this.client.set(key, value, { NX: true, EX: opts.ttlSeconds });
    return reply === 'OK';
  }

  async delIfEquals(key: string, expected: string): Promise<boolean> {
    const reply = await this.client.eval(DEL_IF_EQUALS_SCRIPT, {
      keys: [key],
      arguments: [expected],
    });
    return reply === 1;
  }
}
