import { Redis, type RedisOptions } from 'ioredis';
import { KeyValueClient } from './KeyValueClient';
import LibLogger from '../logger';

const logger = LibLogger.get('RedisKeyValueClient');

/**
 * Options for connections opened by {@link createRedisKeyValueClient}.
 * Commands fail fast while the connection is down, so the cache degrades
 * to misses instead of queueing requests.
 */
const DEFAULT_REDIS_OPTIONS: RedisOptions = {
  enableOfflineQueue: false,
  maxRetriesPerRequest: 1,
  lazyConnect: false
};

export class RedisKeyValueClient implements KeyValueClient {
  public constructor(private readonly redis: Redis) {}

  public async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  public async set(key: string, value: string, ttlMs: number): Promise<void> {
    await this.redis.set(key, value, 'PX', Math.max(1, Math.ceil(ttlMs)));
  }

  public async expire(key: string, ttlMs: number): Promise<boolean> {
    const updated = await this.redis.pexpire(key, Math.max(1, Math.ceil(ttlMs)));
    return updated === 1;
  }

  public async ttl(key: string): Promise<number | null> {
    // -2: no such key, -1: no expiry
    const remaining = await this.redis.pttl(key);
    return remaining >= 0 ? remaining : null;
  }

  public async delete(key: string): Promise<void> {
    await this.redis.del(key);
  }

  public async close(): Promise<void> {
    await this.redis.quit();
  }
}

export const createRedisKeyValueClient = (
  connectionString: string,
  options: RedisOptions = {}
): RedisKeyValueClient => {
  const redis = new Redis(connectionString, { ...DEFAULT_REDIS_OPTIONS, ...options });
  redis.on('error', (error: Error) => {
    logger.error('Redis connection error', { error: error.message });
  });
  logger.debug('Created Redis client for distributed cache');
  return new RedisKeyValueClient(redis);
};
