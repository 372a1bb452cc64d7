import Redis from 'ioredis';
import logger from './logger';

export interface KeyValueCache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  del(key: string): Promise<void>;
}

export class RedisCache implements KeyValueCache {
  constructor(private readonly redis: Redis) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds && ttlSeconds > 0) {
      await this.redis.set(key, value, 'EX', ttlSeconds);
      return;
    }
    await this.redis.set(key, value);
  }

  async del(key: string): Promise<void> {
    await this.redis.del(key);
  }
}

export const createRedisClient = (url: string): Redis => {
  const client = new Redis(url, {
    retryStrategy: (times) => Math.min(times * 50, 2000)
  });
  client.on('connect', () => {
    logger.info('[CACHE] Connected to Redis');
  });
  client.on('error', (error: Error) => {
    logger.error('[CACHE] Redis connection error', { error: error.message });
  });
  return client;
};

interface MemoryEntry {
  value: string;
  expiresAt: number | null;
}

/**
 * Process-local cache with the same expiry semantics as the Redis one.
 */
export class MemoryCache implements KeyValueCache {
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const expiresAt = ttlSeconds && ttlSeconds > 0 ? this.now() + ttlSeconds * 1000 : null;
    this.entries.set(key, { value, expiresAt });
  }

  async del(key: string): Promise<void> {
    this.entries.delete(key);
  }
}
