/**
 * Cache Service
 *
 * Redis-backed with in-memory fallback. Both backends store JSON text, so a
 * reader never shares object identity with the writer.
 */

import Redis from 'ioredis';
import { CacheConfig, CacheStore } from './types';
import { logger } from '../observability/logger';

const DEFAULT_CONFIG: CacheConfig = {
  defaultTtlSeconds: 3600,
  maxEntries: 10_000,
  keyPrefix: 'cce:cache:',
};

// ───── Redis Implementation ─────────────────────────────────────

class RedisCacheStore implements CacheStore {
  private readonly log = logger.child({ component: 'cache-redis' });

  constructor(
    private readonly redis: Redis,
    private readonly config: CacheConfig,
  ) {}

  async get(key: string): Promise<unknown> {
    try {
      const raw = await this.redis.get(this.prefixKey(key));
      if (!raw) return null;
      const value: unknown = JSON.parse(raw);
      return value;
    } catch (err) {
      this.log.warn({ err, key }, 'Cache get error');
      return null;
    }
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    const ttl = ttlSeconds ?? this.config.defaultTtlSeconds;
    try {
      await this.redis.setex(this.prefixKey(key), ttl, JSON.stringify(value));
    } catch (err) {
      this.log.warn({ err, key }, 'Cache set error');
    }
  }

  async del(key: string): Promise<void> {
    try {
      await this.redis.del(this.prefixKey(key));
    } catch (err) {
      this.log.warn({ err, key }, 'Cache del error');
    }
  }

  private prefixKey(key: string): string {
    return `${this.config.keyPrefix}${key}`;
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

interface MemoryEntry {
  json: string;
  expiresAt: number;
}

export class InMemoryCacheStore implements CacheStore {
  private readonly store = new Map<string, MemoryEntry>();
  private readonly sweeper: NodeJS.Timeout;

  constructor(
    private readonly config: CacheConfig = DEFAULT_CONFIG,
    private readonly now: () => number = Date.now,
  ) {
    // Periodic cleanup every 60s
    this.sweeper = setInterval(() => this.evict(), 60_000);
    this.sweeper.unref();
  }

  async get(key: string): Promise<unknown> {
    const entry = this.store.get(key);
    if (!entry || this.now() >= entry.expiresAt) {
      if (entry) this.store.delete(key);
      return null;
    }
    const value: unknown = JSON.parse(entry.json);
    return value;
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    // Evict if at capacity
    if (this.store.size >= this.config.maxEntries && !this.store.has(key)) {
      this.evict();
      // If still at capacity, remove oldest
      if (this.store.size >= this.config.maxEntries) {
        const firstKey = this.store.keys().next().value;
        if (firstKey !== undefined) this.store.delete(firstKey);
      }
    }
    const ttl = ttlSeconds ?? this.config.defaultTtlSeconds;
    this.store.set(key, { json: JSON.stringify(value), expiresAt: this.now() + ttl * 1000 });
  }

  async del(key: string): Promise<void> {
    this.store.delete(key);
  }

  /** Stop the background sweeper */
  close(): void {
    clearInterval(this.sweeper);
  }

  private evict(): void {
    const now = this.now();
    for (const [key, entry] of this.store) {
      if (now >= entry.expiresAt) this.store.delete(key);
    }
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createCacheStore(redis?: Redis, config?: Partial<CacheConfig>): CacheStore {
  const merged = { ...DEFAULT_CONFIG, ...config };
  if (redis) {
    logger.info('Cache store: Redis-backed');
    return new RedisCacheStore(redis, merged);
  }
  logger.info('Cache store: In-memory');
  return new InMemoryCacheStore(merged);
}
