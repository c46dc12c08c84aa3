/**
 * Cache layer types.
 *
 * Redis-backed with an in-memory stand-in. Values are JSON-serializable;
 * `get` hands back `unknown` and callers validate what they read.
 */

export interface CacheConfig {
  /** Default TTL in seconds */
  defaultTtlSeconds: number;
  /** Maximum entries in memory cache */
  maxEntries: number;
  /** Redis key prefix */
  keyPrefix: string;
}

export interface CacheStore {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
  del(key: string): Promise<void>;
}
