/**
 * Semantic store wiring: backend selection plus the guarded wrapper every
 * engine component talks to.
 */

import Redis from 'ioredis';
import { ConversationFragment, DeleteResult, ScoredFragment, SemanticStore } from './types';
import { InMemorySemanticStore } from './in-memory-semantic-store';
import { RedisSemanticStore } from './redis-semantic-store';
import { StoreGuard } from '../resilience/store-guard';
import { logger } from '../observability/logger';

/** Routes every call through the StoreGuard (timeout, one retry, circuit breaker). */
export class GuardedSemanticStore implements SemanticStore {
  constructor(
    private readonly inner: SemanticStore,
    private readonly guard: StoreGuard,
  ) {}

  put(fragment: ConversationFragment): Promise<void> {
    return this.guard.run('semantic_store', 'put', () => this.inner.put(fragment));
  }

  getByCustomer(customerId: string, since: number | undefined, limit: number): Promise<ConversationFragment[]> {
    return this.guard.run('semantic_store', 'getByCustomer', () => this.inner.getByCustomer(customerId, since, limit));
  }

  nearestNeighbors(
    embedding: number[],
    customerId: string | undefined,
    k: number,
    minSimilarity: number,
  ): Promise<ScoredFragment[]> {
    return this.guard.run('semantic_store', 'nearestNeighbors', () =>
      this.inner.nearestNeighbors(embedding, customerId, k, minSimilarity),
    );
  }

  updateCustomerIdentity(fragmentId: string, newCustomerId: string): Promise<boolean> {
    return this.guard.run('semantic_store', 'updateCustomerIdentity', () =>
      this.inner.updateCustomerIdentity(fragmentId, newCustomerId),
    );
  }

  deleteOlderThan(cutoff: number): Promise<DeleteResult> {
    return this.guard.run('semantic_store', 'deleteOlderThan', () => this.inner.deleteOlderThan(cutoff));
  }

  deleteByCustomer(customerId: string): Promise<number> {
    return this.guard.run('semantic_store', 'deleteByCustomer', () => this.inner.deleteByCustomer(customerId));
  }
}

export function createSemanticStore(redis?: Redis, keyPrefix = 'cce:'): SemanticStore {
  if (redis) {
    logger.info('Semantic store: Redis-backed');
    return new RedisSemanticStore(redis, keyPrefix);
  }
  logger.info('Semantic store: In-memory');
  return new InMemorySemanticStore();
}
