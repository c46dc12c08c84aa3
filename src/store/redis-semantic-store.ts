/**
 * Redis-backed semantic store.
 *
 * Layout (all keys under the configured prefix):
 *   frag:<id>            fragment JSON
 *   frags:cust:<cid>     sorted set, score = timestamp ms, member = fragment id
 *   frags:all            sorted set over every fragment, for age-based cleanup
 *
 * Similarity search is brute force over the candidate set, which is the
 * customer's fragments in the common case.
 */

import Redis from 'ioredis';
import { ConversationFragment, DeleteResult, ScoredFragment, SemanticStore } from './types';
import { decodeFragment } from './fragment-records';
import { cosineSimilarity } from './vector-math';
import { MalformedRecordError } from '../errors/errors';
import { logger } from '../observability/logger';
import { malformedRecords } from '../observability/metrics';

const MGET_CHUNK = 500;

export class RedisSemanticStore implements SemanticStore {
  private readonly log = logger.child({ component: 'semantic-store-redis' });

  constructor(
    private readonly redis: Redis,
    private readonly prefix: string,
  ) {}

  private fragmentKey(id: string): string {
    return `${this.prefix}frag:${id}`;
  }

  private customerKey(customerId: string): string {
    return `${this.prefix}frags:cust:${customerId}`;
  }

  private get allKey(): string {
    return `${this.prefix}frags:all`;
  }

  async put(fragment: ConversationFragment): Promise<void> {
    const score = Date.parse(fragment.timestamp);
    if (Number.isNaN(score)) {
      throw new MalformedRecordError(fragment.id, `unparseable timestamp "${fragment.timestamp}"`);
    }
    await this.redis
      .multi()
      .set(this.fragmentKey(fragment.id), JSON.stringify(fragment))
      .zadd(this.customerKey(fragment.customerId), score, fragment.id)
      .zadd(this.allKey, score, fragment.id)
      .exec();
  }

  async getByCustomer(customerId: string, since: number | undefined, limit: number): Promise<ConversationFragment[]> {
    const ids = await this.redis.zrevrangebyscore(
      this.customerKey(customerId),
      '+inf',
      since === undefined ? '-inf' : since,
      'LIMIT',
      0,
      limit,
    );
    return this.loadMany(ids);
  }

  async nearestNeighbors(
    embedding: number[],
    customerId: string | undefined,
    k: number,
    minSimilarity: number,
  ): Promise<ScoredFragment[]> {
    const key = customerId === undefined ? this.allKey : this.customerKey(customerId);
    const ids = await this.redis.zrevrange(key, 0, -1);
    const fragments = await this.loadMany(ids);

    return fragments
      .map((fragment) => ({ fragment, similarity: cosineSimilarity(embedding, fragment.embedding) }))
      .filter((s) => s.similarity >= minSimilarity)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, k);
  }

  async updateCustomerIdentity(fragmentId: string, newCustomerId: string): Promise<boolean> {
    const raw = await this.redis.get(this.fragmentKey(fragmentId));
    if (!raw) return false;

    const fragment = decodeFragment(raw, fragmentId);
    if (fragment.customerId === newCustomerId) return true;

    const score = Date.parse(fragment.timestamp);
    await this.redis
      .multi()
      .set(this.fragmentKey(fragmentId), JSON.stringify({ ...fragment, customerId: newCustomerId }))
      .zrem(this.customerKey(fragment.customerId), fragmentId)
      .zadd(this.customerKey(newCustomerId), Number.isNaN(score) ? 0 : score, fragmentId)
      .exec();
    return true;
  }

  async deleteOlderThan(cutoff: number): Promise<DeleteResult> {
    const ids = await this.redis.zrangebyscore(this.allKey, '-inf', `(${cutoff}`);
    if (ids.length === 0) return { count: 0, customerIds: [] };

    const owners = await this.ownersOf(ids);
    const tx = this.redis.multi();
    for (const id of ids) {
      tx.del(this.fragmentKey(id));
      tx.zrem(this.allKey, id);
      const owner = owners.get(id);
      if (owner) tx.zrem(this.customerKey(owner), id);
    }
    await tx.exec();

    this.log.info({ count: ids.length, cutoff: new Date(cutoff).toISOString() }, 'Deleted old fragments');
    return { count: ids.length, customerIds: [...new Set(owners.values())] };
  }

  async deleteByCustomer(customerId: string): Promise<number> {
    const ids = await this.redis.zrange(this.customerKey(customerId), 0, -1);
    const tx = this.redis.multi();
    for (const id of ids) {
      tx.del(this.fragmentKey(id));
      tx.zrem(this.allKey, id);
    }
    tx.del(this.customerKey(customerId));
    await tx.exec();
    return ids.length;
  }

  /** Load fragments in id order, skipping missing and malformed records */
  private async loadMany(ids: string[]): Promise<ConversationFragment[]> {
    const fragments: ConversationFragment[] = [];
    for (let i = 0; i < ids.length; i += MGET_CHUNK) {
      const chunk = ids.slice(i, i + MGET_CHUNK);
      const raws = await this.redis.mget(...chunk.map((id) => this.fragmentKey(id)));
      raws.forEach((raw, idx) => {
        if (!raw) return;
        try {
          fragments.push(decodeFragment(raw, chunk[idx]));
        } catch (err) {
          if (!(err instanceof MalformedRecordError)) throw err;
          malformedRecords.inc({ source: 'redis-semantic-store' });
          this.log.warn({ fragmentId: chunk[idx], reason: err.reason }, 'Skipping malformed fragment');
        }
      });
    }
    return fragments;
  }

  private async ownersOf(ids: string[]): Promise<Map<string, string>> {
    const owners = new Map<string, string>();
    for (const fragment of await this.loadMany(ids)) {
      owners.set(fragment.id, fragment.customerId);
    }
    return owners;
  }
}
