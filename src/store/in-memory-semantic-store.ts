/**
 * In-Memory Semantic Store: brute-force cosine similarity over fragments.
 *
 * Dev/test stand-in for the vector database. Fine for a few thousand
 * fragments; swap for the Redis store (or a real vector index) beyond that.
 */

import { ConversationFragment, DeleteResult, ScoredFragment, SemanticStore } from './types';
import { cosineSimilarity } from './vector-math';

function timeOf(fragment: ConversationFragment): number {
  const time = Date.parse(fragment.timestamp);
  return Number.isNaN(time) ? 0 : time;
}

export class InMemorySemanticStore implements SemanticStore {
  private readonly fragments = new Map<string, ConversationFragment>();

  /** Get fragment count */
  get size(): number {
    return this.fragments.size;
  }

  async put(fragment: ConversationFragment): Promise<void> {
    this.fragments.set(fragment.id, { ...fragment, metadata: { ...fragment.metadata } });
  }

  async get(fragmentId: string): Promise<ConversationFragment | null> {
    return this.fragments.get(fragmentId) ?? null;
  }

  async getByCustomer(customerId: string, since: number | undefined, limit: number): Promise<ConversationFragment[]> {
    return [...this.fragments.values()]
      .filter((f) => f.customerId === customerId)
      .filter((f) => since === undefined || timeOf(f) >= since)
      .sort((a, b) => timeOf(b) - timeOf(a))
      .slice(0, limit);
  }

  async nearestNeighbors(
    embedding: number[],
    customerId: string | undefined,
    k: number,
    minSimilarity: number,
  ): Promise<ScoredFragment[]> {
    if (this.fragments.size === 0) return [];

    return [...this.fragments.values()]
      .filter((f) => customerId === undefined || f.customerId === customerId)
      .map((fragment) => ({ fragment, similarity: cosineSimilarity(embedding, fragment.embedding) }))
      .filter((s) => s.similarity >= minSimilarity)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, k);
  }

  async updateCustomerIdentity(fragmentId: string, newCustomerId: string): Promise<boolean> {
    const fragment = this.fragments.get(fragmentId);
    if (!fragment) return false;
    if (fragment.customerId !== newCustomerId) {
      this.fragments.set(fragmentId, { ...fragment, customerId: newCustomerId });
    }
    return true;
  }

  async deleteOlderThan(cutoff: number): Promise<DeleteResult> {
    const customerIds = new Set<string>();
    let count = 0;
    for (const [id, fragment] of this.fragments) {
      if (timeOf(fragment) < cutoff) {
        this.fragments.delete(id);
        customerIds.add(fragment.customerId);
        count++;
      }
    }
    return { count, customerIds: [...customerIds] };
  }

  async deleteByCustomer(customerId: string): Promise<number> {
    let count = 0;
    for (const [id, fragment] of this.fragments) {
      if (fragment.customerId === customerId) {
        this.fragments.delete(id);
        count++;
      }
    }
    return count;
  }

  /** Clear all fragments */
  clear(): void {
    this.fragments.clear();
  }
}
