import * as path from 'path';
import {
  ConversationFragment,
  DeleteResult,
  FragmentMetadata,
  ScoredFragment,
  SemanticStore,
} from '../../src/store/types';
import { DisplayNameEntry, IdentityDirectory, IdentityRecord } from '../../src/identity/types';
import { KeywordMatcher, loadKeywordTables } from '../../src/keywords/keyword-tables';
import { EmbeddingProvider } from '../../src/embedding/embedding-service';

/** 2024-03-15T12:00:00.000Z, a Friday */
export const NOW = Date.parse('2024-03-15T12:00:00.000Z');
export const DAY_MS = 86_400_000;

export function daysAgo(days: number, from = NOW): string {
  return new Date(from - days * DAY_MS).toISOString();
}

export function makeFragment(
  overrides: Partial<Omit<ConversationFragment, 'metadata'>> & { metadata?: Partial<FragmentMetadata> } = {},
): ConversationFragment {
  const { metadata, ...rest } = overrides;
  return {
    id: 'frag_00000001',
    customerId: 'cust_a',
    channel: 'sms',
    direction: 'inbound',
    timestamp: new Date(NOW).toISOString(),
    text: 'hello',
    embedding: [],
    ...rest,
    metadata: { tags: [], ...metadata },
  };
}

export function makeRecord(overrides: Partial<IdentityRecord> = {}): IdentityRecord {
  return {
    customerId: 'cust_a',
    names: [],
    phones: [],
    emails: [],
    linkConfidence: {},
    createdAt: new Date(NOW).toISOString(),
    updatedAt: new Date(NOW).toISOString(),
    needsManualReview: false,
    ...overrides,
  };
}

export function keywordMatcher(): KeywordMatcher {
  return new KeywordMatcher(loadKeywordTables(path.resolve(__dirname, '..', '..', 'config', 'keyword-tables.yaml')));
}

/** Embeds every text to the same unit vector */
export class ConstantEmbedder implements EmbeddingProvider {
  readonly dimension = 2;
  calls = 0;

  async embed(): Promise<number[]> {
    this.calls++;
    return [1, 0];
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return Promise.all(texts.map(() => this.embed()));
  }
}

export class FailingEmbedder implements EmbeddingProvider {
  readonly dimension = 2;

  async embed(): Promise<number[]> {
    throw new Error('embedding service down');
  }

  async embedBatch(): Promise<number[][]> {
    throw new Error('embedding service down');
  }
}

/** Every call fails, like a store whose connection is gone */
export class UnreachableSemanticStore implements SemanticStore {
  async put(): Promise<void> {
    throw new Error('connection refused');
  }
  async getByCustomer(): Promise<ConversationFragment[]> {
    throw new Error('connection refused');
  }
  async nearestNeighbors(): Promise<ScoredFragment[]> {
    throw new Error('connection refused');
  }
  async updateCustomerIdentity(): Promise<boolean> {
    throw new Error('connection refused');
  }
  async deleteOlderThan(): Promise<DeleteResult> {
    throw new Error('connection refused');
  }
  async deleteByCustomer(): Promise<number> {
    throw new Error('connection refused');
  }
}

export class UnreachableDirectory implements IdentityDirectory {
  async get(): Promise<IdentityRecord | null> {
    throw new Error('connection refused');
  }
  async save(): Promise<void> {
    throw new Error('connection refused');
  }
  async lookup(): Promise<string | null> {
    throw new Error('connection refused');
  }
  async assign(): Promise<void> {
    throw new Error('connection refused');
  }
  async listDisplayNames(): Promise<DisplayNameEntry[]> {
    throw new Error('connection refused');
  }
}
