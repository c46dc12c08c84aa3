jest.mock('../../src/observability/logger', () => ({
  logger: {
    child: () => ({ info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() }),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import * as path from 'path';
import { createEngine } from '../../src/engine/create-engine';
import { InMemoryCacheStore } from '../../src/cache/cache-service';
import { InMemorySemanticStore } from '../../src/store/in-memory-semantic-store';
import { InMemoryIdentityDirectory } from '../../src/identity/identity-directory';
import { EmbeddingProvider } from '../../src/embedding/embedding-service';
import { SemanticStore } from '../../src/store/types';
import { loadKeywordTables } from '../../src/keywords/keyword-tables';
import {
  ConstantEmbedder,
  FailingEmbedder,
  NOW,
  UnreachableSemanticStore,
  daysAgo,
  makeFragment,
  makeRecord,
} from '../helpers/fixtures';

const keywordTables = loadKeywordTables(path.resolve(__dirname, '..', '..', 'config', 'keyword-tables.yaml'));

describe('Context retrieval', () => {
  let cache: InMemoryCacheStore;
  let memoryStore: InMemorySemanticStore;
  let directory: InMemoryIdentityDirectory;

  beforeEach(async () => {
    cache = new InMemoryCacheStore({ defaultTtlSeconds: 3600, maxEntries: 100, keyPrefix: '' }, () => NOW);
    memoryStore = new InMemorySemanticStore();
    directory = new InMemoryIdentityDirectory();

    await directory.save(makeRecord({ customerId: 'cust_a', displayName: 'Jane Doe', names: ['Jane Doe'] }));
    await memoryStore.put(makeFragment({
      id: 'a1111111-leak',
      channel: 'sms',
      timestamp: daysAgo(3),
      text: 'My kitchen faucet is leaking',
      embedding: [1, 0],
    }));
    await memoryStore.put(makeFragment({
      id: 'b2222222-followup',
      channel: 'email',
      timestamp: daysAgo(2),
      text: 'Following up about the leaking faucet',
    }));
  });

  afterEach(() => {
    cache.close();
  });

  function engineWith(store: SemanticStore = memoryStore, embedder: EmbeddingProvider = new ConstantEmbedder()) {
    return createEngine({
      store,
      directory,
      cache,
      embedder,
      keywordTables,
      guardConfig: { timeoutMs: 100, retryBackoffMs: 0 },
      now: () => NOW,
    });
  }

  it('should rank history, thread it and render summaries', async () => {
    const { contextEngine } = engineWith();

    const summary = await contextEngine.getContext('cust_a', 'Faucet still leaking, urgent', 'sms');

    expect(summary.status).toBe('ok');
    expect(summary.relevantHistory.map((item) => item.fragment.id)).toEqual(['a1111111-leak', 'b2222222-followup']);

    const [top, second] = summary.relevantHistory;
    expect(top.similarity).toBe(1);
    expect(top.finalScore).toBeCloseTo(0.4 + 0.3 * Math.exp(-0.3) + 0.1 + 0.1);
    expect(second.similarity).toBeCloseTo(0.55);
    expect(second.channelRelevance).toBe(0.3);

    expect(summary.threads).toHaveLength(1);
    expect(summary.threads[0].mainTopic).toBe('plumbing');
    expect(summary.currentTopic).toBe('plumbing');
    expect(summary.customerMood).toBe('neutral');
    expect(summary.urgencyLevel).toBe('high');
    expect(summary.suggestedTone).toBe('responsive');

    expect(summary.shortSummary).toBe('Jane Doe - 2 previous interactions, last on Mar 13');
    expect(summary.detailedSummary).toBe(
      'Customer: Jane Doe | Preferred contact: email | Recent channels: sms, email',
    );
    expect(summary.llmContext).toBe([
      'CUSTOMER PROFILE:',
      '- Name: Jane Doe',
      '- Communication style: friendly',
      '- Current mood: neutral',
      '- Suggested tone: responsive',
      '',
      'ACTIVE CONVERSATIONS:',
      '- plumbing (sms, email)',
      '',
      'RECENT RELEVANT HISTORY:',
      '- [Mar 12, sms] My kitchen faucet is leaking',
      '- [Mar 13, email] Following up about the leaking faucet',
    ].join('\n'));
  });

  it('should cap the history at maxItems', async () => {
    const { contextEngine } = engineWith();
    const summary = await contextEngine.getContext('cust_a', 'Faucet still leaking', 'sms', { maxItems: 1 });
    expect(summary.relevantHistory.map((item) => item.fragment.id)).toEqual(['a1111111-leak']);
  });

  it('should leave out fragments older than the window', async () => {
    await memoryStore.put(makeFragment({ id: 'c3333333-ancient', timestamp: daysAgo(120), text: 'Old leak' }));
    const { contextEngine } = engineWith(memoryStore, new FailingEmbedder());

    const summary = await contextEngine.getContext('cust_a', 'leak', 'sms');

    expect(summary.relevantHistory.map((item) => item.fragment.id)).not.toContain('c3333333-ancient');
    expect(summary.relevantHistory).toHaveLength(2);
  });

  it('should fall back to chronological candidates when embedding fails', async () => {
    const { contextEngine } = engineWith(memoryStore, new FailingEmbedder());

    const summary = await contextEngine.getContext('cust_a', 'Faucet still leaking', 'sms');

    expect(summary.status).toBe('ok');
    expect(summary.relevantHistory).toHaveLength(2);
    expect(summary.relevantHistory[0].fragment.id).toBe('a1111111-leak');
    expect(summary.relevantHistory[0].similarity).toBeCloseTo(0.5 + 0.2 * (2 / 6));
  });

  it('should return a degraded minimal summary when the store is down', async () => {
    const { contextEngine } = engineWith(new UnreachableSemanticStore());

    const summary = await contextEngine.getContext('cust_a', 'Faucet still leaking', 'sms');

    expect(summary.status).toBe('degraded');
    expect(summary.customerProfile.customerId).toBe('cust_a');
    expect(summary.relevantHistory).toEqual([]);
    expect(summary.threads).toEqual([]);
    expect(summary.currentTopic).toBe('general');
    expect(summary.suggestedTone).toBe('professional');
    expect(summary.shortSummary).toBe('Customer cust_a - New customer, no previous interactions');
  });

  it('should return a cancelled summary when the caller has aborted', async () => {
    const { contextEngine } = engineWith();
    const controller = new AbortController();
    controller.abort();

    const summary = await contextEngine.getContext('cust_a', 'hello', 'sms', { signal: controller.signal });

    expect(summary.status).toBe('cancelled');
    expect(summary.relevantHistory).toEqual([]);
  });

  it('should greet a customer with no history as new', async () => {
    const { contextEngine } = engineWith();
    const summary = await contextEngine.getContext('cust_unknown', 'hello', 'sms');

    expect(summary.status).toBe('ok');
    expect(summary.shortSummary).toBe('Customer cust_unk - New customer, no previous interactions');
  });
});
