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
import { Engine, EngineOverrides, createEngine } from '../../src/engine/create-engine';
import { InMemoryCacheStore } from '../../src/cache/cache-service';
import { InMemorySemanticStore } from '../../src/store/in-memory-semantic-store';
import { InMemoryIdentityDirectory } from '../../src/identity/identity-directory';
import { loadKeywordTables } from '../../src/keywords/keyword-tables';
import {
  ConstantEmbedder,
  NOW,
  UnreachableDirectory,
  UnreachableSemanticStore,
  daysAgo,
  makeFragment,
  makeRecord,
} from '../helpers/fixtures';

const keywordTables = loadKeywordTables(path.resolve(__dirname, '..', '..', 'config', 'keyword-tables.yaml'));

describe('ContextEngineService', () => {
  let cache: InMemoryCacheStore;
  let store: InMemorySemanticStore;
  let directory: InMemoryIdentityDirectory;

  beforeEach(() => {
    cache = new InMemoryCacheStore({ defaultTtlSeconds: 3600, maxEntries: 100, keyPrefix: '' }, () => NOW);
    store = new InMemorySemanticStore();
    directory = new InMemoryIdentityDirectory();
  });

  afterEach(() => {
    cache.close();
  });

  function build(overrides: EngineOverrides = {}): Engine {
    return createEngine({
      store,
      directory,
      cache,
      embedder: new ConstantEmbedder(),
      keywordTables,
      guardConfig: { timeoutMs: 100, retryBackoffMs: 0 },
      now: () => NOW,
      ...overrides,
    });
  }

  describe('ingestInteraction', () => {
    it('should create an identity for a new sender and reuse it afterwards', async () => {
      const { service } = build();

      const first = await service.ingestInteraction({
        channel: 'sms',
        text: 'My faucet is leaking',
        phone: '(757) 555-0123',
        name: 'Sam Lee',
      });
      const second = await service.ingestInteraction({
        channel: 'voice',
        text: 'Calling about the faucet',
        phone: '17575550123',
        timestamp: new Date(NOW + 60_000).toISOString(),
      });

      expect(first).toMatchObject({ stored: true, created: true, confidence: 1, mergedFrom: [] });
      expect(second).toMatchObject({ stored: true, created: false, confidence: 0.9, mergedFrom: [] });
      if (!first.stored || !second.stored) throw new Error('expected both interactions to be stored');
      expect(second.customerId).toBe(first.customerId);

      const fragments = await store.getByCustomer(first.customerId, undefined, 10);
      expect(fragments).toHaveLength(2);
      expect(fragments[0].metadata.phoneNumber).toBe('+17575550123');
      expect(fragments[1].metadata.customerName).toBe('Sam Lee');
      expect(fragments[1].timestamp).toBe(new Date(NOW).toISOString());
      expect(fragments[1].embedding).toEqual([1, 0]);
    });

    it('should merge the identity behind a gateway email with the one owning its phone', async () => {
      await directory.save(makeRecord({
        customerId: 'cust_a',
        phones: ['+17575550100'],
        linkConfidence: { '+17575550100': 1 },
      }));
      await directory.assign('phone', '+17575550100', 'cust_a');
      await directory.save(makeRecord({
        customerId: 'cust_b',
        emails: ['7575550100@smsgateway.com'],
        linkConfidence: { '7575550100@smsgateway.com': 1 },
      }));
      await directory.assign('email', '7575550100@smsgateway.com', 'cust_b');
      await store.put(makeFragment({ id: 'frag_legacy', customerId: 'cust_b', timestamp: daysAgo(5) }));

      const { service } = build();
      const result = await service.ingestInteraction({
        channel: 'email',
        text: 'Is my appointment still on?',
        email: '7575550100@smsgateway.com',
      });

      expect(result).toMatchObject({
        stored: true,
        customerId: 'cust_a',
        confidence: 0.95,
        created: false,
        mergedFrom: ['cust_b'],
      });
      expect(await directory.lookup('email', '7575550100@smsgateway.com')).toBe('cust_a');
      expect((await directory.get('cust_b'))?.mergedInto).toBe('cust_a');
      expect((await store.get('frag_legacy'))?.customerId).toBe('cust_a');

      const resolved = await service.resolveIdentity(undefined, '7575550100@smsgateway.com');
      expect(resolved.customerId).toBe('cust_a');
    });

    it('should refuse an unparseable timestamp', async () => {
      const { service } = build();
      const result = await service.ingestInteraction({ channel: 'sms', text: 'hi', phone: '7575550100', timestamp: 'soon' });
      expect(result).toEqual({ stored: false, reason: 'invalid_timestamp' });
    });

    it('should not store anything while the identity directory is down', async () => {
      const { service } = build({ directory: new UnreachableDirectory() });

      const result = await service.ingestInteraction({ channel: 'sms', text: 'hi', phone: '7575550100' });

      expect(result).toEqual({ stored: false, reason: 'identity_directory_unavailable' });
      expect(store.size).toBe(0);
    });

    it('should name the store that refused the write', async () => {
      const { service } = build({ store: new UnreachableSemanticStore() });
      const result = await service.ingestInteraction({ channel: 'sms', text: 'hi', phone: '7575550100' });
      expect(result).toEqual({ stored: false, reason: 'semantic_store_unavailable' });
    });

    it('should keep serving the cached profile after a routine ingest', async () => {
      const { service } = build();
      const first = await service.ingestInteraction({ channel: 'sms', text: 'hello', phone: '7575550100' });
      if (!first.stored) throw new Error('expected the interaction to be stored');

      expect((await service.getCustomerProfile(first.customerId)).fragmentCount).toBe(1);
      await service.ingestInteraction({ channel: 'sms', text: 'hello again', phone: '7575550100' });
      expect((await service.getCustomerProfile(first.customerId)).fragmentCount).toBe(1);
      expect((await service.getCustomerProfile(first.customerId, true)).fragmentCount).toBe(2);
    });

    it('should give concurrent first contacts from one phone a single identity', async () => {
      const { service } = build();

      const results = await Promise.all(
        ['first', 'second', 'third'].map((text) => service.ingestInteraction({ channel: 'sms', text, phone: '7575550100' })),
      );

      const customerIds = results.map((r) => (r.stored ? r.customerId : null));
      const created = results.filter((r) => r.stored && r.created);
      expect(created).toHaveLength(1);
      expect(new Set(customerIds).size).toBe(1);
      expect(customerIds[0]).not.toBeNull();

      for (const customerId of customerIds) {
        if (!customerId) throw new Error('expected every interaction to be stored');
        const history = await service.getConversationHistory(customerId);
        expect(history.fragments).toHaveLength(3);
        const context = await service.getContext(customerId, 'any news?', 'sms');
        expect(context.relevantHistory).toHaveLength(3);
      }
    });
  });

  describe('reads', () => {
    beforeEach(async () => {
      await store.put(makeFragment({ id: 'frag_old', timestamp: daysAgo(40), embedding: [1, 0] }));
      await store.put(makeFragment({ id: 'frag_new', timestamp: daysAgo(1), embedding: [0, 1] }));
      await store.put(makeFragment({ id: 'frag_other', customerId: 'cust_b', embedding: [1, 0] }));
    });

    it('should list history newest first', async () => {
      const { service } = build();
      const history = await service.getConversationHistory('cust_a');
      expect(history.degraded).toBe(false);
      expect(history.fragments.map((f) => f.id)).toEqual(['frag_new', 'frag_old']);
    });

    it('should search similar fragments, optionally per customer', async () => {
      const { service } = build();

      const all = await service.searchSimilar('leak');
      const mine = await service.searchSimilar('leak', 'cust_a');

      expect(all.results.map((r) => r.fragment.id).sort()).toEqual(['frag_old', 'frag_other']);
      expect(mine.results.map((r) => r.fragment.id)).toEqual(['frag_old']);
      expect(mine.results[0].similarity).toBe(1);
    });

    it('should read a merged-away identity through its survivor', async () => {
      await directory.save(makeRecord({ customerId: 'cust_a' }));
      await directory.save(makeRecord({ customerId: 'cust_b', mergedInto: 'cust_a' }));
      const { service } = build();

      const history = await service.getConversationHistory('cust_b');
      const profile = await service.getCustomerProfile('cust_b');
      const context = await service.getContext('cust_b', 'leak', 'sms');

      expect(history.fragments.map((f) => f.id)).toEqual(['frag_new', 'frag_old']);
      expect(profile.customerId).toBe('cust_a');
      expect(profile.fragmentCount).toBe(2);
      expect(context.customerProfile.customerId).toBe('cust_a');
      expect(context.relevantHistory.map((item) => item.fragment.id)).toContain('frag_new');
    });

    it('should degrade reads when the store is down', async () => {
      const { service } = build({ store: new UnreachableSemanticStore() });

      expect(await service.getConversationHistory('cust_a')).toEqual({ fragments: [], degraded: true });
      expect(await service.searchSimilar('leak')).toEqual({ results: [], degraded: true });

      const profile = await service.getCustomerProfile('cust_a');
      expect(profile.customerId).toBe('cust_a');
      expect(profile.fragmentCount).toBe(0);
    });
  });

  describe('maintenance', () => {
    it('should delete fragments older than the retention window', async () => {
      await store.put(makeFragment({ id: 'frag_old', timestamp: daysAgo(40) }));
      await store.put(makeFragment({ id: 'frag_new', timestamp: daysAgo(1) }));
      const { service } = build();

      expect(await service.cleanupOlderThan(30)).toEqual({ deleted: 1 });
      expect(await store.get('frag_old')).toBeNull();
      expect(await store.get('frag_new')).not.toBeNull();
    });

    it('should erase every fragment of a customer', async () => {
      await store.put(makeFragment({ id: 'frag_1' }));
      await store.put(makeFragment({ id: 'frag_2' }));
      await store.put(makeFragment({ id: 'frag_3', customerId: 'cust_b' }));
      const { service } = build();

      expect(await service.forgetCustomer('cust_a')).toEqual({ deleted: 2, degraded: false });
      expect(store.size).toBe(1);
    });
  });

  it('should link identities through the facade', async () => {
    const { service } = build();
    const link = await service.linkIdentities('7575550100', 'jane@example.com', 'Jane Doe');
    const resolved = await service.resolveIdentity('7575550100', 'jane@example.com');

    expect(link.success).toBe(true);
    expect(resolved).toEqual({ customerId: link.customerId, confidence: 1, degraded: false });
  });
});
