import { InMemorySemanticStore } from '../../src/store/in-memory-semantic-store';
import { cosineSimilarity } from '../../src/store/vector-math';
import { NOW, daysAgo, makeFragment } from '../helpers/fixtures';

describe('InMemorySemanticStore', () => {
  let store: InMemorySemanticStore;

  beforeEach(async () => {
    store = new InMemorySemanticStore();
    await store.put(makeFragment({ id: 'f1', timestamp: daysAgo(3), embedding: [1, 0] }));
    await store.put(makeFragment({ id: 'f2', timestamp: daysAgo(1), embedding: [0.6, 0.8] }));
    await store.put(makeFragment({ id: 'f3', timestamp: daysAgo(2), embedding: [0, 1] }));
    await store.put(makeFragment({ id: 'f4', customerId: 'cust_b', timestamp: daysAgo(1), embedding: [1, 0] }));
  });

  it('should list a customer newest first with an inclusive lower bound', async () => {
    expect((await store.getByCustomer('cust_a', undefined, 10)).map((f) => f.id)).toEqual(['f2', 'f3', 'f1']);
    expect((await store.getByCustomer('cust_a', Date.parse(daysAgo(2)), 10)).map((f) => f.id)).toEqual(['f2', 'f3']);
    expect((await store.getByCustomer('cust_a', undefined, 1)).map((f) => f.id)).toEqual(['f2']);
  });

  it('should rank neighbours by cosine similarity above the floor', async () => {
    const results = await store.nearestNeighbors([1, 0], 'cust_a', 5, 0.5);
    expect(results.map((r) => r.fragment.id)).toEqual(['f1', 'f2']);
    expect(results[1].similarity).toBeCloseTo(0.6);
  });

  it('should search across customers without a customer filter', async () => {
    const results = await store.nearestNeighbors([1, 0], undefined, 5, 0.9);
    expect(results.map((r) => r.fragment.id).sort()).toEqual(['f1', 'f4']);
  });

  it('should rewrite ownership idempotently', async () => {
    expect(await store.updateCustomerIdentity('f1', 'cust_b')).toBe(true);
    expect(await store.updateCustomerIdentity('f1', 'cust_b')).toBe(true);
    expect(await store.updateCustomerIdentity('missing', 'cust_b')).toBe(false);
    expect((await store.getByCustomer('cust_b', undefined, 10)).map((f) => f.id)).toEqual(['f4', 'f1']);
  });

  it('should delete strictly older fragments and report the customers hit', async () => {
    const result = await store.deleteOlderThan(Date.parse(daysAgo(2)));
    expect(result).toEqual({ count: 1, customerIds: ['cust_a'] });
    expect(store.size).toBe(3);
  });

  it('should delete by customer', async () => {
    expect(await store.deleteByCustomer('cust_a')).toBe(3);
    expect(store.size).toBe(1);
  });

  it('should keep stored copies apart from the caller', async () => {
    const fragment = makeFragment({ id: 'f5', timestamp: new Date(NOW).toISOString() });
    await store.put(fragment);
    fragment.metadata.intent = 'complaint';
    expect((await store.get('f5'))?.metadata.intent).toBeUndefined();
  });
});

describe('cosineSimilarity', () => {
  it('should return 0 for mismatched or zero vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
  });
});
