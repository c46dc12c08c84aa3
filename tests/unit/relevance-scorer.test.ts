jest.mock('../../src/observability/logger', () => ({
  logger: {
    child: () => ({ info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() }),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import { RelevanceScorer, clamp01, tokenOverlap } from '../../src/scoring/relevance-scorer';
import { MalformedRecordError } from '../../src/errors/errors';
import { DAY_MS, NOW, daysAgo, makeFragment } from '../helpers/fixtures';

describe('RelevanceScorer', () => {
  const scorer = new RelevanceScorer(30);

  describe('channelRelevance', () => {
    it('should score the same channel 1 regardless of case', () => {
      expect(scorer.channelRelevance('SMS', 'sms')).toBe(1);
    });

    it('should score channels of one group 0.8 and of different groups 0.3', () => {
      expect(scorer.channelRelevance('sms', 'chat')).toBe(0.8);
      expect(scorer.channelRelevance('voice', 'voicemail')).toBe(0.8);
      expect(scorer.channelRelevance('sms', 'email')).toBe(0.3);
    });

    it('should score an unknown channel 0.5', () => {
      expect(scorer.channelRelevance('sms', 'fax')).toBe(0.5);
    });
  });

  describe('importance', () => {
    it('should start at 0.5', () => {
      expect(scorer.importance(makeFragment())).toBe(0.5);
    });

    it('should add intent, urgency, sentiment and direction boosts', () => {
      const fragment = makeFragment({ direction: 'outbound', metadata: { intent: 'service_request' } });
      expect(scorer.importance(fragment)).toBeCloseTo(0.9);
    });

    it('should clamp at 1', () => {
      const fragment = makeFragment({ metadata: { intent: 'complaint', urgency: 'critical', sentiment: 'negative' } });
      expect(scorer.importance(fragment)).toBe(1);
    });

    it('should lower low-urgency fragments', () => {
      expect(scorer.importance(makeFragment({ metadata: { urgency: 'low' } }))).toBeCloseTo(0.4);
    });
  });

  describe('recency', () => {
    it('should be 1 for now and future timestamps', () => {
      expect(scorer.recency(NOW, NOW)).toBe(1);
      expect(scorer.recency(NOW + DAY_MS, NOW)).toBe(1);
    });

    it('should decay exponentially inside the window', () => {
      expect(scorer.recency(NOW - 10 * DAY_MS, NOW)).toBeCloseTo(Math.exp(-1));
    });

    it('should floor at 0.1 from the end of the window on', () => {
      expect(scorer.recency(NOW - 30 * DAY_MS, NOW)).toBe(0.1);
      expect(scorer.recency(NOW - 400 * DAY_MS, NOW)).toBe(0.1);
    });

    it('should never increase with age', () => {
      let previous = Infinity;
      for (let hours = 0; hours <= 40 * 24; hours += 6) {
        const value = scorer.recency(NOW - hours * 3_600_000, NOW);
        expect(value).toBeLessThanOrEqual(previous);
        previous = value;
      }
    });
  });

  describe('similarity', () => {
    it('should add up to 0.2 for shared words', () => {
      expect(scorer.similarity('kitchen faucet leaking', 'Kitchen faucet leaking!', 0.5)).toBeCloseTo(0.7);
      expect(scorer.similarity('kitchen faucet', 'invoice question', 0.5)).toBe(0.5);
    });

    it('should clamp to 1', () => {
      expect(scorer.similarity('same text', 'same text', 0.95)).toBe(1);
    });

    it('should compute the Jaccard index of word sets', () => {
      expect(tokenOverlap('a b', 'b c')).toBeCloseTo(1 / 3);
      expect(tokenOverlap('', '')).toBe(0);
    });
  });

  describe('score', () => {
    it('should weight the four sub-scores', () => {
      const fragment = makeFragment({ text: 'kitchen faucet leaking', channel: 'sms', timestamp: daysAgo(0) });
      const item = scorer.score('kitchen faucet leaking', 'sms', fragment, 0.5, NOW);

      expect(item.similarity).toBeCloseTo(0.7);
      expect(item.recency).toBe(1);
      expect(item.importance).toBe(0.5);
      expect(item.channelRelevance).toBe(1);
      expect(item.finalScore).toBeCloseTo(0.4 * 0.7 + 0.3 + 0.2 * 0.5 + 0.1);
    });

    it('should keep every score inside [0, 1]', () => {
      const fragments = [
        makeFragment({ metadata: { intent: 'complaint', urgency: 'critical', sentiment: 'negative' } }),
        makeFragment({ timestamp: daysAgo(365), metadata: { urgency: 'low' } }),
        makeFragment({ timestamp: daysAgo(-3), channel: 'carrier-pigeon' }),
      ];
      for (const fragment of fragments) {
        for (const raw of [-1, 0, 0.5, 1, 2, NaN]) {
          const item = scorer.score('hello there', 'email', fragment, raw, NOW);
          for (const value of [item.similarity, item.recency, item.importance, item.channelRelevance, item.finalScore]) {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThanOrEqual(1);
          }
        }
      }
    });

    it('should reject an unparseable timestamp', () => {
      const fragment = makeFragment({ timestamp: 'yesterday-ish' });
      expect(() => scorer.score('hello', 'sms', fragment, 0.5, NOW)).toThrow(MalformedRecordError);
    });
  });

  it('should clamp NaN to 0', () => {
    expect(clamp01(NaN)).toBe(0);
  });
});
