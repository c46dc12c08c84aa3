/**
 * Relevance Scorer
 *
 * finalScore = 0.4·similarity + 0.3·recency + 0.2·importance + 0.1·channelRelevance
 * Every sub-score and the final score are clamped into [0, 1].
 */

import { ConversationFragment } from '../store/types';
import { parseTimestamp } from '../store/fragment-records';

export interface ContextItem {
  fragment: ConversationFragment;
  similarity: number;
  recency: number;
  importance: number;
  channelRelevance: number;
  finalScore: number;
}

export interface RelevanceWeights {
  similarity: number;
  recency: number;
  importance: number;
  channelRelevance: number;
}

export const DEFAULT_WEIGHTS: RelevanceWeights = {
  similarity: 0.4,
  recency: 0.3,
  importance: 0.2,
  channelRelevance: 0.1,
};

const DAY_MS = 86_400_000;
const MIN_RECENCY = 0.1;
const MAX_OVERLAP_BOOST = 0.2;

const CHANNEL_GROUPS: Record<string, string[]> = {
  text: ['sms', 'chat', 'whatsapp'],
  voice: ['phone', 'voicemail', 'call', 'voice'],
  email: ['email'],
  inPerson: ['visit', 'appointment'],
};

const INTENT_BOOSTS: Array<[string[], number]> = [
  [['complaint', 'escalation', 'emergency'], 0.4],
  [['service_request', 'appointment'], 0.3],
  [['feedback', 'question'], 0.1],
];

const URGENCY_BOOSTS: Record<string, number> = {
  critical: 0.3,
  high: 0.2,
  low: -0.1,
};

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function wordTokens(text: string): Set<string> {
  return new Set(text.toLowerCase().match(/\w+/g) ?? []);
}

/** Jaccard index of the two texts' word-token sets; 0 when both are empty */
export function tokenOverlap(a: string, b: string): number {
  const left = wordTokens(a);
  const right = wordTokens(b);
  if (left.size === 0 && right.size === 0) return 0;
  let shared = 0;
  for (const token of left) if (right.has(token)) shared++;
  return shared / (left.size + right.size - shared);
}

function channelGroup(channel: string): string | undefined {
  const lower = channel.toLowerCase();
  return Object.keys(CHANNEL_GROUPS).find((group) => CHANNEL_GROUPS[group].includes(lower));
}

export class RelevanceScorer {
  constructor(
    private readonly decayWindowDays = 30,
    private readonly weights: RelevanceWeights = DEFAULT_WEIGHTS,
  ) {}

  /** Throws MalformedRecordError when the fragment timestamp cannot be parsed */
  score(
    queryText: string,
    queryChannel: string,
    fragment: ConversationFragment,
    rawSimilarity: number,
    now: number,
  ): ContextItem {
    const similarity = this.similarity(queryText, fragment.text, rawSimilarity);
    const recency = this.recency(parseTimestamp(fragment), now);
    const importance = this.importance(fragment);
    const channelRelevance = this.channelRelevance(queryChannel, fragment.channel);

    const finalScore = clamp01(
      this.weights.similarity * similarity
      + this.weights.recency * recency
      + this.weights.importance * importance
      + this.weights.channelRelevance * channelRelevance,
    );
    return { fragment, similarity, recency, importance, channelRelevance, finalScore };
  }

  similarity(queryText: string, fragmentText: string, rawSimilarity: number): number {
    return clamp01(clamp01(rawSimilarity) + MAX_OVERLAP_BOOST * tokenOverlap(queryText, fragmentText));
  }

  /** Monotonically non-increasing in age */
  recency(time: number, now: number): number {
    const ageDays = (now - time) / DAY_MS;
    if (ageDays <= 0) return 1;
    if (ageDays >= this.decayWindowDays) return MIN_RECENCY;
    return clamp01(Math.max(MIN_RECENCY, Math.exp(-ageDays / (this.decayWindowDays / 3))));
  }

  importance(fragment: ConversationFragment): number {
    let score = 0.5;
    const { intent, urgency, sentiment } = fragment.metadata;

    if (intent) {
      const boost = INTENT_BOOSTS.find(([intents]) => intents.includes(intent));
      if (boost) score += boost[1];
    }
    if (urgency) score += URGENCY_BOOSTS[urgency] ?? 0;
    if (sentiment === 'negative') score += 0.2;
    else if (sentiment === 'positive') score += 0.1;
    if (fragment.direction === 'outbound') score += 0.1;

    return clamp01(score);
  }

  channelRelevance(queryChannel: string, fragmentChannel: string): number {
    if (queryChannel.toLowerCase() === fragmentChannel.toLowerCase()) return 1;
    const queryGroup = channelGroup(queryChannel);
    const fragmentGroup = channelGroup(fragmentChannel);
    if (!queryGroup || !fragmentGroup) return 0.5;
    return queryGroup === fragmentGroup ? 0.8 : 0.3;
  }
}
