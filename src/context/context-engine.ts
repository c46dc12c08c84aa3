/**
 * Context Retrieval Engine
 *
 * profile → chronological + nearest-neighbour candidates → score → top K
 * → threads over every candidate → current-message analysis → summaries.
 *
 * Never throws: a store failure yields a `degraded` minimal summary and a
 * caller abort a `cancelled` one.
 */

import { ContextSummary, GetContextOptions } from './types';
import { NEUTRAL_ANALYSIS, analyzeCurrentMessage } from './current-analysis';
import { renderSummaries } from './summary-renderer';
import { ConversationFragment, SemanticStore } from '../store/types';
import { toTimedFragments } from '../store/fragment-records';
import { EmbeddingProvider } from '../embedding/embedding-service';
import { ContextItem, RelevanceScorer } from '../scoring/relevance-scorer';
import { ConversationThreader } from '../threading/conversation-threader';
import { ProfileBuilder } from '../profile/profile-builder';
import { ProfileService } from '../profile/profile-service';
import { KeywordMatcher } from '../keywords/keyword-tables';
import { StoreGuard } from '../resilience/store-guard';
import { isCancelled, throwIfAborted } from '../errors/errors';
import { logger } from '../observability/logger';
import { contextDuration, contextRequests } from '../observability/metrics';

const DAY_MS = 86_400_000;
const DEFAULT_RAW_SIMILARITY = 0.5;

export interface ContextEngineOptions {
  maxItems: number;
  windowDays: number;
  chronologicalLimit: number;
  neighbourCount: number;
  minSimilarity: number;
  now: () => number;
}

const DEFAULT_OPTIONS: ContextEngineOptions = {
  maxItems: 10,
  windowDays: 90,
  chronologicalLimit: 100,
  neighbourCount: 20,
  minSimilarity: 0.3,
  now: Date.now,
};

export interface ContextEngineDeps {
  store: SemanticStore;
  embedder: EmbeddingProvider;
  guard: StoreGuard;
  profiles: ProfileService;
  builder: ProfileBuilder;
  scorer: RelevanceScorer;
  threader: ConversationThreader;
  keywords: KeywordMatcher;
}

interface Candidate {
  fragment: ConversationFragment;
  rawSimilarity: number;
}

export class ContextRetrievalEngine {
  private readonly log = logger.child({ component: 'context-engine' });
  private readonly options: ContextEngineOptions;

  constructor(
    private readonly deps: ContextEngineDeps,
    options?: Partial<ContextEngineOptions>,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async getContext(
    customerId: string,
    currentText: string,
    currentChannel: string,
    options: GetContextOptions = {},
  ): Promise<ContextSummary> {
    const endTimer = contextDuration.startTimer();
    try {
      const summary = await this.assemble(customerId, currentText, currentChannel, options);
      contextRequests.inc({ status: 'ok' });
      return summary;
    } catch (err) {
      if (isCancelled(err) || options.signal?.aborted) {
        contextRequests.inc({ status: 'cancelled' });
        this.log.info({ customerId }, 'Context retrieval cancelled by caller');
        return this.minimalSummary(customerId, 'cancelled');
      }
      contextRequests.inc({ status: 'degraded' });
      this.log.error({ err, customerId }, 'Context retrieval failed, returning minimal summary');
      return this.minimalSummary(customerId, 'degraded');
    } finally {
      endTimer();
    }
  }

  /** Empty profile bearing the requested identity, no history, no threads */
  minimalSummary(customerId: string, status: 'degraded' | 'cancelled'): ContextSummary {
    const profile = this.deps.builder.minimalProfile(customerId, this.options.now());
    return {
      customerProfile: profile,
      relevantHistory: [],
      threads: [],
      currentTopic: NEUTRAL_ANALYSIS.topic,
      customerMood: NEUTRAL_ANALYSIS.mood,
      urgencyLevel: NEUTRAL_ANALYSIS.urgency,
      suggestedTone: NEUTRAL_ANALYSIS.suggestedTone,
      ...renderSummaries(profile, [], [], NEUTRAL_ANALYSIS),
      status,
    };
  }

  private async assemble(
    customerId: string,
    currentText: string,
    currentChannel: string,
    options: GetContextOptions,
  ): Promise<ContextSummary> {
    const { signal } = options;
    const maxItems = options.maxItems ?? this.options.maxItems;
    const windowDays = options.windowDays ?? this.options.windowDays;
    const now = this.options.now();

    throwIfAborted(signal, 'getContext');
    const profile = await this.deps.profiles.getProfile(customerId, { signal });

    throwIfAborted(signal, 'getContext');
    const candidates = await this.fetchCandidates(customerId, currentText, now - windowDays * DAY_MS);

    throwIfAborted(signal, 'getContext');
    const fragments = [...candidates.values()].map((c) => c.fragment);
    const timed = toTimedFragments(fragments, 'context-engine');
    const items: Array<{ item: ContextItem; time: number }> = timed.map(({ fragment, time }) => ({
      item: this.deps.scorer.score(
        currentText,
        currentChannel,
        fragment,
        candidates.get(fragment.id)?.rawSimilarity ?? DEFAULT_RAW_SIMILARITY,
        now,
      ),
      time,
    }));

    const relevantHistory = items
      .sort((a, b) => b.item.finalScore - a.item.finalScore || b.time - a.time)
      .slice(0, Math.max(0, maxItems))
      .map(({ item }) => item);

    const threads = this.deps.threader.buildThreads(fragments, now);
    const analysis = analyzeCurrentMessage(
      this.deps.keywords,
      currentText,
      profile.contactPreferences.communicationStyle,
    );

    return {
      customerProfile: profile,
      relevantHistory,
      threads,
      currentTopic: analysis.topic,
      customerMood: analysis.mood,
      urgencyLevel: analysis.urgency,
      suggestedTone: analysis.suggestedTone,
      ...renderSummaries(profile, relevantHistory, threads, analysis),
      status: 'ok',
    };
  }

  /** Chronological copies first; a neighbour hit only contributes its similarity */
  private async fetchCandidates(customerId: string, text: string, since: number): Promise<Map<string, Candidate>> {
    const chronological = await this.deps.store.getByCustomer(customerId, since, this.options.chronologicalLimit);
    const candidates = new Map<string, Candidate>();
    for (const fragment of chronological) {
      candidates.set(fragment.id, { fragment, rawSimilarity: DEFAULT_RAW_SIMILARITY });
    }

    const embedding = await this.embedOrSkip(customerId, text);
    if (!embedding) return candidates;

    const neighbours = await this.deps.store.nearestNeighbors(
      embedding,
      customerId,
      this.options.neighbourCount,
      this.options.minSimilarity,
    );
    for (const { fragment, similarity } of neighbours) {
      const existing = candidates.get(fragment.id);
      candidates.set(fragment.id, { fragment: existing?.fragment ?? fragment, rawSimilarity: similarity });
    }
    return candidates;
  }

  private async embedOrSkip(customerId: string, text: string): Promise<number[] | null> {
    try {
      return await this.deps.guard.run('embedding', 'embed', () => this.deps.embedder.embed(text));
    } catch (err) {
      this.log.warn({ err, customerId }, 'Embedding unavailable, using chronological candidates only');
      return null;
    }
  }
}
