/**
 * Wires the engine from configuration. Every backend can be swapped
 * (tests pass in-memory stores, stub embedders and a fixed clock).
 */

import Redis from 'ioredis';
import { ContextEngineService } from './context-engine-service';
import { env } from '../config/env';
import { CacheStore } from '../cache/types';
import { createCacheStore } from '../cache/cache-service';
import { SemanticStore } from '../store/types';
import { GuardedSemanticStore, createSemanticStore } from '../store/semantic-store';
import { IdentityDirectory } from '../identity/types';
import { GuardedIdentityDirectory, createIdentityDirectory } from '../identity/identity-directory';
import { IdentityResolver } from '../identity/identity-resolver';
import { EmbeddingProvider, createEmbeddingProvider } from '../embedding/embedding-service';
import { KeywordMatcher, loadKeywordTables } from '../keywords/keyword-tables';
import { KeywordTables } from '../keywords/types';
import { RelevanceScorer } from '../scoring/relevance-scorer';
import { ConversationThreader } from '../threading/conversation-threader';
import { ProfileBuilder } from '../profile/profile-builder';
import { ProfileService } from '../profile/profile-service';
import { ContextRetrievalEngine } from '../context/context-engine';
import { DependencyHealthManager } from '../resilience/dependency-health';
import { StoreGuard } from '../resilience/store-guard';
import { StoreGuardConfig } from '../resilience/types';

export interface EngineOverrides {
  redis?: Redis;
  /** Unguarded backend; wrapped in the StoreGuard */
  store?: SemanticStore;
  /** Unguarded backend; wrapped in the StoreGuard */
  directory?: IdentityDirectory;
  cache?: CacheStore;
  embedder?: EmbeddingProvider;
  keywordTables?: KeywordTables;
  guardConfig?: Partial<StoreGuardConfig>;
  now?: () => number;
}

export interface Engine {
  service: ContextEngineService;
  resolver: IdentityResolver;
  profiles: ProfileService;
  contextEngine: ContextRetrievalEngine;
  health: DependencyHealthManager;
  /** Guarded */
  store: SemanticStore;
  /** Guarded */
  directory: IdentityDirectory;
  cache: CacheStore;
  keywords: KeywordMatcher;
}

export function createEngine(overrides: EngineOverrides = {}): Engine {
  const now = overrides.now ?? Date.now;
  const prefix = env.redis.keyPrefix;

  const health = new DependencyHealthManager(env.store.circuitFailureThreshold, env.store.circuitResetMs, now);
  const guard = new StoreGuard(health, {
    timeoutMs: env.store.timeoutMs,
    retryBackoffMs: env.store.retryBackoffMs,
    ...overrides.guardConfig,
  });

  const store = new GuardedSemanticStore(overrides.store ?? createSemanticStore(overrides.redis, prefix), guard);
  const directory = new GuardedIdentityDirectory(
    overrides.directory ?? createIdentityDirectory(overrides.redis, prefix),
    guard,
  );
  const cache = overrides.cache ?? createCacheStore(overrides.redis, {
    keyPrefix: `${prefix}cache:`,
    defaultTtlSeconds: env.profile.cacheTtlSeconds,
  });
  const embedder = overrides.embedder ?? createEmbeddingProvider();
  const keywords = new KeywordMatcher(overrides.keywordTables ?? loadKeywordTables(env.keywords.tablesPath));

  const builder = new ProfileBuilder(keywords);
  const profiles = new ProfileService(cache, store, directory, builder, {
    ttlSeconds: env.profile.cacheTtlSeconds,
    historyLimit: env.profile.historyLimit,
    now,
  });

  const resolver = new IdentityResolver(directory, store, profiles, {
    countryCode: env.identity.defaultCountryCode,
    confidenceThreshold: env.identity.confidenceThreshold,
    nameMatchFloor: env.identity.nameMatchFloor,
    nameScanLimit: env.identity.nameScanLimit,
    now,
  });

  const contextEngine = new ContextRetrievalEngine(
    {
      store,
      embedder,
      guard,
      profiles,
      builder,
      scorer: new RelevanceScorer(env.scoring.recencyDecayDays),
      threader: new ConversationThreader(keywords, {
        windowDays: env.threading.windowDays,
        activeDays: env.threading.activeDays,
      }),
      keywords,
    },
    {
      maxItems: env.context.maxItems,
      windowDays: env.context.windowDays,
      chronologicalLimit: env.context.chronologicalLimit,
      neighbourCount: env.context.neighbourCount,
      minSimilarity: env.context.minSimilarity,
      now,
    },
  );

  const service = new ContextEngineService(
    { resolver, contextEngine, profiles, builder, store, embedder, guard, health },
    { ingestThreshold: env.identity.ingestThreshold, searchMinSimilarity: env.context.minSimilarity, now },
  );

  return { service, resolver, profiles, contextEngine, health, store, directory, cache, keywords };
}
