/**
 * Engine facade: the operations channel adapters and the HTTP API call.
 *
 * Every operation is total. Store outages come back as degraded values
 * (`degraded: true`, `stored: false`, a minimal profile or summary).
 */

import { v4 as uuidv4 } from 'uuid';
import { IdentityResolver } from '../identity/identity-resolver';
import { LinkResult, ResolutionResult, ResolutionSignals } from '../identity/types';
import { ContextRetrievalEngine } from '../context/context-engine';
import { ContextSummary, GetContextOptions } from '../context/types';
import { ProfileService } from '../profile/profile-service';
import { ProfileBuilder } from '../profile/profile-builder';
import { CustomerProfile } from '../profile/types';
import {
  ConversationFragment,
  Direction,
  ScoredFragment,
  SemanticStore,
  Sentiment,
  Urgency,
} from '../store/types';
import { EmbeddingProvider } from '../embedding/embedding-service';
import { StoreGuard } from '../resilience/store-guard';
import { DependencyHealthManager } from '../resilience/dependency-health';
import { isStoreUnavailable } from '../errors/errors';
import { logger } from '../observability/logger';
import { maskIdentifier, redactPII } from '../observability/pii-redactor';

const DAY_MS = 86_400_000;

export interface Interaction {
  channel: string;
  text: string;
  direction?: Direction;
  /** ISO-8601; defaults to now */
  timestamp?: string;
  phone?: string;
  email?: string;
  name?: string;
  intent?: string;
  sentiment?: Sentiment;
  urgency?: Urgency;
  tags?: string[];
  subject?: string;
}

export type IngestResult =
  | {
    stored: true;
    customerId: string;
    fragmentId: string;
    confidence: number;
    created: boolean;
    /** Identities folded into `customerId` while linking this interaction */
    mergedFrom: string[];
  }
  | { stored: false; reason: string };

export interface FragmentList {
  fragments: ConversationFragment[];
  degraded: boolean;
}

export interface SimilarResults {
  results: ScoredFragment[];
  degraded: boolean;
}

export interface DeletionResult {
  deleted: number;
  degraded: boolean;
}

export interface ContextEngineServiceDeps {
  resolver: IdentityResolver;
  contextEngine: ContextRetrievalEngine;
  profiles: ProfileService;
  builder: ProfileBuilder;
  store: SemanticStore;
  embedder: EmbeddingProvider;
  guard: StoreGuard;
  health: DependencyHealthManager;
}

export interface ContextEngineServiceOptions {
  ingestThreshold: number;
  historyLimit: number;
  searchLimit: number;
  searchMinSimilarity: number;
  now: () => number;
}

const DEFAULT_OPTIONS: ContextEngineServiceOptions = {
  ingestThreshold: 0.7,
  historyLimit: 50,
  searchLimit: 10,
  searchMinSimilarity: 0.3,
  now: Date.now,
};

export class ContextEngineService {
  private readonly log = logger.child({ component: 'engine' });
  private readonly options: ContextEngineServiceOptions;

  constructor(
    private readonly deps: ContextEngineServiceDeps,
    options?: Partial<ContextEngineServiceOptions>,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  get health(): DependencyHealthManager {
    return this.deps.health;
  }

  // ───── Identity ───────────────────────────────────────────────

  resolveIdentity(phone?: string, email?: string, name?: string, threshold?: number): Promise<ResolutionResult> {
    return this.deps.resolver.resolve({ phone, email, name }, threshold);
  }

  linkIdentities(identifierA: string, identifierB: string, displayName?: string): Promise<LinkResult> {
    return this.deps.resolver.linkIdentities(identifierA, identifierB, displayName);
  }

  // ───── Context ────────────────────────────────────────────────

  async getContext(
    customerId: string,
    currentText: string,
    currentChannel: string,
    options?: GetContextOptions,
  ): Promise<ContextSummary> {
    const canonicalId = await this.canonicalId(customerId);
    return this.deps.contextEngine.getContext(canonicalId, currentText, currentChannel, options);
  }

  async getCustomerProfile(customerId: string, forceRebuild = false): Promise<CustomerProfile> {
    const canonicalId = await this.canonicalId(customerId);
    try {
      return await this.deps.profiles.getProfile(canonicalId, { forceRebuild });
    } catch (err) {
      this.log.error({ err, customerId }, 'Profile unavailable, returning minimal profile');
      return this.deps.builder.minimalProfile(canonicalId, this.options.now());
    }
  }

  async getConversationHistory(customerId: string, limit = this.options.historyLimit): Promise<FragmentList> {
    const canonicalId = await this.canonicalId(customerId);
    try {
      const fragments = await this.deps.store.getByCustomer(canonicalId, undefined, limit);
      return { fragments, degraded: false };
    } catch (err) {
      this.log.error({ err, customerId }, 'History unavailable');
      return { fragments: [], degraded: true };
    }
  }

  async searchSimilar(
    text: string,
    customerId?: string,
    k = this.options.searchLimit,
    minSimilarity = this.options.searchMinSimilarity,
  ): Promise<SimilarResults> {
    try {
      const embedding = await this.embed(text);
      const results = await this.deps.store.nearestNeighbors(embedding, customerId, k, minSimilarity);
      return { results, degraded: false };
    } catch (err) {
      this.log.error({ err, customerId }, 'Similarity search unavailable');
      return { results: [], degraded: true };
    }
  }

  // ───── Ingestion ──────────────────────────────────────────────

  /**
   * Resolve (or create) the sender's identity, bind every identifier the
   * interaction carries to it, then store the fragment. Ingests sharing an
   * identifier run one at a time.
   */
  async ingestInteraction(interaction: Interaction): Promise<IngestResult> {
    const timestamp = this.fragmentTimestamp(interaction.timestamp);
    if (!timestamp) return { stored: false, reason: 'invalid_timestamp' };

    const signals: ResolutionSignals = { phone: interaction.phone, email: interaction.email, name: interaction.name };
    try {
      return await this.deps.resolver.withIdentifierLock(
        signals,
        () => this.ingestExclusive(interaction, signals, timestamp),
      );
    } catch (err) {
      this.log.error({ err, channel: interaction.channel }, 'Interaction ingestion failed');
      return { stored: false, reason: isStoreUnavailable(err) ? `${err.dependency}_unavailable` : 'internal_error' };
    }
  }

  private async ingestExclusive(
    interaction: Interaction,
    signals: ResolutionSignals,
    timestamp: string,
  ): Promise<IngestResult> {
    const resolution = await this.deps.resolver.resolve(signals, this.options.ingestThreshold);
    if (resolution.degraded) return { stored: false, reason: 'identity_directory_unavailable' };

    let customerId = resolution.customerId;
    let confidence = resolution.confidence;
    let created = false;
    if (!customerId) {
      customerId = (await this.deps.resolver.createIdentity(signals)).customerId;
      confidence = 1;
      created = true;
    }

    const absorbed = await this.deps.resolver.absorbSignals(customerId, signals, confidence);
    const contact = this.deps.resolver.classify(signals);

    const fragment: ConversationFragment = {
      id: `frag_${uuidv4()}`,
      customerId: absorbed.customerId,
      channel: interaction.channel,
      direction: interaction.direction ?? 'inbound',
      timestamp,
      text: interaction.text,
      metadata: {
        intent: interaction.intent,
        sentiment: interaction.sentiment,
        urgency: interaction.urgency,
        tags: interaction.tags ?? [],
        customerName: interaction.name?.trim() || undefined,
        phoneNumber: contact.phones[0],
        emailAddress: contact.emails[0],
        subject: interaction.subject,
      },
      embedding: await this.embedOrEmpty(interaction.text),
    };

    await this.deps.store.put(fragment);
    this.log.debug({ fragmentId: fragment.id, preview: redactPII(fragment.text.slice(0, 80)) }, 'Fragment stored');

    this.log.info(
      {
        customerId: absorbed.customerId,
        fragmentId: fragment.id,
        channel: fragment.channel,
        created,
        merged: absorbed.mergedFrom.length,
        phone: maskIdentifier(contact.phones[0]),
        email: maskIdentifier(contact.emails[0]),
      },
      'Interaction ingested',
    );
    return {
      stored: true,
      customerId: absorbed.customerId,
      fragmentId: fragment.id,
      confidence,
      created,
      mergedFrom: absorbed.mergedFrom,
    };
  }

  // ───── Maintenance ────────────────────────────────────────────

  /** Delete fragments older than `days` and drop the affected cached profiles */
  async cleanupOlderThan(days: number): Promise<{ deleted: number }> {
    const cutoff = this.options.now() - days * DAY_MS;
    try {
      const result = await this.deps.store.deleteOlderThan(cutoff);
      for (const customerId of result.customerIds) {
        await this.deps.profiles.invalidate(customerId);
      }
      this.log.info({ days, deleted: result.count, customers: result.customerIds.length }, 'Cleanup complete');
      return { deleted: result.count };
    } catch (err) {
      this.log.error({ err, days }, 'Cleanup failed');
      return { deleted: 0 };
    }
  }

  /** Erase a customer's stored conversation fragments */
  async forgetCustomer(customerId: string): Promise<DeletionResult> {
    try {
      const deleted = await this.deps.store.deleteByCustomer(customerId);
      await this.deps.profiles.invalidate(customerId);
      this.log.info({ customerId, deleted }, 'Customer fragments erased');
      return { deleted, degraded: false };
    } catch (err) {
      this.log.error({ err, customerId }, 'Customer erasure failed');
      return { deleted: 0, degraded: true };
    }
  }

  // ───── Helpers ────────────────────────────────────────────────

  /** Follow merge redirects; the id as given when the directory is unreachable */
  private async canonicalId(customerId: string): Promise<string> {
    try {
      const record = await this.deps.resolver.canonicalRecord(customerId);
      return record?.customerId ?? customerId;
    } catch (err) {
      this.log.warn({ err, customerId }, 'Identity directory unavailable, reading by the id as given');
      return customerId;
    }
  }

  private fragmentTimestamp(raw: string | undefined): string | null {
    if (raw === undefined) return new Date(this.options.now()).toISOString();
    const time = Date.parse(raw);
    return Number.isNaN(time) ? null : new Date(time).toISOString();
  }

  private embed(text: string): Promise<number[]> {
    return this.deps.guard.run('embedding', 'embed', () => this.deps.embedder.embed(text));
  }

  /** A fragment stored without an embedding is still found chronologically */
  private async embedOrEmpty(text: string): Promise<number[]> {
    try {
      return await this.embed(text);
    } catch (err) {
      this.log.warn({ err }, 'Embedding unavailable, storing fragment without one');
      return [];
    }
  }
}
