/**
 * Profile Service
 *
 * Owns the profile cache (`profile:<customerId>`, 1 hour TTL by default).
 * Rebuilds for one identity coalesce into a single in-flight promise, and a
 * rebuild only writes the cache when no invalidation happened while it ran.
 */

import { CustomerProfile } from './types';
import { ProfileBuilder } from './profile-builder';
import { CacheStore } from '../cache/types';
import { IdentityDirectory, ProfileCacheControl } from '../identity/types';
import { SemanticStore } from '../store/types';
import { isRecord } from '../store/fragment-records';
import { InflightRegistry } from '../concurrency/inflight';
import { OperationCancelledError, throwIfAborted } from '../errors/errors';
import { logger } from '../observability/logger';
import { profileCacheHits, profileCacheMisses, profileRebuildDuration } from '../observability/metrics';

export interface GetProfileOptions {
  forceRebuild?: boolean;
  /** Aborting detaches this caller only; the shared rebuild carries on */
  signal?: AbortSignal;
}

export interface ProfileServiceOptions {
  ttlSeconds: number;
  historyLimit: number;
  now: () => number;
}

const DEFAULT_OPTIONS: ProfileServiceOptions = {
  ttlSeconds: 3600,
  historyLimit: 500,
  now: Date.now,
};

function isCustomerProfile(value: unknown): value is CustomerProfile {
  return isRecord(value)
    && typeof value.customerId === 'string'
    && typeof value.primaryName === 'string'
    && Array.isArray(value.phones)
    && Array.isArray(value.emails)
    && isRecord(value.contactPreferences)
    && isRecord(value.serviceHistory)
    && isRecord(value.personalityTraits)
    && isRecord(value.valueIndicators)
    && isRecord(value.riskFactors)
    && isRecord(value.privacySettings)
    && typeof value.fragmentCount === 'number';
}

export class ProfileService implements ProfileCacheControl {
  private readonly log = logger.child({ component: 'profile-service' });
  private readonly rebuilds = new InflightRegistry<CustomerProfile>();
  /** Invalidations seen by each running rebuild; entries live only while it runs */
  private readonly invalidations = new Map<string, number>();
  private readonly options: ProfileServiceOptions;

  constructor(
    private readonly cache: CacheStore,
    private readonly store: SemanticStore,
    private readonly directory: IdentityDirectory,
    private readonly builder: ProfileBuilder,
    options?: Partial<ProfileServiceOptions>,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /** Cached profile, or a (coalesced) rebuild. Throws when the stores are unavailable. */
  async getProfile(customerId: string, options: GetProfileOptions = {}): Promise<CustomerProfile> {
    throwIfAborted(options.signal, 'getProfile');

    if (!options.forceRebuild) {
      const cached = await this.readCache(customerId);
      if (cached) {
        profileCacheHits.inc();
        return cached;
      }
    }
    profileCacheMisses.inc();

    const shared = this.rebuilds.run(customerId, () => this.rebuild(customerId));
    return this.detachable(shared, options.signal);
  }

  /** Drop the cached profile; rebuilds already running will not write their result */
  async invalidate(customerId: string): Promise<void> {
    const seen = this.invalidations.get(customerId);
    if (seen !== undefined) this.invalidations.set(customerId, seen + 1);
    await this.cache.del(this.cacheKey(customerId));
  }

  /** Resolves once any in-flight rebuild for the identity has settled */
  async awaitRebuild(customerId: string): Promise<void> {
    const inflight = this.rebuilds.get(customerId);
    if (!inflight) return;
    try {
      await inflight;
    } catch (err) {
      this.log.debug({ err, customerId }, 'In-flight rebuild failed while awaited');
    }
  }

  private async rebuild(customerId: string): Promise<CustomerProfile> {
    this.invalidations.set(customerId, 0);
    const endTimer = profileRebuildDuration.startTimer();
    try {
      const [identity, fragments] = await Promise.all([
        this.directory.get(customerId),
        this.store.getByCustomer(customerId, undefined, this.options.historyLimit),
      ]);
      const profile = this.builder.buildProfile(customerId, identity, fragments, this.options.now());

      if (this.invalidations.get(customerId) === 0) {
        await this.cache.set(this.cacheKey(customerId), profile, this.options.ttlSeconds);
      } else {
        this.log.debug({ customerId }, 'Profile invalidated during rebuild, not caching');
      }
      this.log.debug({ customerId, fragments: profile.fragmentCount }, 'Profile rebuilt');
      return profile;
    } finally {
      this.invalidations.delete(customerId);
      endTimer();
    }
  }

  private async readCache(customerId: string): Promise<CustomerProfile | null> {
    const cached = await this.cache.get(this.cacheKey(customerId));
    if (cached === null || cached === undefined) return null;
    if (!isCustomerProfile(cached)) {
      this.log.warn({ customerId }, 'Discarding malformed cached profile');
      await this.cache.del(this.cacheKey(customerId));
      return null;
    }
    return cached;
  }

  private detachable(shared: Promise<CustomerProfile>, signal?: AbortSignal): Promise<CustomerProfile> {
    if (!signal) return shared;
    return new Promise<CustomerProfile>((resolve, reject) => {
      const onAbort = () => reject(new OperationCancelledError('getProfile'));
      signal.addEventListener('abort', onAbort, { once: true });
      shared.then(
        (profile) => {
          signal.removeEventListener('abort', onAbort);
          resolve(profile);
        },
        (err: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        },
      );
    });
  }

  private cacheKey(customerId: string): string {
    return `profile:${customerId}`;
  }
}
