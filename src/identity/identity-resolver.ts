/**
 * Identity Resolver
 *
 * Maps contact signals (phone, email, name) to a canonical customer identity,
 * links identifiers, and merges identities that turn out to be one person.
 *
 * Merges run in five steps, each safe to repeat, so a merge interrupted by a
 * store failure is finished by the next link call over the same identifiers:
 *   1. save the survivor with the union of both records
 *   2. mark the loser `mergedInto` the survivor
 *   3. repoint the loser's index entries
 *   4. rewrite the loser's fragments to the survivor
 *   5. invalidate both cached profiles
 *
 * Resolve-then-create and link sections hold a lock over the normalized
 * identifiers involved, so one identifier never ends up on two identities.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  IdentityDirectory,
  IdentityRecord,
  LinkResult,
  ProfileCacheControl,
  ResolutionResult,
  ResolutionSignals,
} from './types';
import {
  IdentifierKind,
  NormalizedIdentifier,
  extractPhoneFromGatewayEmail,
  isGatewayEmail,
  normalizeIdentifier,
} from './normalizer';
import { nameSimilarity } from './name-similarity';
import { SemanticStore } from '../store/types';
import { KeyedMutex } from '../concurrency/keyed-mutex';
import { logger } from '../observability/logger';
import { maskIdentifier } from '../observability/pii-redactor';
import { identityMerges, identityResolutions } from '../observability/metrics';

const PHONE_CONFIDENCE = 0.9;
const EMAIL_CONFIDENCE = 0.95;
const NAME_CONFIDENCE_SCALE = 0.7;
const SOURCE_AGREEMENT_BOOST = 0.1;
const STRONG_LINK = 0.9;
const REDIRECT_HOPS = 8;
const FRAGMENT_PAGE = 100;

type CandidateSource = 'phone' | 'email' | 'name';

interface Candidate {
  customerId: string;
  source: CandidateSource;
  confidence: number;
}

interface ContactSignals {
  phones: string[];
  emails: string[];
}

export interface IdentityResolverOptions {
  countryCode: string;
  confidenceThreshold: number;
  nameMatchFloor: number;
  nameScanLimit: number;
  now?: () => number;
}

const DEFAULT_OPTIONS: IdentityResolverOptions = {
  countryCode: '1',
  confidenceThreshold: 0.8,
  nameMatchFloor: 70,
  nameScanLimit: 1000,
};

/** Identifier count, used first when picking a merge survivor */
function identifierCount(record: IdentityRecord): number {
  return record.phones.length + record.emails.length;
}

/** Mean link confidence over the record's identifiers */
export function aggregateConfidence(record: IdentityRecord): number {
  const values = Object.values(record.linkConfidence);
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function strongPersonalEmails(record: IdentityRecord): string[] {
  return record.emails.filter(
    (email) => (record.linkConfidence[email] ?? 0) >= STRONG_LINK && !isGatewayEmail(email),
  );
}

/** Both sides hold a strong personal email the other lacks */
export function hasMergeConflict(a: IdentityRecord, b: IdentityRecord): boolean {
  const aOnly = strongPersonalEmails(a).some((email) => !b.emails.includes(email));
  const bOnly = strongPersonalEmails(b).some((email) => !a.emails.includes(email));
  return aOnly && bOnly;
}

/**
 * Survivor first. Normally: more identifiers, then higher aggregate
 * confidence. On a conflict the two criteria swap. Last resort: smaller id.
 */
export function chooseSurvivor(
  a: IdentityRecord,
  b: IdentityRecord,
  conflict: boolean,
): [IdentityRecord, IdentityRecord] {
  const byCount = identifierCount(b) - identifierCount(a);
  const byConfidence = aggregateConfidence(b) - aggregateConfidence(a);
  const criteria = conflict ? [byConfidence, byCount] : [byCount, byConfidence];
  for (const diff of criteria) {
    if (diff > 0) return [b, a];
    if (diff < 0) return [a, b];
  }
  return a.customerId < b.customerId ? [a, b] : [b, a];
}

function union(first: string[], second: string[]): string[] {
  return [...new Set([...first, ...second])];
}

function lockKey(id: NormalizedIdentifier): string {
  return `${id.kind}:${id.value}`;
}

export class IdentityResolver {
  private readonly log = logger.child({ component: 'identity-resolver' });
  private readonly mergeLock = new KeyedMutex();
  private readonly identifierLock = new KeyedMutex();
  private readonly options: IdentityResolverOptions;
  private readonly now: () => number;

  constructor(
    private readonly directory: IdentityDirectory,
    private readonly store: SemanticStore,
    private readonly profiles: ProfileCacheControl,
    options?: Partial<IdentityResolverOptions>,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.now = this.options.now ?? Date.now;
  }

  // ───── Resolution ─────────────────────────────────────────────

  async resolve(signals: ResolutionSignals, threshold = this.options.confidenceThreshold): Promise<ResolutionResult> {
    const contact = this.classify(signals);
    try {
      const candidates: Candidate[] = [];
      for (const phone of contact.phones) {
        const owner = await this.canonicalOwner('phone', phone);
        if (owner) candidates.push({ customerId: owner, source: 'phone', confidence: PHONE_CONFIDENCE });
      }
      for (const email of contact.emails) {
        const owner = await this.canonicalOwner('email', email);
        if (owner) candidates.push({ customerId: owner, source: 'email', confidence: EMAIL_CONFIDENCE });
      }
      const name = signals.name?.trim();
      if (name) candidates.push(...(await this.nameCandidates(name)));

      const best = this.bestGroup(candidates);
      if (!best) {
        identityResolutions.inc({ outcome: 'no_candidates' });
        return { customerId: null, confidence: 0, degraded: false };
      }
      if (best.confidence >= threshold) {
        identityResolutions.inc({ outcome: 'matched' });
        this.log.debug({ customerId: best.customerId, confidence: best.confidence }, 'Identity resolved');
        return { customerId: best.customerId, confidence: best.confidence, degraded: false };
      }
      identityResolutions.inc({ outcome: 'low_confidence' });
      this.log.info(
        { candidateId: best.customerId, confidence: best.confidence, threshold },
        'Low confidence identity match',
      );
      return { customerId: null, confidence: best.confidence, candidateId: best.customerId, degraded: false };
    } catch (err) {
      identityResolutions.inc({ outcome: 'degraded' });
      this.log.error(
        { err, phones: contact.phones.map(maskIdentifier), emails: contact.emails.map(maskIdentifier) },
        'Identity resolution failed, directory unavailable',
      );
      return { customerId: null, confidence: 0, degraded: true };
    }
  }

  /**
   * Contact values are classified by content, so a phone passed as the
   * email (or the other way round) resolves the same. A gateway email also
   * yields its embedded phone.
   */
  classify(signals: ResolutionSignals): ContactSignals {
    const phones: string[] = [];
    const emails: string[] = [];
    for (const raw of [signals.phone, signals.email]) {
      if (!raw || !raw.trim()) continue;
      const id = normalizeIdentifier(raw, this.options.countryCode);
      if (id.kind === 'email') {
        emails.push(id.value);
        const embedded = extractPhoneFromGatewayEmail(id.value, this.options.countryCode);
        if (embedded) phones.push(embedded);
      } else {
        phones.push(id.value);
      }
    }
    return { phones: [...new Set(phones)], emails: [...new Set(emails)] };
  }

  /**
   * Run `fn` exclusively over the identifiers the signals carry. Signals
   * with a name only lock on the lower-cased name.
   */
  withIdentifierLock<T>(signals: ResolutionSignals, fn: () => Promise<T>): Promise<T> {
    const contact = this.classify(signals);
    const keys = [
      ...contact.phones.map((value) => lockKey({ kind: 'phone', value })),
      ...contact.emails.map((value) => lockKey({ kind: 'email', value })),
    ];
    const name = signals.name?.trim().toLowerCase();
    if (keys.length === 0 && name) keys.push(`name:${name}`);
    return this.identifierLock.runExclusive(keys, fn);
  }

  private async nameCandidates(name: string): Promise<Candidate[]> {
    const entries = await this.directory.listDisplayNames(this.options.nameScanLimit);
    const bestRatio = new Map<string, number>();
    for (const entry of entries) {
      const ratio = nameSimilarity(name, entry.name);
      if (ratio < this.options.nameMatchFloor) continue;
      bestRatio.set(entry.customerId, Math.max(ratio, bestRatio.get(entry.customerId) ?? 0));
    }
    return [...bestRatio].map(([customerId, ratio]) => ({
      customerId,
      source: 'name' as const,
      confidence: (ratio / 100) * NAME_CONFIDENCE_SCALE,
    }));
  }

  private bestGroup(candidates: Candidate[]): { customerId: string; confidence: number } | null {
    const groups = new Map<string, Candidate[]>();
    for (const candidate of candidates) {
      const group = groups.get(candidate.customerId) ?? [];
      group.push(candidate);
      groups.set(candidate.customerId, group);
    }

    let best: { customerId: string; confidence: number } | null = null;
    for (const [customerId, group] of groups) {
      const mean = group.reduce((sum, c) => sum + c.confidence, 0) / group.length;
      const sources = new Set(group.map((c) => c.source)).size;
      const confidence = Math.min(1, mean + SOURCE_AGREEMENT_BOOST * (sources - 1));
      if (
        !best
        || confidence > best.confidence
        || (confidence === best.confidence && customerId < best.customerId)
      ) {
        best = { customerId, confidence };
      }
    }
    return best;
  }

  /** Index owner of an identifier, following merge redirects */
  async canonicalOwner(kind: IdentifierKind, identifier: string): Promise<string | null> {
    const owner = await this.directory.lookup(kind, identifier);
    if (!owner) return null;
    const record = await this.canonicalRecord(owner);
    return record?.customerId ?? null;
  }

  /** Follow `mergedInto` redirects to the canonical record */
  async canonicalRecord(customerId: string): Promise<IdentityRecord | null> {
    let record = await this.directory.get(customerId);
    for (let hop = 0; record?.mergedInto && hop < REDIRECT_HOPS; hop++) {
      record = await this.directory.get(record.mergedInto);
    }
    return record;
  }

  // ───── Creation & linking ─────────────────────────────────────

  /** New identity owning the supplied identifiers (link confidence 1.0) */
  async createIdentity(signals: ResolutionSignals): Promise<IdentityRecord> {
    const contact = this.classify(signals);
    return this.persistNew(
      [
        ...contact.phones.map((value) => ({ kind: 'phone' as const, value })),
        ...contact.emails.map((value) => ({ kind: 'email' as const, value })),
      ],
      signals.name,
    );
  }

  private async persistNew(ids: NormalizedIdentifier[], displayName?: string): Promise<IdentityRecord> {
    const name = displayName?.trim();
    const timestamp = new Date(this.now()).toISOString();
    const linkConfidence: Record<string, number> = {};
    for (const id of ids) linkConfidence[id.value] = 1;

    const record: IdentityRecord = {
      customerId: `cust_${uuidv4()}`,
      displayName: name || undefined,
      names: name ? [name] : [],
      phones: union(ids.filter((id) => id.kind === 'phone').map((id) => id.value), []),
      emails: union(ids.filter((id) => id.kind === 'email').map((id) => id.value), []),
      linkConfidence,
      createdAt: timestamp,
      updatedAt: timestamp,
      needsManualReview: false,
    };

    await this.directory.save(record);
    await this.assignAll(record, record.customerId);
    this.log.info(
      { customerId: record.customerId, identifiers: identifierCount(record) },
      'Identity created',
    );
    return record;
  }

  /**
   * Link two identifiers as belonging to one customer.
   * Repeating a link is a no-op; a link between two existing identities merges them.
   */
  async linkIdentities(identifierA: string, identifierB: string, displayName?: string): Promise<LinkResult> {
    const left = normalizeIdentifier(identifierA, this.options.countryCode);
    const right = normalizeIdentifier(identifierB, this.options.countryCode);
    try {
      return await this.link(left, right, displayName, 1);
    } catch (err) {
      this.log.error(
        { err, a: maskIdentifier(left.value), b: maskIdentifier(right.value) },
        'Identity link failed',
      );
      return { success: false, merged: false };
    }
  }

  /** Link with an explicit confidence for the newly attached identifier. Throws on store failure. */
  private link(
    left: NormalizedIdentifier,
    right: NormalizedIdentifier,
    displayName: string | undefined,
    confidence: number,
  ): Promise<LinkResult> {
    return this.identifierLock.runExclusive(
      [lockKey(left), lockKey(right)],
      () => this.linkExclusive(left, right, displayName, confidence),
    );
  }

  private async linkExclusive(
    left: NormalizedIdentifier,
    right: NormalizedIdentifier,
    displayName: string | undefined,
    confidence: number,
  ): Promise<LinkResult> {
    const [rawA, rawB] = [
      await this.directory.lookup(left.kind, left.value),
      await this.directory.lookup(right.kind, right.value),
    ];
    const ownerA = rawA ? (await this.canonicalRecord(rawA))?.customerId ?? null : null;
    const ownerB = rawB ? (await this.canonicalRecord(rawB))?.customerId ?? null : null;

    if (!ownerA && !ownerB) {
      const created = await this.persistNew([left, right], displayName);
      return { success: true, customerId: created.customerId, merged: false };
    }

    if (ownerA && ownerB && ownerA === ownerB) {
      // Finish a merge whose index repointing was interrupted
      for (const raw of [rawA, rawB]) {
        if (raw && raw !== ownerA) await this.resumeMerge(ownerA, raw);
      }
      if (displayName) await this.attach(ownerA, [], displayName, confidence);
      return { success: true, customerId: ownerA, merged: false };
    }

    if (ownerA && ownerB) {
      const { survivorId, loserId } = await this.mergeIdentities(ownerA, ownerB);
      if (displayName) await this.attach(survivorId, [], displayName, confidence);
      return { success: true, customerId: survivorId, merged: loserId !== null, mergedFrom: loserId ?? undefined };
    }

    const owner = ownerA ?? ownerB;
    if (!owner) return { success: false, merged: false };
    const unowned = ownerA ? right : left;
    await this.attach(owner, [unowned], displayName, confidence);
    return { success: true, customerId: owner, merged: false };
  }

  private async attach(
    customerId: string,
    ids: NormalizedIdentifier[],
    displayName: string | undefined,
    confidence: number,
  ): Promise<IdentityRecord> {
    const record = await this.directory.get(customerId);
    if (!record) throw new Error(`Identity ${customerId} not found`);
    return this.attachToRecord(record, ids, displayName, confidence);
  }

  private async attachToRecord(
    record: IdentityRecord,
    ids: NormalizedIdentifier[],
    displayName: string | undefined,
    confidence: number,
  ): Promise<IdentityRecord> {
    const name = displayName?.trim();
    const updated: IdentityRecord = {
      ...record,
      displayName: record.displayName ?? (name || undefined),
      names: name ? union(record.names, [name]) : record.names,
      phones: union(record.phones, ids.filter((id) => id.kind === 'phone').map((id) => id.value)),
      emails: union(record.emails, ids.filter((id) => id.kind === 'email').map((id) => id.value)),
      linkConfidence: { ...record.linkConfidence },
      updatedAt: new Date(this.now()).toISOString(),
    };
    for (const id of ids) {
      updated.linkConfidence[id.value] = Math.max(confidence, updated.linkConfidence[id.value] ?? 0);
    }

    await this.directory.save(updated);
    for (const id of ids) await this.directory.assign(id.kind, id.value, updated.customerId);
    return updated;
  }

  // ───── Merging ────────────────────────────────────────────────

  /**
   * Merge two identities. Exclusive per identity pair; waits for in-flight
   * profile rebuilds on either side before touching anything.
   */
  async mergeIdentities(a: string, b: string): Promise<{ survivorId: string; loserId: string | null }> {
    return this.mergeLock.runExclusive([a, b], async () => {
      const [left, right] = [await this.canonicalRecord(a), await this.canonicalRecord(b)];
      if (!left || !right) throw new Error(`Cannot merge unknown identity (${a}, ${b})`);
      if (left.customerId === right.customerId) {
        return { survivorId: left.customerId, loserId: null };
      }

      await Promise.all([this.profiles.awaitRebuild(left.customerId), this.profiles.awaitRebuild(right.customerId)]);

      const conflict = hasMergeConflict(left, right);
      const [survivor, loser] = chooseSurvivor(left, right, conflict);
      const timestamp = new Date(this.now()).toISOString();

      const linkConfidence: Record<string, number> = { ...survivor.linkConfidence };
      for (const [identifier, confidence] of Object.entries(loser.linkConfidence)) {
        linkConfidence[identifier] = Math.max(confidence, linkConfidence[identifier] ?? 0);
      }
      const merged: IdentityRecord = {
        customerId: survivor.customerId,
        displayName: survivor.displayName ?? loser.displayName,
        names: union(survivor.names, loser.names),
        phones: union(survivor.phones, loser.phones),
        emails: union(survivor.emails, loser.emails),
        linkConfidence,
        createdAt: survivor.createdAt < loser.createdAt ? survivor.createdAt : loser.createdAt,
        updatedAt: timestamp,
        needsManualReview: survivor.needsManualReview || loser.needsManualReview || conflict,
      };

      if (conflict) {
        this.log.warn(
          { survivorId: survivor.customerId, loserId: loser.customerId },
          'Merge conflict: both identities hold a strong personal email, flagged for manual review',
        );
      }

      await this.directory.save(merged);
      await this.directory.save({ ...loser, mergedInto: survivor.customerId, updatedAt: timestamp });
      await this.completeMerge(merged.customerId, loser);

      identityMerges.inc({ result: conflict ? 'conflict' : 'merged' });
      this.log.info({ survivorId: merged.customerId, loserId: loser.customerId }, 'Identities merged');
      return { survivorId: merged.customerId, loserId: loser.customerId };
    });
  }

  /** Re-run the repeatable tail of a merge whose loser already redirects */
  private async resumeMerge(survivorId: string, loserId: string): Promise<void> {
    await this.mergeLock.runExclusive([survivorId, loserId], async () => {
      const loser = await this.directory.get(loserId);
      if (!loser || loser.mergedInto === undefined) return;
      this.log.warn({ survivorId, loserId }, 'Resuming interrupted merge');
      await this.completeMerge(survivorId, loser);
      identityMerges.inc({ result: 'resumed' });
    });
  }

  private async completeMerge(survivorId: string, loser: IdentityRecord): Promise<void> {
    await this.assignAll(loser, survivorId);

    const seen = new Set<string>();
    for (;;) {
      const page = await this.store.getByCustomer(loser.customerId, undefined, FRAGMENT_PAGE);
      const fresh = page.filter((fragment) => !seen.has(fragment.id));
      if (fresh.length === 0) break;
      for (const fragment of fresh) {
        seen.add(fragment.id);
        await this.store.updateCustomerIdentity(fragment.id, survivorId);
      }
    }

    await this.profiles.invalidate(survivorId);
    await this.profiles.invalidate(loser.customerId);
  }

  private async assignAll(record: IdentityRecord, customerId: string): Promise<void> {
    for (const phone of record.phones) await this.directory.assign('phone', phone, customerId);
    for (const email of record.emails) await this.directory.assign('email', email, customerId);
  }

  /**
   * Bind every identifier in the signals to `customerId`: unowned ones are
   * attached, ones owned by another identity trigger a merge. Returns the
   * identity everything ended up on. Throws on store failure.
   */
  async absorbSignals(
    customerId: string,
    signals: ResolutionSignals,
    confidence: number,
  ): Promise<{ customerId: string; mergedFrom: string[] }> {
    const contact = this.classify(signals);
    const ids: NormalizedIdentifier[] = [
      ...contact.emails.map((value) => ({ kind: 'email' as const, value })),
      ...contact.phones.map((value) => ({ kind: 'phone' as const, value })),
    ];

    let current = customerId;
    const mergedFrom: string[] = [];
    const unowned: NormalizedIdentifier[] = [];
    for (const id of ids) {
      const owner = await this.canonicalOwner(id.kind, id.value);
      if (!owner) {
        unowned.push(id);
      } else if (owner !== current) {
        const { survivorId, loserId } = await this.mergeIdentities(current, owner);
        if (loserId) mergedFrom.push(loserId);
        current = survivorId;
      }
    }

    const record = await this.directory.get(current);
    const name = signals.name?.trim();
    const knownName = name !== undefined && record !== null && record.names.includes(name);
    if (unowned.length > 0 || (name && !knownName)) {
      await this.attach(current, unowned, name, confidence);
    }
    return { customerId: current, mergedFrom };
  }

  /** Normalize a raw contact value the way resolution does */
  normalize(raw: string): NormalizedIdentifier {
    return normalizeIdentifier(raw, this.options.countryCode);
  }
}
