/**
 * Identity Directory
 *
 * Identity records plus the phone/email → identity index.
 */

import Redis from 'ioredis';
import { DisplayNameEntry, IdentityDirectory, IdentityRecord } from './types';
import { IdentifierKind } from './normalizer';
import { MalformedRecordError } from '../errors/errors';
import { isRecord } from '../store/fragment-records';
import { StoreGuard } from '../resilience/store-guard';
import { logger } from '../observability/logger';
import { malformedRecords } from '../observability/metrics';

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isConfidenceMap(value: unknown): value is Record<string, number> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === 'number');
}

function isIdentityRecord(value: unknown): value is IdentityRecord {
  if (!isRecord(value)) return false;
  return typeof value.customerId === 'string'
    && (value.displayName === undefined || typeof value.displayName === 'string')
    && isStringArray(value.names)
    && isStringArray(value.phones)
    && isStringArray(value.emails)
    && isConfidenceMap(value.linkConfidence)
    && typeof value.createdAt === 'string'
    && typeof value.updatedAt === 'string'
    && (value.mergedInto === undefined || typeof value.mergedInto === 'string')
    && typeof value.needsManualReview === 'boolean';
}

export function decodeIdentityRecord(raw: string, recordId: string): IdentityRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new MalformedRecordError(recordId, 'invalid JSON');
  }
  if (!isIdentityRecord(parsed)) throw new MalformedRecordError(recordId, 'missing identity fields');
  return parsed;
}

function namesOf(record: IdentityRecord): string[] {
  const names = record.displayName ? [record.displayName, ...record.names] : record.names;
  return [...new Set(names)];
}

// ───── Redis Implementation ─────────────────────────────────────

export class RedisIdentityDirectory implements IdentityDirectory {
  private readonly log = logger.child({ component: 'identity-directory-redis' });

  constructor(
    private readonly redis: Redis,
    private readonly prefix: string,
  ) {}

  async get(customerId: string): Promise<IdentityRecord | null> {
    const raw = await this.redis.get(this.recordKey(customerId));
    if (!raw) return null;
    return decodeIdentityRecord(raw, customerId);
  }

  async save(record: IdentityRecord): Promise<void> {
    const created = Date.parse(record.createdAt);
    await this.redis
      .multi()
      .set(this.recordKey(record.customerId), JSON.stringify(record))
      .zadd(this.allKey, Number.isNaN(created) ? 0 : created, record.customerId)
      .exec();
  }

  async lookup(kind: IdentifierKind, identifier: string): Promise<string | null> {
    return this.redis.get(this.indexKey(kind, identifier));
  }

  async assign(kind: IdentifierKind, identifier: string, customerId: string): Promise<void> {
    await this.redis.set(this.indexKey(kind, identifier), customerId);
  }

  async listDisplayNames(limit: number): Promise<DisplayNameEntry[]> {
    const entries: DisplayNameEntry[] = [];
    const pageSize = 200;
    for (let start = 0; entries.length < limit; start += pageSize) {
      const ids = await this.redis.zrange(this.allKey, start, start + pageSize - 1);
      if (ids.length === 0) break;
      const raws = await this.redis.mget(...ids.map((id) => this.recordKey(id)));
      raws.forEach((raw, idx) => {
        if (!raw) return;
        try {
          const record = decodeIdentityRecord(raw, ids[idx]);
          if (record.mergedInto) return;
          for (const name of namesOf(record)) entries.push({ customerId: record.customerId, name });
        } catch (err) {
          if (!(err instanceof MalformedRecordError)) throw err;
          malformedRecords.inc({ source: 'identity-directory' });
          this.log.warn({ customerId: ids[idx], reason: err.reason }, 'Skipping malformed identity record');
        }
      });
    }
    return entries.slice(0, limit);
  }

  private recordKey(customerId: string): string {
    return `${this.prefix}identity:${customerId}`;
  }

  private indexKey(kind: IdentifierKind, identifier: string): string {
    return `${this.prefix}idx:${kind}:${identifier}`;
  }

  private get allKey(): string {
    return `${this.prefix}identities`;
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryIdentityDirectory implements IdentityDirectory {
  private readonly records = new Map<string, IdentityRecord>();
  private readonly index = new Map<string, string>();

  async get(customerId: string): Promise<IdentityRecord | null> {
    const record = this.records.get(customerId);
    return record ? structuredClone(record) : null;
  }

  async save(record: IdentityRecord): Promise<void> {
    this.records.set(record.customerId, structuredClone(record));
  }

  async lookup(kind: IdentifierKind, identifier: string): Promise<string | null> {
    return this.index.get(`${kind}:${identifier}`) ?? null;
  }

  async assign(kind: IdentifierKind, identifier: string, customerId: string): Promise<void> {
    this.index.set(`${kind}:${identifier}`, customerId);
  }

  async listDisplayNames(limit: number): Promise<DisplayNameEntry[]> {
    const entries: DisplayNameEntry[] = [];
    for (const record of this.records.values()) {
      if (record.mergedInto) continue;
      for (const name of namesOf(record)) entries.push({ customerId: record.customerId, name });
      if (entries.length >= limit) break;
    }
    return entries.slice(0, limit);
  }

  get size(): number {
    return this.records.size;
  }
}

// ───── Guarded wrapper ──────────────────────────────────────────

export class GuardedIdentityDirectory implements IdentityDirectory {
  constructor(
    private readonly inner: IdentityDirectory,
    private readonly guard: StoreGuard,
  ) {}

  get(customerId: string): Promise<IdentityRecord | null> {
    return this.guard.run('identity_directory', 'get', () => this.inner.get(customerId));
  }

  save(record: IdentityRecord): Promise<void> {
    return this.guard.run('identity_directory', 'save', () => this.inner.save(record));
  }

  lookup(kind: IdentifierKind, identifier: string): Promise<string | null> {
    return this.guard.run('identity_directory', 'lookup', () => this.inner.lookup(kind, identifier));
  }

  assign(kind: IdentifierKind, identifier: string, customerId: string): Promise<void> {
    return this.guard.run('identity_directory', 'assign', () => this.inner.assign(kind, identifier, customerId));
  }

  listDisplayNames(limit: number): Promise<DisplayNameEntry[]> {
    return this.guard.run('identity_directory', 'listDisplayNames', () => this.inner.listDisplayNames(limit));
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createIdentityDirectory(redis?: Redis, keyPrefix = 'cce:'): IdentityDirectory {
  if (redis) {
    logger.info('Identity directory: Redis-backed');
    return new RedisIdentityDirectory(redis, keyPrefix);
  }
  logger.info('Identity directory: In-memory');
  return new InMemoryIdentityDirectory();
}
