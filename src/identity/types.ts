import { IdentifierKind } from './normalizer';

/**
 * Persisted identity. Records are never deleted: the losing side of a merge
 * keeps a `mergedInto` redirect to the survivor.
 */
export interface IdentityRecord {
  customerId: string;
  displayName?: string;
  names: string[];
  /** Normalized phones (`+<digits>`) */
  phones: string[];
  /** Normalized emails */
  emails: string[];
  /** Normalized identifier → link confidence in [0, 1] */
  linkConfidence: Record<string, number>;
  createdAt: string;
  updatedAt: string;
  mergedInto?: string;
  /** Set when a merge joined two identities that both carried a strong personal email */
  needsManualReview: boolean;
}

export interface ResolutionSignals {
  phone?: string;
  email?: string;
  name?: string;
}

export interface ResolutionResult {
  /** null when no candidate reaches the threshold */
  customerId: string | null;
  confidence: number;
  /** Best candidate below the threshold */
  candidateId?: string;
  /** True when the directory could not be reached */
  degraded: boolean;
}

export interface LinkResult {
  success: boolean;
  customerId?: string;
  merged: boolean;
  /** Identity folded into `customerId` by this call */
  mergedFrom?: string;
}

export interface DisplayNameEntry {
  customerId: string;
  name: string;
}

export interface IdentityDirectory {
  get(customerId: string): Promise<IdentityRecord | null>;
  save(record: IdentityRecord): Promise<void>;
  /** Identity the index maps the identifier to (not redirect-resolved) */
  lookup(kind: IdentifierKind, identifier: string): Promise<string | null>;
  assign(kind: IdentifierKind, identifier: string, customerId: string): Promise<void>;
  /** Known names of canonical (not merged) identities, at most `limit` entries */
  listDisplayNames(limit: number): Promise<DisplayNameEntry[]>;
}

/** Profile cache hooks a merge needs; implemented by the profile service */
export interface ProfileCacheControl {
  awaitRebuild(customerId: string): Promise<void>;
  invalidate(customerId: string): Promise<void>;
}
