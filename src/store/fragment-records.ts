import { ConversationFragment } from './types';
import { MalformedRecordError } from '../errors/errors';
import { logger } from '../observability/logger';
import { malformedRecords } from '../observability/metrics';

const log = logger.child({ component: 'fragment-records' });

export interface TimedFragment {
  fragment: ConversationFragment;
  /** Parsed timestamp, epoch ms */
  time: number;
}

export function parseTimestamp(fragment: ConversationFragment): number {
  const time = typeof fragment.timestamp === 'string' ? Date.parse(fragment.timestamp) : NaN;
  if (Number.isNaN(time)) {
    throw new MalformedRecordError(fragment.id, `unparseable timestamp "${String(fragment.timestamp)}"`);
  }
  return time;
}

/**
 * Attach parsed timestamps, skipping (and logging) fragments whose timestamp
 * cannot be parsed. Never throws for a bad record; the rest of the batch goes on.
 */
export function toTimedFragments(fragments: ConversationFragment[], source: string): TimedFragment[] {
  const timed: TimedFragment[] = [];
  for (const fragment of fragments) {
    try {
      timed.push({ fragment, time: parseTimestamp(fragment) });
    } catch (err) {
      if (!(err instanceof MalformedRecordError)) throw err;
      malformedRecords.inc({ source });
      log.warn({ fragmentId: fragment.id, source, reason: err.reason }, 'Skipping malformed fragment');
    }
  }
  return timed;
}

/** Newest first; ties keep input order */
export function newestFirst(fragments: TimedFragment[]): TimedFragment[] {
  return [...fragments].sort((a, b) => b.time - a.time);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFragment(value: unknown): value is ConversationFragment {
  if (!isRecord(value)) return false;
  const v = value;
  return typeof v.id === 'string'
    && typeof v.customerId === 'string'
    && typeof v.channel === 'string'
    && (v.direction === 'inbound' || v.direction === 'outbound')
    && typeof v.timestamp === 'string'
    && typeof v.text === 'string'
    && Array.isArray(v.embedding)
    && isRecord(v.metadata);
}

/** Decode a stored fragment; throws MalformedRecordError on bad JSON or shape */
export function decodeFragment(raw: string, recordId: string): ConversationFragment {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new MalformedRecordError(recordId, 'invalid JSON');
  }
  if (!isFragment(parsed)) {
    throw new MalformedRecordError(recordId, 'missing fragment fields');
  }
  const tags = Array.isArray(parsed.metadata.tags) ? parsed.metadata.tags : [];
  return { ...parsed, metadata: { ...parsed.metadata, tags } };
}
