/**
 * Conversation Threader
 *
 * Groups a customer's fragments into threads: starting from the newest
 * unassigned fragment, older fragments within the window join when they
 * share a (non-general) topic or a thread-worthy intent with the seed.
 */

import { ConversationFragment } from '../store/types';
import { TimedFragment, newestFirst, toTimedFragments } from '../store/fragment-records';
import { KeywordMatcher } from '../keywords/keyword-tables';
import { GENERAL_TOPIC } from '../keywords/types';

export type ThreadStatus = 'active' | 'resolved' | 'escalated' | 'inactive';

export interface ConversationThread {
  threadId: string;
  customerId: string;
  mainTopic: string;
  channels: string[];
  /** ISO-8601 */
  startTime: string;
  /** ISO-8601 */
  lastActivity: string;
  /** Chronological */
  fragmentIds: string[];
  status: ThreadStatus;
}

export interface ThreaderOptions {
  windowDays: number;
  activeDays: number;
}

const DAY_MS = 86_400_000;
const LINKING_INTENTS = ['service_request', 'complaint', 'appointment'];
const SEED_INTENTS = ['service_request', 'complaint'];
const STATUS_LOOKBACK = 3;

export class ConversationThreader {
  private readonly options: ThreaderOptions;

  constructor(
    private readonly keywords: KeywordMatcher,
    options?: Partial<ThreaderOptions>,
  ) {
    this.options = { windowDays: 7, activeDays: 3, ...options };
  }

  /** Threads ordered by last activity, newest first. Malformed fragments are skipped. */
  buildThreads(fragments: ConversationFragment[], now: number): ConversationThread[] {
    const sorted = newestFirst(toTimedFragments(fragments, 'threader'));
    const assigned = new Set<string>();
    const threads: ConversationThread[] = [];
    const windowMs = this.options.windowDays * DAY_MS;

    sorted.forEach((seed, seedIndex) => {
      if (assigned.has(seed.fragment.id)) return;
      assigned.add(seed.fragment.id);

      const topic = this.keywords.detectTopic(seed.fragment.text);
      const seedIntent = seed.fragment.metadata.intent;
      const members: TimedFragment[] = [seed];

      for (const candidate of sorted.slice(seedIndex + 1)) {
        if (assigned.has(candidate.fragment.id)) continue;
        if (seed.time - candidate.time > windowMs) continue;

        const sameTopic = topic !== GENERAL_TOPIC && this.keywords.detectTopic(candidate.fragment.text) === topic;
        const sameIntent = seedIntent !== undefined
          && LINKING_INTENTS.includes(seedIntent)
          && candidate.fragment.metadata.intent === seedIntent;
        if (sameTopic || sameIntent) {
          members.push(candidate);
          assigned.add(candidate.fragment.id);
        }
      }

      if (members.length > 1 || (seedIntent !== undefined && SEED_INTENTS.includes(seedIntent))) {
        threads.push(this.toThread(seed, topic, members, now));
      }
    });

    return threads.sort((a, b) => Date.parse(b.lastActivity) - Date.parse(a.lastActivity));
  }

  private toThread(seed: TimedFragment, topic: string, members: TimedFragment[], now: number): ConversationThread {
    const chronological = [...members].sort((a, b) => a.time - b.time);
    const first = chronological[0];
    const last = chronological[chronological.length - 1];
    return {
      threadId: `thread_${seed.fragment.id}`,
      customerId: seed.fragment.customerId,
      mainTopic: topic,
      channels: [...new Set(chronological.map((m) => m.fragment.channel))],
      startTime: new Date(first.time).toISOString(),
      lastActivity: new Date(last.time).toISOString(),
      fragmentIds: chronological.map((m) => m.fragment.id),
      status: this.status(chronological, now),
    };
  }

  /** Latest three fragments decide resolved / escalated; otherwise recency decides */
  status(chronological: TimedFragment[], now: number): ThreadStatus {
    for (const { fragment } of chronological.slice(-STATUS_LOOKBACK)) {
      if (this.keywords.matchesAny(fragment.text, 'resolution') && fragment.metadata.sentiment === 'positive') {
        return 'resolved';
      }
      if (this.keywords.matchesAny(fragment.text, 'escalation')) {
        return 'escalated';
      }
    }
    const last = chronological[chronological.length - 1];
    const idleDays = Math.floor((now - last.time) / DAY_MS);
    return idleDays <= this.options.activeDays ? 'active' : 'inactive';
  }
}
