/**
 * Conversation fragment + semantic store contract.
 */

export type Channel = 'email' | 'sms' | 'voice';

export type Direction = 'inbound' | 'outbound';

export type Sentiment = 'positive' | 'neutral' | 'negative';

export type Urgency = 'low' | 'normal' | 'high' | 'critical';

export interface FragmentMetadata {
  /** Classified intent, e.g. service_request, complaint, appointment */
  intent?: string;
  sentiment?: Sentiment;
  urgency?: Urgency;
  /** Free-form tags */
  tags: string[];
  /** Sender name as seen on this channel */
  customerName?: string;
  /** Normalized phone the fragment arrived from / went to */
  phoneNumber?: string;
  /** Normalized email the fragment arrived from / went to */
  emailAddress?: string;
  /** Email subject line */
  subject?: string;
}

export interface ConversationFragment {
  id: string;
  /** The only field rewritten after write (identity merges) */
  customerId: string;
  /** Usually a Channel; other strings are tolerated by the scorer */
  channel: string;
  direction: Direction;
  /** ISO-8601 UTC */
  timestamp: string;
  text: string;
  metadata: FragmentMetadata;
  embedding: number[];
}

export interface ScoredFragment {
  fragment: ConversationFragment;
  similarity: number;
}

export interface DeleteResult {
  count: number;
  /** Customers that lost at least one fragment */
  customerIds: string[];
}

export interface SemanticStore {
  put(fragment: ConversationFragment): Promise<void>;
  /** Newest first. `since` is an epoch-ms lower bound (inclusive). */
  getByCustomer(customerId: string, since: number | undefined, limit: number): Promise<ConversationFragment[]>;
  /** Most similar first, only results with similarity >= minSimilarity */
  nearestNeighbors(
    embedding: number[],
    customerId: string | undefined,
    k: number,
    minSimilarity: number,
  ): Promise<ScoredFragment[]>;
  /** Idempotent: rewriting to the current owner is a no-op. Returns false for unknown ids. */
  updateCustomerIdentity(fragmentId: string, newCustomerId: string): Promise<boolean>;
  /** Delete fragments strictly older than the cutoff (epoch ms) */
  deleteOlderThan(cutoff: number): Promise<DeleteResult>;
  deleteByCustomer(customerId: string): Promise<number>;
}
