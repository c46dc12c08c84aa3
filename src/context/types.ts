import { ContextItem } from '../scoring/relevance-scorer';
import { ConversationThread } from '../threading/conversation-threader';
import { CustomerProfile } from '../profile/types';

export type Mood = 'positive' | 'neutral' | 'negative';

export type UrgencyLevel = 'normal' | 'high';

export type SuggestedTone = 'friendly' | 'empathetic' | 'responsive' | 'professional';

/** `degraded` and `cancelled` summaries carry an empty profile, history and threads */
export type ContextStatus = 'ok' | 'degraded' | 'cancelled';

export interface CurrentAnalysis {
  topic: string;
  mood: Mood;
  urgency: UrgencyLevel;
  suggestedTone: SuggestedTone;
}

export interface ContextSummary {
  customerProfile: CustomerProfile;
  /** Highest finalScore first */
  relevantHistory: ContextItem[];
  threads: ConversationThread[];
  currentTopic: string;
  customerMood: Mood;
  urgencyLevel: UrgencyLevel;
  suggestedTone: SuggestedTone;
  shortSummary: string;
  detailedSummary: string;
  /** Prompt-ready block for a response generator */
  llmContext: string;
  status: ContextStatus;
}

export interface GetContextOptions {
  maxItems?: number;
  windowDays?: number;
  signal?: AbortSignal;
}
