/**
 * Keyword taxonomy shared by topic detection, service classification,
 * thread status, style and mood analysis.
 */

export interface NamedKeywords {
  name: string;
  keywords: string[];
}

export interface KeywordTables {
  version: number;
  /** Ordered: the first topic with a matching keyword wins */
  topics: NamedKeywords[];
  serviceTypes: NamedKeywords[];
  serviceRequest: string[];
  satisfaction: string[];
  dissatisfaction: string[];
  resolution: string[];
  escalation: string[];
  formalStyle: string[];
  casualStyle: string[];
  politeness: string[];
  urgency: string[];
  detail: string[];
  tech: string[];
  moodPositive: string[];
  moodNegative: string[];
  urgentIndicators: string[];
}

export type KeywordListName = {
  [K in keyof KeywordTables]: KeywordTables[K] extends string[] ? K : never;
}[keyof KeywordTables];

export const GENERAL_TOPIC = 'general';
