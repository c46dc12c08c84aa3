/**
 * Profile Builder
 *
 * Pure: identity record + fragment history in, CustomerProfile out.
 * Fragments are analysed newest first; ties in "most common" go to the
 * value seen first in that order.
 */

import {
  CommunicationStyle,
  ContactPreferences,
  CustomerProfile,
  EngagementLevel,
  PersonalityTraits,
  PrivacySettings,
  RiskFactors,
  ServiceHistory,
  ValueIndicators,
} from './types';
import { IdentityRecord } from '../identity/types';
import { aggregateConfidence } from '../identity/identity-resolver';
import { ConversationFragment, Urgency } from '../store/types';
import { TimedFragment, newestFirst, toTimedFragments } from '../store/fragment-records';
import { KeywordMatcher } from '../keywords/keyword-tables';

const DAY_MS = 86_400_000;
const WEEKDAYS = [0, 1, 2, 3, 4];
const DETAIL_LENGTH = 200;
const RECENT_SENTIMENT_WINDOW = 5;

export const DEFAULT_PRIVACY: PrivacySettings = {
  storeConversations: true,
  learnPreferences: true,
  crossChannelLinking: true,
  analytics: true,
};

/** Mode of the values; ties go to the earliest first appearance */
export function mostCommon<T>(values: T[]): T | undefined {
  return topN(values, 1)[0];
}

export function topN<T>(values: T[], n: number): T[] {
  const counts = new Map<T, number>();
  for (const value of values) counts.set(value, (counts.get(value) ?? 0) + 1);
  // Map iteration order is first appearance; sort is stable
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, n)
    .map(([value]) => value);
}

function unique<T>(values: T[]): T[] {
  return [...new Set(values)];
}

/** Monday = 0 … Sunday = 6, in UTC */
function weekday(time: number): number {
  return (new Date(time).getUTCDay() + 6) % 7;
}

function defaultContactPreferences(): ContactPreferences {
  return {
    preferredChannel: 'email',
    preferredTimes: [],
    preferredDays: [],
    responseUrgency: 'normal',
    communicationStyle: 'formal',
    languagePreference: 'en',
    timezone: 'UTC',
  };
}

function defaultTraits(): PersonalityTraits {
  return { patience: 0.5, politeness: 0.5, detailOriented: 0.5, techSavvy: 0.5, urgencyProne: 0.5 };
}

export class ProfileBuilder {
  constructor(private readonly keywords: KeywordMatcher) {}

  buildProfile(
    customerId: string,
    identity: IdentityRecord | null,
    fragments: ConversationFragment[],
    now: number,
  ): CustomerProfile {
    const history = newestFirst(toTimedFragments(fragments, 'profile-builder'));
    const timestamp = new Date(now).toISOString();

    const fragmentNames = history
      .map((h) => h.fragment.metadata.customerName?.trim())
      .filter((name): name is string => Boolean(name));
    const primaryName = identity?.displayName ?? mostCommon(fragmentNames) ?? '';
    const allNames = unique([...(identity?.names ?? []), ...fragmentNames]);

    const phones = unique([
      ...(identity?.phones ?? []),
      ...history.flatMap((h) => (h.fragment.metadata.phoneNumber ? [h.fragment.metadata.phoneNumber] : [])),
    ]);
    const emails = unique([
      ...(identity?.emails ?? []),
      ...history.flatMap((h) => (h.fragment.metadata.emailAddress ? [h.fragment.metadata.emailAddress] : [])),
    ]);

    return {
      customerId,
      primaryName,
      alternateNames: allNames.filter((name) => name !== primaryName),
      phones,
      emails,
      contactPreferences: this.contactPreferences(history),
      serviceHistory: this.serviceHistory(history),
      personalityTraits: this.personality(history),
      valueIndicators: this.valueIndicators(history),
      riskFactors: this.riskFactors(history, now),
      privacySettings: { ...DEFAULT_PRIVACY },
      needsManualReview: identity?.needsManualReview ?? false,
      createdAt: identity?.createdAt ?? timestamp,
      updatedAt: timestamp,
      lastInteraction: history.length > 0 ? new Date(history[0].time).toISOString() : '',
      confidenceScore: this.confidenceScore(identity),
      fragmentCount: history.length,
    };
  }

  /** No identity record means no identity evidence; a record without links was created outright */
  private confidenceScore(identity: IdentityRecord | null): number {
    if (!identity) return 0;
    return Object.keys(identity.linkConfidence).length > 0 ? aggregateConfidence(identity) : 1;
  }

  /** Profile for a customer with no retrievable history */
  minimalProfile(customerId: string, now: number): CustomerProfile {
    return this.buildProfile(customerId, null, [], now);
  }

  contactPreferences(history: TimedFragment[]): ContactPreferences {
    const prefs = defaultContactPreferences();
    if (history.length === 0) return prefs;

    prefs.preferredChannel = mostCommon(history.map((h) => h.fragment.channel)) ?? prefs.preferredChannel;
    prefs.preferredTimes = topN(history.map((h) => new Date(h.time).getUTCHours()), 3);

    const days = history.map((h) => weekday(h.time));
    const weekdayCount = days.filter((d) => d < 5).length;
    prefs.preferredDays = weekdayCount > days.length - weekdayCount ? [...WEEKDAYS] : unique(days);

    const stated = history.flatMap((h) => (h.fragment.metadata.urgency ? [h.fragment.metadata.urgency] : []));
    prefs.responseUrgency = mostCommon<Urgency>(stated) ?? 'normal';
    prefs.communicationStyle = this.communicationStyle(history);
    return prefs;
  }

  private communicationStyle(history: TimedFragment[]): CommunicationStyle {
    let formal = 0;
    let casual = 0;
    for (const { fragment } of history) {
      if (this.keywords.matchesAny(fragment.text, 'formalStyle')) formal++;
      if (this.keywords.matchesAny(fragment.text, 'casualStyle')) casual++;
    }
    if (formal > casual) return 'formal';
    if (casual > formal) return 'casual';
    return 'friendly';
  }

  serviceHistory(history: TimedFragment[]): ServiceHistory {
    let totalRequests = 0;
    let completedRequests = 0;
    const satisfactionScores: number[] = [];
    const serviceTypes: string[] = [];

    for (const { fragment } of history) {
      const { text, metadata } = fragment;
      if (metadata.intent === 'service_request' || this.keywords.matchesAny(text, 'serviceRequest')) {
        totalRequests++;
        serviceTypes.push(this.keywords.classifyServiceType(text));
      }
      if (metadata.sentiment === 'positive' && this.keywords.matchesAny(text, 'satisfaction')) {
        completedRequests++;
        satisfactionScores.push(0.9);
      } else if (metadata.sentiment === 'negative' && this.keywords.matchesAny(text, 'dissatisfaction')) {
        satisfactionScores.push(0.3);
      }
    }

    return {
      totalRequests,
      completedRequests,
      satisfactionScores,
      serviceTypes: unique(serviceTypes),
      lastServiceDate: history.length > 0 ? new Date(history[0].time).toISOString() : undefined,
    };
  }

  personality(history: TimedFragment[]): PersonalityTraits {
    const n = history.length;
    if (n === 0) return defaultTraits();

    const rate = (predicate: (text: string) => boolean, scale: number): number =>
      Math.min(1, (history.filter((h) => predicate(h.fragment.text)).length / n) * scale);

    const urgencyProne = rate((text) => this.keywords.matchesAny(text, 'urgency'), 3);
    return {
      politeness: rate((text) => this.keywords.matchesAny(text, 'politeness'), 2),
      urgencyProne,
      detailOriented: rate((text) => text.length > DETAIL_LENGTH || this.keywords.matchesAny(text, 'detail'), 2),
      techSavvy: rate((text) => this.keywords.matchesAny(text, 'tech'), 2),
      patience: 1 - urgencyProne,
    };
  }

  valueIndicators(history: TimedFragment[]): ValueIndicators {
    const n = history.length;
    const indicators: ValueIndicators = {
      conversationFrequency: 0,
      engagementLevel: 'low',
      loyaltyScore: 0.5,
      spendingTier: 'basic',
    };
    if (n === 0) return indicators;

    const spanDays = Math.floor((history[0].time - history[n - 1].time) / DAY_MS);
    indicators.conversationFrequency = n / Math.max(1, spanDays / 30);

    const avgLength = history.reduce((sum, h) => sum + h.fragment.text.length, 0) / n;
    let engagement: EngagementLevel = 'low';
    if (avgLength > 100 && n > 5) engagement = 'high';
    else if (avgLength > 50 || n > 3) engagement = 'medium';
    indicators.engagementLevel = engagement;

    const positive = history.filter((h) => h.fragment.metadata.sentiment === 'positive').length;
    indicators.loyaltyScore = Math.min(1, positive / n + n / 20);
    return indicators;
  }

  riskFactors(history: TimedFragment[], now: number): RiskFactors {
    const risks: RiskFactors = { churnRisk: 0.5, satisfactionRisk: 0.5, paymentRisk: 0.5 };
    if (history.length === 0) return risks;

    const daysSinceLast = Math.floor((now - history[0].time) / DAY_MS);
    if (daysSinceLast > 90) risks.churnRisk = 0.8;
    else if (daysSinceLast > 30) risks.churnRisk = 0.6;
    else risks.churnRisk = 0.2;

    const recent = history
      .slice(0, RECENT_SENTIMENT_WINDOW)
      .flatMap((h) => (h.fragment.metadata.sentiment ? [h.fragment.metadata.sentiment] : []));
    if (recent.length > 0) {
      risks.satisfactionRisk = recent.filter((s) => s === 'negative').length / recent.length;
    }
    return risks;
  }
}
