/**
 * Learned customer profile.
 */

import { Urgency } from '../store/types';

export type CommunicationStyle = 'formal' | 'casual' | 'friendly';

export type EngagementLevel = 'high' | 'medium' | 'low';

export interface ContactPreferences {
  preferredChannel: string;
  /** Hours of day (0-23, UTC), most frequent first */
  preferredTimes: number[];
  /** Days of week, Monday = 0 */
  preferredDays: number[];
  responseUrgency: Urgency;
  communicationStyle: CommunicationStyle;
  languagePreference: string;
  timezone: string;
}

export interface ServiceHistory {
  totalRequests: number;
  completedRequests: number;
  satisfactionScores: number[];
  serviceTypes: string[];
  /** ISO-8601 of the newest fragment */
  lastServiceDate?: string;
}

export interface PersonalityTraits {
  patience: number;
  politeness: number;
  detailOriented: number;
  techSavvy: number;
  urgencyProne: number;
}

export interface ValueIndicators {
  /** Fragments per 30 days */
  conversationFrequency: number;
  engagementLevel: EngagementLevel;
  loyaltyScore: number;
  spendingTier: string;
}

export interface RiskFactors {
  churnRisk: number;
  satisfactionRisk: number;
  paymentRisk: number;
}

export interface PrivacySettings {
  storeConversations: boolean;
  learnPreferences: boolean;
  crossChannelLinking: boolean;
  analytics: boolean;
}

export interface CustomerProfile {
  customerId: string;
  primaryName: string;
  alternateNames: string[];
  phones: string[];
  emails: string[];
  contactPreferences: ContactPreferences;
  serviceHistory: ServiceHistory;
  personalityTraits: PersonalityTraits;
  valueIndicators: ValueIndicators;
  riskFactors: RiskFactors;
  privacySettings: PrivacySettings;
  needsManualReview: boolean;
  createdAt: string;
  updatedAt: string;
  /** Empty when the customer has no history */
  lastInteraction: string;
  confidenceScore: number;
  fragmentCount: number;
}
