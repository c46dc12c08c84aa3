/**
 * Summary views of a retrieved context: a one-line summary, a detail line
 * for agent consoles, and a prompt block for response generation.
 */

import { CurrentAnalysis } from './types';
import { ContextItem } from '../scoring/relevance-scorer';
import { ConversationThread } from '../threading/conversation-threader';
import { CustomerProfile } from '../profile/types';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const PROMPT_HISTORY_ITEMS = 5;
const PROMPT_TEXT_LIMIT = 100;
const RECENT_ITEMS = 3;

export interface SummaryViews {
  shortSummary: string;
  detailedSummary: string;
  llmContext: string;
}

/** `Mar 07`, in UTC */
export function formatShortDate(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return 'unknown date';
  return `${MONTHS[date.getUTCMonth()]} ${String(date.getUTCDate()).padStart(2, '0')}`;
}

export function displayName(profile: CustomerProfile): string {
  return profile.primaryName || `Customer ${profile.customerId.slice(0, 8)}`;
}

function newestTimestamp(history: ContextItem[]): string {
  return history
    .map((item) => item.fragment.timestamp)
    .reduce((newest, ts) => (Date.parse(ts) > Date.parse(newest) ? ts : newest));
}

function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

export function renderSummaries(
  profile: CustomerProfile,
  history: ContextItem[],
  threads: ConversationThread[],
  analysis: CurrentAnalysis,
): SummaryViews {
  const name = displayName(profile);

  const shortSummary = history.length > 0
    ? `${name} - ${history.length} previous interactions, last on ${formatShortDate(newestTimestamp(history))}`
    : `${name} - New customer, no previous interactions`;

  const details = [`Customer: ${name}`, `Preferred contact: ${profile.contactPreferences.preferredChannel}`];
  const service = profile.serviceHistory;
  if (service.totalRequests > 0) {
    details.push(`Service history: ${service.totalRequests} requests`);
    if (service.satisfactionScores.length > 0) {
      const avg = service.satisfactionScores.reduce((sum, s) => sum + s, 0) / service.satisfactionScores.length;
      details.push(`Satisfaction: ${avg.toFixed(1)}/1.0`);
    }
  }
  const recent = history.slice(0, RECENT_ITEMS);
  if (recent.length > 0) {
    details.push(`Recent channels: ${[...new Set(recent.map((item) => item.fragment.channel))].join(', ')}`);
    if (recent.some((item) => item.fragment.metadata.sentiment === 'negative')) {
      details.push('⚠️ Recent negative feedback');
    }
  }
  if (profile.needsManualReview) details.push('Identity flagged for manual review');

  const lines = [
    'CUSTOMER PROFILE:',
    `- Name: ${profile.primaryName || 'Unknown'}`,
    `- Communication style: ${profile.contactPreferences.communicationStyle}`,
    `- Current mood: ${analysis.mood}`,
    `- Suggested tone: ${analysis.suggestedTone}`,
  ];

  const active = threads.filter((thread) => thread.status === 'active');
  if (active.length > 0) {
    lines.push('', 'ACTIVE CONVERSATIONS:');
    for (const thread of active) {
      lines.push(`- ${thread.mainTopic} (${thread.channels.join(', ')})`);
    }
  }

  if (history.length > 0) {
    lines.push('', 'RECENT RELEVANT HISTORY:');
    for (const item of history.slice(0, PROMPT_HISTORY_ITEMS)) {
      const { fragment } = item;
      lines.push(`- [${formatShortDate(fragment.timestamp)}, ${fragment.channel}] ${truncate(fragment.text, PROMPT_TEXT_LIMIT)}`);
    }
  }

  return { shortSummary, detailedSummary: details.join(' | '), llmContext: lines.join('\n') };
}
