import { CurrentAnalysis, Mood, SuggestedTone, UrgencyLevel } from './types';
import { CommunicationStyle } from '../profile/types';
import { KeywordMatcher } from '../keywords/keyword-tables';
import { GENERAL_TOPIC } from '../keywords/types';

export const NEUTRAL_ANALYSIS: CurrentAnalysis = {
  topic: GENERAL_TOPIC,
  mood: 'neutral',
  urgency: 'normal',
  suggestedTone: 'professional',
};

/** Topic, mood and urgency of the incoming message, plus the tone to answer in */
export function analyzeCurrentMessage(
  keywords: KeywordMatcher,
  text: string,
  communicationStyle: CommunicationStyle,
): CurrentAnalysis {
  let mood: Mood = 'neutral';
  if (keywords.matchesAny(text, 'moodNegative')) mood = 'negative';
  else if (keywords.matchesAny(text, 'moodPositive')) mood = 'positive';

  const urgency: UrgencyLevel = keywords.matchesAny(text, 'urgentIndicators') ? 'high' : 'normal';

  let suggestedTone: SuggestedTone = 'professional';
  if (communicationStyle === 'casual') suggestedTone = 'friendly';
  else if (mood === 'negative') suggestedTone = 'empathetic';
  else if (urgency === 'high') suggestedTone = 'responsive';

  return { topic: keywords.detectTopic(text), mood, urgency, suggestedTone };
}
