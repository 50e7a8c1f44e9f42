import { KEYWORD_CATEGORY, PREFERENCE_TOPICS, containsWord } from '../ingestion/sources';

export const MAX_PREFERENCES = 5;

/**
 * Known topics mentioned in a user's recent messages, in the order the
 * messages are given (newest first), each topic once.
 */
export function topicPreferences(messages: string[], limit = MAX_PREFERENCES): string[] {
  const known = [...PREFERENCE_TOPICS, ...Object.keys(KEYWORD_CATEGORY)];
  const found: string[] = [];

  for (const message of messages) {
    for (const topic of known) {
      if (found.length >= limit) return found;
      if (!found.includes(topic) && containsWord(message, topic)) {
        found.push(topic);
      }
    }
  }

  return found;
}
