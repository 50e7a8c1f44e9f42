export const NEWS_CATEGORIES = ['space', 'tech', 'business', 'sports', 'entertainment', 'world'] as const;

export type NewsCategory = typeof NEWS_CATEGORIES[number];

export interface FeedEntry {
  title: string;
  link: string;
  summary: string;
  published: string | null;
  tags: string[];
}

export type CandidateSource = 'sheet' | 'rss' | 'search';

export interface Candidate {
  headline: string;
  link: string;
  articleText?: string;
  snippet?: string;
  published?: string;
  source: CandidateSource;
  feedUrl?: string;
  expanded: boolean;
}

export interface AggregateRequest {
  topic: string;
  category: NewsCategory | null;
  userKey: string;
  maxResults: number;
  /** Searched after `topic`, in order */
  relatedTopics?: string[];
  /** Restrict sheet matches to fresh rows when any exist. Default true */
  preferRecent?: boolean;
}

export type Intent =
  | { kind: 'chat' }
  | { kind: 'news'; topic: string; category: NewsCategory | null }
  | { kind: 'followup'; itemNumber: number | null };

export type IntentKind = Intent['kind'];

export interface IntentResult {
  intent: Intent;
  topic: string;
  confidence: number;
  reasoning: string;
  method: 'heuristic' | 'llm';
}

export interface IntentContext {
  hasCachedList: boolean;
}

export interface StoredMessage {
  sender: string;
  text: string;
  timestamp: string;
}

export interface Conversation {
  name: string;
  messages: StoredMessage[];
}

/**
 * Persisted shape of a user's history: an ordered list of single-key objects,
 * each mapping a conversation name to its messages.
 */
export type HistoryBlob = Array<Record<string, StoredMessage[]>>;

export interface ConversationCacheEntry {
  /** Changes on every put, so late writes can tell the list was replaced */
  listId: number;
  lastList: Candidate[];
  topic: string;
  fetchedAt: number;
}

export interface ChatTurnInput {
  message: string;
  userEmail?: string;
  conversationName?: string;
  preferRecent?: boolean;
}

export interface ChatTurnResult {
  reply: string;
  conversation: string;
  count?: number;
  intent: IntentKind;
}
