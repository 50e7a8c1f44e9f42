import { Candidate, ConversationCacheEntry } from '../types';
import { TtlCache } from './ttl-cache';
import { debugLogger } from './debug-logger';

export interface MarkExpandedOptions {
  /** Article text fetched while expanding */
  articleText?: string;
  /** Only update the list with this id; a replaced list is left alone */
  listId?: number;
}

export interface ConversationCacheOptions {
  ttlMs: number;
  maxEntries?: number;
  now?: () => number;
}

/**
 * Last list of articles shown in each (user, conversation), so follow-up
 * turns like "yes" or "tell me more about 2" know what to expand.
 *
 * Entries are replaced wholesale; the stored lists are never mutated in place.
 */
export class ConversationCache {
  private readonly entries: TtlCache<string, ConversationCacheEntry>;
  private readonly lastListed: TtlCache<string, string>;
  private readonly now: () => number;
  private nextListId = 1;

  constructor(options: ConversationCacheOptions) {
    this.now = options.now ?? Date.now;
    this.entries = new TtlCache<string, ConversationCacheEntry>({
      ttlMs: options.ttlMs,
      maxEntries: options.maxEntries ?? 5000,
      now: this.now,
    });
    this.lastListed = new TtlCache<string, string>({
      ttlMs: options.ttlMs,
      maxEntries: options.maxEntries ?? 5000,
      now: this.now,
    });
  }

  get(userKey: string, conversationName: string): ConversationCacheEntry | undefined {
    return this.entries.get(cacheKey(userKey, conversationName));
  }

  /**
   * True when the conversation has a non-empty list to expand
   */
  hasList(userKey: string, conversationName: string): boolean {
    const entry = this.get(userKey, conversationName);
    return entry !== undefined && entry.lastList.length > 0;
  }

  put(userKey: string, conversationName: string, topic: string, items: Candidate[]): ConversationCacheEntry {
    const entry: ConversationCacheEntry = {
      listId: this.nextListId++,
      lastList: items.map(item => ({ ...item, expanded: false })),
      topic,
      fetchedAt: this.now(),
    };
    this.entries.set(cacheKey(userKey, conversationName), entry);
    this.lastListed.set(userKey, conversationName);
    debugLogger.info('CONV_CACHE', 'Stored article list', {
      userKey,
      conversationName,
      items: entry.lastList.length,
    });
    return entry;
  }

  /**
   * Conversation that most recently received a list for this user
   */
  lastConversation(userKey: string): string | undefined {
    return this.lastListed.get(userKey);
  }

  /**
   * Mark one item as expanded, optionally recording the article text that was
   * fetched for it. Returns the updated entry, or undefined if nothing changed.
   */
  markExpanded(
    userKey: string,
    conversationName: string,
    index: number,
    options: MarkExpandedOptions = {}
  ): ConversationCacheEntry | undefined {
    const { articleText, listId } = options;
    const key = cacheKey(userKey, conversationName);
    const entry = this.entries.get(key);
    if (!entry || index < 0 || index >= entry.lastList.length) {
      return undefined;
    }
    if (listId !== undefined && entry.listId !== listId) {
      debugLogger.info('CONV_CACHE', 'List replaced during expansion, skipping update', {
        userKey,
        conversationName,
        expected: listId,
        current: entry.listId,
      });
      return undefined;
    }

    const updated: ConversationCacheEntry = {
      ...entry,
      lastList: entry.lastList.map((item, i) =>
        i === index ? { ...item, expanded: true, articleText: articleText ?? item.articleText } : item
      ),
    };
    this.entries.set(key, updated);
    return updated;
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Pick which cached item a follow-up refers to.
 *
 * An explicit 1-based item number inside the list wins; out-of-range numbers
 * fall back to the first item. Without a number the first item not yet
 * expanded is chosen, wrapping to the first once every item has been shown.
 */
export function selectForExpansion(entry: ConversationCacheEntry, itemNumber: number | null): number {
  if (entry.lastList.length === 0) {
    return -1;
  }

  if (itemNumber !== null) {
    return itemNumber >= 1 && itemNumber <= entry.lastList.length ? itemNumber - 1 : 0;
  }

  const firstUnexpanded = entry.lastList.findIndex(item => !item.expanded);
  return firstUnexpanded === -1 ? 0 : firstUnexpanded;
}

function cacheKey(userKey: string, conversationName: string): string {
  return `${userKey}\u0000${conversationName}`;
}
