import { AggregateRequest, Candidate, FeedEntry, NewsCategory } from '../types';
import { SheetRow } from '../schemas';
import { FeedClient } from '../ingestion/rss-fetcher';
import { SheetSource } from '../ingestion/sheet-source';
import { feedsForCategory, linkMatchesCategory } from '../ingestion/sources';
import { FeedRateLimiter } from '../utils/rate-limiter';
import { parsePublished, isWithinDays } from '../utils/time';
import { debugLogger } from '../utils/debug-logger';

export const DEFAULT_SEARCH_FEED_URL = 'https://news.google.com/rss/search?q=';

export interface SourceAggregatorDeps {
  sheet: SheetSource;
  feeds: FeedClient;
  rateLimiter: FeedRateLimiter;
  freshnessDays: number;
  /** Prefix the URL-escaped topic is appended to for the broad fallback */
  searchFeedUrl?: string;
  /** Configured feeds scanned ahead of the built-in defaults */
  extraFeeds?: string[];
  entriesPerFeed?: number;
  now?: () => number;
}

/**
 * Stable sort, newest first; entries without a parseable date go last
 */
export function sortByPublishedDesc(candidates: Candidate[]): Candidate[] {
  return candidates
    .map((candidate, index) => ({ candidate, index, ts: parsePublished(candidate.published) }))
    .sort((a, b) => {
      if (a.ts === null && b.ts === null) return a.index - b.index;
      if (a.ts === null) return 1;
      if (b.ts === null) return -1;
      return b.ts - a.ts || a.index - b.index;
    })
    .map(entry => entry.candidate);
}

/**
 * Keep the first candidate for each link, skipping links already in `seen`.
 * `seen` is updated with every link kept.
 */
function dedupeByLink(candidates: Candidate[], seen: Set<string>): Candidate[] {
  const out: Candidate[] = [];
  for (const candidate of candidates) {
    if (!candidate.link || seen.has(candidate.link)) continue;
    seen.add(candidate.link);
    out.push(candidate);
  }
  return out;
}

function sheetRowText(row: SheetRow): string {
  return [row.headline, row.news, row.summary, row.categories, row.category, row.link].join(' ').toLowerCase();
}

function sheetRowToCandidate(row: SheetRow, topic: string): Candidate {
  const body = row.news || row.summary;
  return {
    headline: row.headline || topic,
    link: row.link,
    articleText: body || undefined,
    snippet: body || undefined,
    published: row.date || undefined,
    source: 'sheet',
    expanded: false,
  };
}

function feedEntryToCandidate(entry: FeedEntry, source: 'rss' | 'search', feedUrl: string, topic: string): Candidate {
  return {
    headline: entry.title || topic,
    link: entry.link,
    snippet: entry.summary || undefined,
    published: entry.published ?? undefined,
    source,
    feedUrl,
    expanded: false,
  };
}

function entryMatches(entry: FeedEntry, topic: string, category: NewsCategory | null): boolean {
  if (topic) {
    const needle = topic.toLowerCase();
    return (
      entry.title.toLowerCase().includes(needle) ||
      entry.summary.toLowerCase().includes(needle) ||
      entry.tags.join(' ').toLowerCase().includes(needle)
    );
  }
  if (category) {
    return linkMatchesCategory(entry.link, category);
  }
  return true;
}

/**
 * The requested topic first, then related topics not already listed
 */
function searchTopics(topic: string, related: string[] = []): string[] {
  const topics = [topic];
  for (const candidate of related) {
    const cleaned = candidate.trim().toLowerCase();
    if (cleaned && !topics.includes(cleaned)) topics.push(cleaned);
  }
  return topics;
}

/**
 * Collects candidate articles for a topic from three tiers in order: the
 * curated sheet, category-prioritized RSS feeds, then a broad news search
 * when nothing else matched. Later tiers only run while fewer than
 * `maxResults` candidates are held. Related topics (from the user's recent
 * messages) fill the sheet and RSS tiers after the requested topic.
 */
export class SourceAggregator {
  private readonly searchFeedUrl: string;
  private readonly extraFeeds: string[];
  private readonly entriesPerFeed: number;
  private readonly now: () => number;

  constructor(private readonly deps: SourceAggregatorDeps) {
    this.searchFeedUrl = deps.searchFeedUrl ?? DEFAULT_SEARCH_FEED_URL;
    this.extraFeeds = deps.extraFeeds ?? [];
    this.entriesPerFeed = deps.entriesPerFeed ?? 30;
    this.now = deps.now ?? Date.now;
  }

  async aggregate(request: AggregateRequest): Promise<Candidate[]> {
    const { topic, category, userKey, maxResults } = request;
    const preferRecent = request.preferRecent ?? true;
    const topics = searchTopics(topic, request.relatedTopics);
    const stepId = debugLogger.stepStart('AGGREGATE', 'Collecting candidates', { topics, category, maxResults });

    if (maxResults <= 0) {
      debugLogger.stepFinish(stepId, { total: 0 });
      return [];
    }

    const seen = new Set<string>();
    const collected: Candidate[] = [];

    const take = (tier: Candidate[]): void => {
      const remaining = maxResults - collected.length;
      collected.push(...sortByPublishedDesc(dedupeByLink(tier, seen)).slice(0, remaining));
    };

    const rows = await this.loadSheetRows();
    for (const sheetTopic of topics) {
      if (collected.length >= maxResults) break;
      take(this.matchSheet(rows, sheetTopic, category, preferRecent));
    }

    if (collected.length < maxResults) {
      const groups = await this.fromFeeds(topics, category, userKey, maxResults - collected.length, seen);
      for (const group of groups) take(group);
    }

    if (collected.length === 0) {
      take(await this.fromSearch(topic, category, userKey, maxResults));
    }

    debugLogger.stepFinish(stepId, {
      total: collected.length,
      bySource: collected.map(c => c.source),
    });
    return collected;
  }

  private async loadSheetRows(): Promise<SheetRow[]> {
    try {
      return await this.deps.sheet.fetchRows();
    } catch (error) {
      debugLogger.stepError(null, 'SHEET', 'Sheet source failed', error);
      console.error('Sheet source failed:', error instanceof Error ? error.message : error);
      return [];
    }
  }

  private matchSheet(rows: SheetRow[], topic: string, category: NewsCategory | null, preferRecent: boolean): Candidate[] {
    const needle = (topic || category || '').toLowerCase();
    const matches = rows.filter(row => row.link && sheetRowText(row).includes(needle));
    const now = this.now();
    const fresh = matches.filter(row => isWithinDays(parsePublished(row.date), this.deps.freshnessDays, now));

    debugLogger.info('SHEET', 'Sheet matches', {
      topic: needle,
      rows: rows.length,
      matches: matches.length,
      fresh: fresh.length,
    });

    return (preferRecent && fresh.length > 0 ? fresh : matches).map(row => sheetRowToCandidate(row, topic));
  }

  /**
   * Scan feeds once for all topics. Each entry lands in the group of the first
   * topic it matches, so groups come back in topic priority order.
   */
  private async fromFeeds(
    topics: string[],
    category: NewsCategory | null,
    userKey: string,
    needed: number,
    alreadySeen: ReadonlySet<string>
  ): Promise<Candidate[][]> {
    const groups: Candidate[][] = topics.map(() => []);
    const tierLinks = new Set<string>();

    for (const feedUrl of feedsForCategory(category, this.extraFeeds)) {
      if (tierLinks.size >= needed) break;
      if (!this.deps.rateLimiter.tryAcquire(userKey, feedUrl)) continue;

      let entries: FeedEntry[];
      try {
        entries = await this.deps.feeds.fetchFeed(feedUrl);
      } catch (error) {
        debugLogger.stepError(null, 'RSS_FETCH', `Feed failed: ${feedUrl}`, error);
        console.error(`RSS fetch error for ${feedUrl}:`, error instanceof Error ? error.message : error);
        continue;
      }

      for (const entry of entries.slice(0, this.entriesPerFeed)) {
        if (!entry.link || tierLinks.has(entry.link) || alreadySeen.has(entry.link)) continue;
        const group = topics.findIndex(t => entryMatches(entry, t, category));
        if (group === -1) continue;
        tierLinks.add(entry.link);
        groups[group].push(feedEntryToCandidate(entry, 'rss', feedUrl, topics[group]));
      }
    }

    return groups;
  }

  private async fromSearch(
    topic: string,
    category: NewsCategory | null,
    userKey: string,
    maxResults: number
  ): Promise<Candidate[]> {
    const query = topic || category || 'top stories';
    const url = `${this.searchFeedUrl}${encodeURIComponent(query)}`;

    if (!this.deps.rateLimiter.tryAcquire(userKey, url)) {
      return [];
    }

    const stepId = debugLogger.stepStart('SEARCH_FALLBACK', 'Broad news search', { query });
    try {
      const entries = await this.deps.feeds.fetchFeed(url);
      const candidates = entries.slice(0, maxResults).map(entry => feedEntryToCandidate(entry, 'search', url, topic));
      debugLogger.stepFinish(stepId, { found: candidates.length });
      return candidates;
    } catch (error) {
      debugLogger.stepError(stepId, 'SEARCH_FALLBACK', 'Search feed failed', error);
      console.error('News search fallback failed:', error instanceof Error ? error.message : error);
      return [];
    }
  }
}
