import Parser from 'rss-parser';
import { FeedEntry } from '../types';
import { stripHtml, sleep } from '../utils/html';
import { debugLogger } from '../utils/debug-logger';

/**
 * Source of parsed feed entries. The aggregator only talks to this interface.
 */
export interface FeedClient {
  fetchFeed(url: string): Promise<FeedEntry[]>;
}

export interface RssFeedClientOptions {
  timeoutMs?: number;
  /** Total attempts per feed, including the first. Default: 1 */
  attempts?: number;
  fetchImpl?: typeof fetch;
}

export const FEED_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

type RssItem = Parser.Item & { contentEncoded?: string; updated?: string };

const parser: Parser<Record<string, unknown>, RssItem> = new Parser({
  customFields: {
    item: [
      ['content:encoded', 'contentEncoded'],
      ['updated', 'updated'],
    ],
  },
});

async function fetchText(url: string, timeoutMs: number, fetchImpl: typeof fetch): Promise<string> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetchImpl(url, {
      signal: controller.signal,
      headers: {
        'User-Agent': FEED_USER_AGENT,
        Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml;q=0.9, */*;q=0.8',
      },
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`);
    }
    return await response.text();
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * rss-parser leaves Atom categories as `{ $: { term } }` objects
 */
function tagText(tag: unknown): string {
  if (typeof tag === 'string') return tag;
  if (typeof tag === 'object' && tag !== null && '$' in tag) {
    const attrs = tag.$;
    if (typeof attrs === 'object' && attrs !== null && 'term' in attrs && typeof attrs.term === 'string') {
      return attrs.term;
    }
  }
  return '';
}

export function toFeedEntry(item: RssItem): FeedEntry | null {
  const link = item.link?.trim();
  if (!link) {
    return null;
  }
  const rawTags: unknown[] = item.categories ?? [];
  return {
    title: stripHtml(item.title ?? ''),
    link,
    summary: stripHtml(item.contentSnippet || item.summary || item.content || item.contentEncoded || ''),
    published: item.isoDate || item.pubDate || item.updated || null,
    tags: rawTags.map(tagText).filter(tag => tag.length > 0),
  };
}

/**
 * Parse RSS or Atom XML into feed entries. Items without a link are dropped.
 */
export async function parseFeedXml(xml: string): Promise<FeedEntry[]> {
  // Some feeds omit the version attribute rss-parser expects on <rss>
  const rssTag = xml.match(/<rss[^>]*>/);
  const fixed = rssTag && !rssTag[0].includes('version=') ? xml.replace(/<rss(\s|>)/, '<rss version="2.0"$1') : xml;

  const feed = await parser.parseString(fixed);
  return feed.items.map(toFeedEntry).filter((entry): entry is FeedEntry => entry !== null);
}

/**
 * FeedClient backed by fetch + rss-parser, with a per-attempt timeout and
 * exponential backoff between attempts.
 */
export class RssFeedClient implements FeedClient {
  private readonly timeoutMs: number;
  private readonly attempts: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: RssFeedClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 12000;
    this.attempts = Math.max(1, options.attempts ?? 1);
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchFeed(url: string): Promise<FeedEntry[]> {
    const stepId = debugLogger.stepStart('RSS_FETCH', 'Fetching feed', { url, attempts: this.attempts });
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      try {
        const xml = await fetchText(url, this.timeoutMs, this.fetchImpl);
        const entries = await parseFeedXml(xml);
        debugLogger.stepFinish(stepId, { entryCount: entries.length, attempt });
        return entries;
      } catch (error) {
        lastError = error;
        console.error(`Feed fetch attempt ${attempt}/${this.attempts} failed for ${url}:`, error instanceof Error ? error.message : error);

        if (attempt < this.attempts) {
          const delay = Math.pow(2, attempt - 1) * 1000;
          debugLogger.info('RSS_FETCH', `Retrying after ${delay}ms delay`, { delay, nextAttempt: attempt + 1 });
          await sleep(delay);
        }
      }
    }

    debugLogger.stepError(stepId, 'RSS_FETCH', 'All attempts exhausted', lastError);
    throw lastError instanceof Error ? lastError : new Error(`Failed to fetch feed ${url}`);
  }
}
