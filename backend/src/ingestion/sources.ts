import { NEWS_CATEGORIES, NewsCategory } from '../types';
import { escapeRegex } from '../utils/sanitize';

export const DEFAULT_RSS_FEEDS: string[] = [
  // General / world
  'http://feeds.bbci.co.uk/news/rss.xml',
  'http://rss.cnn.com/rss/edition.rss',
  'https://www.theguardian.com/world/rss',
  'https://feeds.reuters.com/reuters/topNews',
  'https://feeds.npr.org/1001/rss.xml',
  // Tech
  'https://techcrunch.com/feed/',
  'https://www.theverge.com/rss/index.xml',
  'https://feeds.arstechnica.com/arstechnica/index',
  // Business
  'https://feeds.a.dj.com/rss/RSSWorldNews.xml',
  'https://feeds.reuters.com/reuters/businessNews',
  // Space / science
  'https://www.nasa.gov/rss/dyn/breaking_news.rss',
  'https://www.space.com/feeds/all',
  'https://www.sciencedaily.com/rss/top/science.xml',
  // Entertainment
  'https://www.hollywoodreporter.com/feed/',
  'https://www.variety.com/rss2.0.xml',
  'https://www.rollingstone.com/music/music-news/feed/',
  'https://www.empireonline.com/feeds/all/rss/',
  'https://about.netflix.com/en/newsroom/rss',
  'https://www.vulture.com/rss/index.xml',
  'https://ew.com/tv/feed/',
  // Sports
  'https://www.espn.com/espn/rss/news',
  // Regional
  'https://timesofindia.indiatimes.com/rssfeedstopstories.cms',
  'https://www.aljazeera.com/xml/rss/all.xml',
  // Space policy / launches
  'https://www.spacepolicyonline.com/feeds/posts/default',
  'https://www.spaceflightnow.com/launch-feed/',
];

export const CATEGORY_FEEDS: Record<NewsCategory, string[]> = {
  space: [
    'https://www.nasa.gov/rss/dyn/breaking_news.rss',
    'https://www.space.com/feeds/all',
    'https://www.spaceflightnow.com/launch-feed/',
  ],
  tech: [
    'https://techcrunch.com/feed/',
    'https://www.theverge.com/rss/index.xml',
    'https://feeds.arstechnica.com/arstechnica/index',
  ],
  business: [
    'https://feeds.a.dj.com/rss/RSSWorldNews.xml',
    'https://feeds.reuters.com/reuters/businessNews',
  ],
  entertainment: [
    'https://www.hollywoodreporter.com/feed/',
    'https://www.variety.com/rss2.0.xml',
    'https://www.rollingstone.com/music/music-news/feed/',
    'https://www.empireonline.com/feeds/all/rss/',
    'https://about.netflix.com/en/newsroom/rss',
    'https://www.vulture.com/rss/index.xml',
    'https://ew.com/tv/feed/',
  ],
  sports: ['https://www.espn.com/espn/rss/news'],
  world: [
    'http://feeds.bbci.co.uk/news/rss.xml',
    'https://www.theguardian.com/world/rss',
    'https://www.aljazeera.com/xml/rss/all.xml',
  ],
};

/**
 * Topics picked up from a user's earlier messages as search preferences,
 * alongside the keys of KEYWORD_CATEGORY
 */
export const PREFERENCE_TOPICS = [
  'moon', 'red moon', 'nasa', 'space', 'black hole', 'blackhole', 'spacex', 'jwst',
  'moon eclipse', 'eclipse', 'cricket', 'football', 'ai', 'google', 'apple',
];

/**
 * Topic keywords that imply a category. Checked before the category names
 * themselves; multi-word keys are matched as phrases.
 */
export const KEYWORD_CATEGORY: Record<string, NewsCategory> = {
  nasa: 'space',
  space: 'space',
  spacex: 'space',
  jwst: 'space',
  comet: 'space',
  moon: 'space',
  'red moon': 'space',
  ai: 'tech',
  google: 'tech',
  apple: 'tech',
  markets: 'business',
  economy: 'business',
  covid: 'world',
  cricket: 'sports',
  football: 'sports',
  netflix: 'entertainment',
  'stranger things': 'entertainment',
  strangerthings: 'entertainment',
};

/**
 * URL path segments that mark an article as belonging to a category
 */
export const CATEGORY_PATH_SEGMENTS: Record<NewsCategory, string[]> = {
  space: ['space', 'nasa', 'science', 'launch', 'launches'],
  tech: ['tech', 'technology', 'gadgets', 'ai'],
  business: ['business', 'markets', 'economy', 'finance'],
  sports: ['sport', 'sports', 'football', 'cricket'],
  entertainment: ['entertainment', 'culture', 'movies', 'tv', 'music', 'film'],
  world: ['world', 'international', 'news'],
};

export function containsWord(text: string, word: string): boolean {
  return new RegExp(`\\b${escapeRegex(word)}\\b`, 'i').test(text);
}

/**
 * Map free text to a known category: keyword table first, then the category
 * names. Matches are on word boundaries.
 */
export function mapKeywordToCategory(text: string): NewsCategory | null {
  for (const [keyword, category] of Object.entries(KEYWORD_CATEGORY)) {
    if (containsWord(text, keyword)) {
      return category;
    }
  }
  for (const category of NEWS_CATEGORIES) {
    if (containsWord(text, category)) {
      return category;
    }
  }
  return null;
}

/**
 * Feeds to scan for a category, category feeds first, each URL once.
 * `extraFeeds` (from configuration) come before the built-in defaults.
 */
export function feedsForCategory(category: NewsCategory | null, extraFeeds: string[] = []): string[] {
  const ordered = [...(category ? CATEGORY_FEEDS[category] : []), ...extraFeeds, ...DEFAULT_RSS_FEEDS];
  return Array.from(new Set(ordered));
}

/**
 * True when the link's path has a segment associated with the category
 */
export function linkMatchesCategory(link: string, category: NewsCategory): boolean {
  let pathname: string;
  try {
    pathname = new URL(link).pathname.toLowerCase();
  } catch {
    return false;
  }
  const segments = pathname.split('/').filter(Boolean);
  return CATEGORY_PATH_SEGMENTS[category].some(segment => segments.includes(segment));
}
