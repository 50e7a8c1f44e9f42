import { AppConfig } from './config';
import { createNewsAssistant, NewsAssistant } from './agents/assistant';
import { createTextGenerator } from './agents/llm';
import { Summarizer } from './agents/summarizer';
import { TextGenerator } from './agents/text-generator';
import { ArticleExtractor } from './ingestion/article-extractor';
import { FeedClient, RssFeedClient } from './ingestion/rss-fetcher';
import { CsvSheetSource, EmptySheetSource, SheetSource } from './ingestion/sheet-source';
import { SourceAggregator } from './search/aggregator';
import { ConversationCache } from './utils/conversation-cache';
import { createHistoryBackend, HistoryBackend, HistoryStore } from './utils/conversation-store';
import { FeedRateLimiter } from './utils/rate-limiter';

/**
 * Replaceable collaborators. Anything left out is built from the config.
 */
export interface ServiceOverrides {
  feeds?: FeedClient;
  sheet?: SheetSource;
  /** Used by the article extractor (and the default feed/sheet clients) */
  fetchImpl?: typeof fetch;
  /** null disables the model entirely */
  generator?: TextGenerator | null;
  historyBackend?: HistoryBackend;
  now?: () => number;
}

export interface Services {
  assistant: NewsAssistant;
  history: HistoryStore;
  cache: ConversationCache;
  rateLimiter: FeedRateLimiter;
  aggregator: SourceAggregator;
  extractor: ArticleExtractor;
  summarizer: Summarizer;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const now = overrides.now ?? Date.now;
  const fetchImpl = overrides.fetchImpl;

  const generator =
    overrides.generator !== undefined
      ? overrides.generator
      : createTextGenerator({
          apiKey: config.llm.apiKey,
          provider: config.llm.provider,
          baseUrl: config.llm.baseUrl,
          model: config.llm.model,
          appUrl: config.appUrl,
          appTitle: 'News Chat Assistant',
        });

  const rateLimiter = new FeedRateLimiter({ windowMs: config.feeds.rateLimitWindowMs, now });

  const sheet =
    overrides.sheet ??
    (config.sheetCsvUrl
      ? new CsvSheetSource(config.sheetCsvUrl, { timeoutMs: config.feeds.fetchTimeoutMs, fetchImpl })
      : new EmptySheetSource());

  const feeds =
    overrides.feeds ??
    new RssFeedClient({ timeoutMs: config.feeds.fetchTimeoutMs, attempts: config.feeds.fetchAttempts, fetchImpl });

  const aggregator = new SourceAggregator({
    sheet,
    feeds,
    rateLimiter,
    freshnessDays: config.feeds.freshnessDays,
    searchFeedUrl: config.feeds.searchFeedUrl,
    extraFeeds: config.feeds.extra,
    now,
  });

  const extractor = new ArticleExtractor({
    timeoutMs: config.feeds.fetchTimeoutMs,
    maxChars: config.articleMaxChars,
    fetchImpl,
  });

  const summarizer = new Summarizer(generator, config.assistantName);

  const cache = new ConversationCache({
    ttlMs: config.conversationCache.ttlMs,
    maxEntries: config.conversationCache.maxEntries,
    now,
  });

  const history = new HistoryStore(
    overrides.historyBackend ?? createHistoryBackend(config.history.backend, config.history.sqlitePath),
    () => new Date(now())
  );

  const assistant = createNewsAssistant({
    aggregator,
    extractor,
    summarizer,
    cache,
    history,
    classifier: config.llm.intentClassifier === 'llm' ? generator : null,
    assistantName: config.assistantName,
    maxResults: config.feeds.maxResults,
    requestDeadlineMs: config.requestDeadlineMs,
    preferenceMessages: config.history.preferenceMessages,
    now: () => new Date(now()),
  });

  return { assistant, history, cache, rateLimiter, aggregator, extractor, summarizer };
}
