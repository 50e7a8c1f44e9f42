import { z } from 'zod';
import { sheetCsvUrl } from '../ingestion/sheet-source';
import { DEFAULT_SEARCH_FEED_URL } from '../search/aggregator';
import { DEFAULT_LLM_MODEL, OPENROUTER_BASE_URL } from '../agents/llm';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: positiveInt(3001),
  HOST: z.string().default('0.0.0.0'),
  FRONTEND_URL: optionalString,
  APP_URL: z.string().default('http://localhost:3001'),

  OPENROUTER_API_KEY: optionalString,
  LLM_PROVIDER: z.enum(['langchain', 'openai']).default('langchain'),
  LLM_BASE_URL: z.string().url().default(OPENROUTER_BASE_URL),
  LLM_MODEL: z.string().default(DEFAULT_LLM_MODEL),
  INTENT_CLASSIFIER: z.enum(['heuristic', 'llm']).default('heuristic'),
  ASSISTANT_NAME: z.string().min(1).default('Nova'),

  RSS_FEEDS: z.string().optional().default(''),
  MAX_RESULTS: positiveInt(3),
  FRESHNESS_DAYS: positiveInt(2),
  RATE_LIMIT_WINDOW_SECONDS: positiveInt(60),
  FETCH_TIMEOUT_MS: positiveInt(12000),
  FEED_FETCH_ATTEMPTS: positiveInt(1),
  ARTICLE_MAX_CHARS: positiveInt(15000),
  REQUEST_DEADLINE_MS: positiveInt(25000),
  SEARCH_FEED_URL: z.string().url().default(DEFAULT_SEARCH_FEED_URL),

  SHEET_CSV_URL: optionalString,
  SHEET_ID: optionalString,
  SHEET_GID: z.string().default('0'),

  HISTORY_BACKEND: z.enum(['memory', 'sqlite']).default('memory'),
  SQLITE_PATH: z.string().default('chat_history.db'),
  PREFERENCE_HISTORY_MESSAGES: z.coerce.number().int().min(0).default(5),

  CONVERSATION_CACHE_TTL_SECONDS: positiveInt(24 * 60 * 60),
  CONVERSATION_CACHE_MAX_ENTRIES: positiveInt(5000),
  CHAT_REQUESTS_PER_MINUTE: positiveInt(30),
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  host: string;
  frontendUrl?: string;
  appUrl: string;
  llm: {
    apiKey?: string;
    provider: 'langchain' | 'openai';
    baseUrl: string;
    model: string;
    intentClassifier: 'heuristic' | 'llm';
  };
  assistantName: string;
  feeds: {
    extra: string[];
    maxResults: number;
    freshnessDays: number;
    rateLimitWindowMs: number;
    fetchTimeoutMs: number;
    fetchAttempts: number;
    searchFeedUrl: string;
  };
  articleMaxChars: number;
  requestDeadlineMs: number;
  sheetCsvUrl?: string;
  history: {
    backend: 'memory' | 'sqlite';
    sqlitePath: string;
    /** User messages scanned for topic preferences; 0 disables */
    preferenceMessages: number;
  };
  conversationCache: {
    ttlMs: number;
    maxEntries: number;
  };
  chatRequestsPerMinute: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validate environment variables and apply defaults.
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;

  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    host: e.HOST,
    frontendUrl: e.FRONTEND_URL,
    appUrl: e.APP_URL,
    llm: {
      apiKey: e.OPENROUTER_API_KEY,
      provider: e.LLM_PROVIDER,
      baseUrl: e.LLM_BASE_URL,
      model: e.LLM_MODEL,
      intentClassifier: e.INTENT_CLASSIFIER,
    },
    assistantName: e.ASSISTANT_NAME,
    feeds: {
      extra: e.RSS_FEEDS.split(',')
        .map(url => url.trim())
        .filter(url => url.length > 0),
      maxResults: e.MAX_RESULTS,
      freshnessDays: e.FRESHNESS_DAYS,
      rateLimitWindowMs: e.RATE_LIMIT_WINDOW_SECONDS * 1000,
      fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
      fetchAttempts: e.FEED_FETCH_ATTEMPTS,
      searchFeedUrl: e.SEARCH_FEED_URL,
    },
    articleMaxChars: e.ARTICLE_MAX_CHARS,
    requestDeadlineMs: e.REQUEST_DEADLINE_MS,
    sheetCsvUrl: e.SHEET_CSV_URL ?? (e.SHEET_ID ? sheetCsvUrl(e.SHEET_ID, e.SHEET_GID) : undefined),
    history: {
      backend: e.HISTORY_BACKEND,
      sqlitePath: e.SQLITE_PATH,
      preferenceMessages: e.PREFERENCE_HISTORY_MESSAGES,
    },
    conversationCache: {
      ttlMs: e.CONVERSATION_CACHE_TTL_SECONDS * 1000,
      maxEntries: e.CONVERSATION_CACHE_MAX_ENTRIES,
    },
    chatRequestsPerMinute: e.CHAT_REQUESTS_PER_MINUTE,
  };
}
