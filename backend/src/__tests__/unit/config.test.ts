import { ConfigError, loadConfig } from '../../config';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.nodeEnv).toBe('development');
    expect(config.port).toBe(3001);
    expect(config.assistantName).toBe('Nova');
    expect(config.llm).toEqual({
      apiKey: undefined,
      provider: 'langchain',
      baseUrl: 'https://openrouter.ai/api/v1',
      model: 'google/gemini-2.5-flash',
      intentClassifier: 'heuristic',
    });
    expect(config.feeds).toEqual({
      extra: [],
      maxResults: 3,
      freshnessDays: 2,
      rateLimitWindowMs: 60_000,
      fetchTimeoutMs: 12_000,
      fetchAttempts: 1,
      searchFeedUrl: 'https://news.google.com/rss/search?q=',
    });
    expect(config.sheetCsvUrl).toBeUndefined();
    expect(config.history).toEqual({ backend: 'memory', sqlitePath: 'chat_history.db', preferenceMessages: 5 });
    expect(config.conversationCache).toEqual({ ttlMs: 86_400_000, maxEntries: 5000 });
    expect(config.requestDeadlineMs).toBe(25_000);
  });

  it('reads and coerces overrides', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '8080',
      OPENROUTER_API_KEY: '  test-secret  ',
      RSS_FEEDS: 'https://a.test/rss, ,https://b.test/rss ',
      MAX_RESULTS: '5',
      RATE_LIMIT_WINDOW_SECONDS: '30',
      HISTORY_BACKEND: 'sqlite',
      SQLITE_PATH: '/tmp/history.db',
      INTENT_CLASSIFIER: 'llm',
      PREFERENCE_HISTORY_MESSAGES: '0',
    });

    expect(config.nodeEnv).toBe('production');
    expect(config.port).toBe(8080);
    expect(config.llm.apiKey).toBe('test-secret');
    expect(config.llm.intentClassifier).toBe('llm');
    expect(config.feeds.extra).toEqual(['https://a.test/rss', 'https://b.test/rss']);
    expect(config.feeds.maxResults).toBe(5);
    expect(config.feeds.rateLimitWindowMs).toBe(30_000);
    expect(config.history).toEqual({ backend: 'sqlite', sqlitePath: '/tmp/history.db', preferenceMessages: 0 });
  });

  it('builds the sheet URL from an id unless a URL is given', () => {
    expect(loadConfig({ SHEET_ID: 'sheet-1', SHEET_GID: '7' }).sheetCsvUrl).toBe(
      'https://docs.google.com/spreadsheets/d/sheet-1/export?format=csv&gid=7'
    );
    expect(loadConfig({ SHEET_ID: 'sheet-1', SHEET_CSV_URL: 'https://csv.test/x.csv' }).sheetCsvUrl).toBe(
      'https://csv.test/x.csv'
    );
  });

  it('treats blank optional values as unset', () => {
    expect(loadConfig({ OPENROUTER_API_KEY: '   ', SHEET_ID: '' }).llm.apiKey).toBeUndefined();
  });

  it('lists every invalid variable', () => {
    expect(() => loadConfig({ PORT: 'abc', HISTORY_BACKEND: 'redis' })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: '-1' })).toThrow(/^Invalid configuration: PORT: /);
    expect(() => loadConfig({ PORT: 'abc', HISTORY_BACKEND: 'redis' })).toThrow(/PORT: .*; HISTORY_BACKEND: /);
  });
});
