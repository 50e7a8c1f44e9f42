import { FeedEntry } from '../../types';
import { SheetRow } from '../../schemas';
import { FeedClient } from '../../ingestion/rss-fetcher';
import { SheetSource } from '../../ingestion/sheet-source';
import { TextGenerator } from '../../agents/text-generator';
import { HistoryBackend } from '../../utils/conversation-store';
import { HistoryBlob } from '../../types';

export class FakeFeedClient implements FeedClient {
  readonly calls: string[] = [];

  constructor(private readonly feeds: Record<string, FeedEntry[] | Error> = {}) {}

  async fetchFeed(url: string): Promise<FeedEntry[]> {
    this.calls.push(url);
    const feed = this.feeds[url];
    if (feed instanceof Error) throw feed;
    return feed ?? [];
  }
}

export class FakeSheetSource implements SheetSource {
  calls = 0;

  constructor(private readonly rows: Array<Partial<SheetRow>> = []) {}

  async fetchRows(): Promise<SheetRow[]> {
    this.calls++;
    return this.rows.map(row => ({
      headline: '',
      news: '',
      summary: '',
      categories: '',
      category: '',
      link: '',
      image_url: '',
      date: '',
      ...row,
    }));
  }
}

export class FakeGenerator implements TextGenerator {
  readonly model = 'fake-model';
  readonly prompts: string[] = [];

  constructor(private readonly respond: (prompt: string) => string | null | Error) {}

  async generate(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    const out = this.respond(prompt);
    if (out instanceof Error) throw out;
    return out;
  }
}

export function entry(overrides: Partial<FeedEntry> & { link: string }): FeedEntry {
  return {
    title: 'Untitled',
    summary: '',
    published: null,
    tags: [],
    ...overrides,
  };
}

export interface FakeRoute {
  status?: number;
  body: string;
  contentType?: string;
}

/**
 * fetch stand-in serving fixed bodies by URL; unknown URLs get a 404
 */
export function fakeFetch(routes: Record<string, FakeRoute | Error>): typeof fetch & { requested: string[] } {
  const requested: string[] = [];
  const impl = async (input: string | URL | Request): Promise<Response> => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    requested.push(url);
    const route = routes[url];
    if (route instanceof Error) throw route;
    if (!route) return new Response('not found', { status: 404 });
    return new Response(route.body, {
      status: route.status ?? 200,
      headers: { 'content-type': route.contentType ?? 'text/html; charset=utf-8' },
    });
  };
  return Object.assign(impl, { requested });
}

export function articleHtml(paragraphs: string[]): string {
  return `<html><head><title>t</title><script>var x = 1;</script></head><body>
<nav><p>Menu</p></nav>
<article>${paragraphs.map(p => `<p>${p}</p>`).join('\n')}</article>
</body></html>`;
}

/**
 * History backend whose writes always fail, as a locked database would
 */
export class FailingHistoryBackend implements HistoryBackend {
  readonly kind = 'sqlite';
  writes = 0;

  async get(): Promise<HistoryBlob | null> {
    return null;
  }

  async put(): Promise<void> {
    this.writes++;
    throw new Error('SQLITE_BUSY: database is locked');
  }
}

/**
 * A promise plus the function that settles it
 */
export class Deferred<T> {
  readonly promise: Promise<T>;
  resolve: (value: T) => void = () => undefined;

  constructor() {
    this.promise = new Promise<T>(resolve => {
      this.resolve = resolve;
    });
  }
}
