import { RssFeedClient, parseFeedXml, toFeedEntry } from '../../ingestion/rss-fetcher';
import { parsePublished } from '../../utils/time';
import { fakeFetch } from '../helpers/fakes';

const RSS_WITHOUT_VERSION = `<?xml version="1.0" encoding="UTF-8"?>
<rss>
  <channel>
    <title>Test feed</title>
    <item>
      <title>Launch &amp; landing</title>
      <link>https://news.test/1</link>
      <description>&lt;p&gt;Rocket &lt;b&gt;landed&lt;/b&gt; safely&lt;/p&gt;</description>
      <pubDate>Fri, 03 May 2024 09:00:00 GMT</pubDate>
      <category>space</category>
    </item>
    <item>
      <title>No link here</title>
    </item>
  </channel>
</rss>`;

const ATOM = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Atom feed</title>
  <entry>
    <title>Atom story</title>
    <link href="https://atom.test/1"/>
    <updated>2024-05-02T10:00:00Z</updated>
    <summary>Short summary</summary>
  </entry>
</feed>`;

describe('parseFeedXml', () => {
  it('reads RSS that omits the version attribute and drops linkless items', async () => {
    const entries = await parseFeedXml(RSS_WITHOUT_VERSION);

    expect(entries).toHaveLength(1);
    expect(entries[0].title).toBe('Launch & landing');
    expect(entries[0].link).toBe('https://news.test/1');
    expect(entries[0].summary).toBe('Rocket landed safely');
    expect(entries[0].tags).toEqual(['space']);
    expect(parsePublished(entries[0].published)).toBe(Date.parse('2024-05-03T09:00:00Z'));
  });

  it('reads Atom entries', async () => {
    const entries = await parseFeedXml(ATOM);

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ title: 'Atom story', link: 'https://atom.test/1', summary: 'Short summary' });
    expect(parsePublished(entries[0].published)).toBe(Date.parse('2024-05-02T10:00:00Z'));
  });
});

describe('toFeedEntry', () => {
  it('prefers the snippet and falls back to the updated date', () => {
    expect(
      toFeedEntry({
        title: '<i>Title</i>',
        link: ' https://x.test/a ',
        contentSnippet: 'Snippet',
        summary: 'Summary',
        updated: '2024-05-01T00:00:00Z',
        categories: ['plain'],
      })
    ).toEqual({
      title: 'Title',
      link: 'https://x.test/a',
      summary: 'Snippet',
      published: '2024-05-01T00:00:00Z',
      tags: ['plain'],
    });
  });

  it('returns null without a link', () => {
    expect(toFeedEntry({ title: 'x', link: '  ' })).toBeNull();
  });
});

describe('RssFeedClient', () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('fetches and parses a feed', async () => {
    const fetchImpl = fakeFetch({
      'https://feed.test/rss': { body: RSS_WITHOUT_VERSION, contentType: 'application/rss+xml' },
    });
    const entries = await new RssFeedClient({ fetchImpl }).fetchFeed('https://feed.test/rss');

    expect(entries.map(e => e.link)).toEqual(['https://news.test/1']);
  });

  it('throws after the last failed attempt', async () => {
    const fetchImpl = fakeFetch({ 'https://feed.test/broken': { status: 500, body: 'oops' } });

    await expect(new RssFeedClient({ fetchImpl }).fetchFeed('https://feed.test/broken')).rejects.toThrow('HTTP 500');
    expect(fetchImpl.requested).toEqual(['https://feed.test/broken']);
  });

  it('retries with a delay before giving up on a feed', async () => {
    let calls = 0;
    const flaky: typeof fetch = async () => {
      calls++;
      if (calls === 1) {
        throw new Error('ECONNRESET');
      }
      return new Response(RSS_WITHOUT_VERSION, { status: 200, headers: { 'content-type': 'application/rss+xml' } });
    };

    const entries = await new RssFeedClient({ fetchImpl: flaky, attempts: 2 }).fetchFeed('https://feed.test/flaky');

    expect(calls).toBe(2);
    expect(entries).toHaveLength(1);
    expect(errorSpy).toHaveBeenCalledWith('Feed fetch attempt 1/2 failed for https://feed.test/flaky:', 'ECONNRESET');
  });
});
