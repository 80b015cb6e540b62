import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  IngestModule,
  dedupeByTitle,
  isWithinWindow,
  resolvePublishedAt,
  stripTags
} from '../../modules/ingest.js';
import type { FeedHttpClient } from '../../modules/ingest.js';

const NOW = new Date('2026-03-01T12:00:00Z');

function rss(items: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Politics</title>
    <link>https://news.example.com/politics</link>
    <description>Test feed</description>
    ${items}
  </channel>
</rss>`;
}

function rssItem(title: string, pubDate?: string, description?: string): string {
  return `<item>
      <title>${title}</title>
      <link>https://news.example.com/${encodeURIComponent(title)}</link>
      ${pubDate ? `<pubDate>${pubDate}</pubDate>` : ''}
      ${description ? `<description><![CDATA[${description}]]></description>` : ''}
    </item>`;
}

function mockConsoleWarn() {
  return vi.spyOn(console, 'warn').mockImplementation(() => undefined);
}

function okResponse(data: string) {
  return { status: 200, statusText: 'OK', data };
}

describe('IngestModule', () => {
  let warnSpy: ReturnType<typeof mockConsoleWarn>;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = mockConsoleWarn();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should keep recent and undated items and drop old ones', async () => {
    const http: FeedHttpClient = {
      get: vi.fn(async () => okResponse(rss([
        rssItem('PM Resigns: Full Statement', 'Sun, 01 Mar 2026 10:00:00 GMT', '<p>Statement given in <b>Downing Street</b>.</p>'),
        rssItem('Budget Leaked', 'Sat, 28 Feb 2026 09:00:00 GMT', 'Old news.'),
        rssItem('Minister Spotted Somewhere', undefined, 'No date on this one.')
      ].join('\n'))))
    };

    const items = await new IngestModule(http).collectRecentItems(['https://feeds.example.com/a.xml'], 8, NOW);

    expect(items).toEqual([
      { title: 'PM Resigns: Full Statement', summary: 'Statement given in Downing Street.' },
      { title: 'Minister Spotted Somewhere', summary: 'No date on this one.' }
    ]);
  });

  it('should send the user agent and timeout with each request', async () => {
    const get = vi.fn(async () => okResponse(rss('')));
    await new IngestModule({ get }).collectRecentItems(['https://feeds.example.com/a.xml'], 8, NOW);

    expect(get).toHaveBeenCalledWith('https://feeds.example.com/a.xml', {
      headers: { 'User-Agent': 'Mozilla/5.0 (compatible; SinceSeanLeft/1.0)' },
      timeout: 15000,
      responseType: 'text'
    });
  });

  it('should deduplicate titles across feeds in first-seen order', async () => {
    const feeds: Record<string, string> = {
      'https://feeds.example.com/a.xml': rss([
        rssItem('Whip Removed', 'Sun, 01 Mar 2026 11:00:00 GMT', 'From feed A.'),
        rssItem('Poll Slump', 'Sun, 01 Mar 2026 11:30:00 GMT', 'From feed A.')
      ].join('\n')),
      'https://feeds.example.com/b.xml': rss([
        rssItem('Poll Slump', 'Sun, 01 Mar 2026 11:45:00 GMT', 'From feed B.'),
        rssItem('U-Turn on Fuel Duty', 'Sun, 01 Mar 2026 09:00:00 GMT', 'From feed B.')
      ].join('\n'))
    };
    const http: FeedHttpClient = {
      get: vi.fn(async (url: string) => okResponse(feeds[url] ?? ''))
    };

    const items = await new IngestModule(http).collectRecentItems(Object.keys(feeds), 8, NOW);

    expect(items).toEqual([
      { title: 'Whip Removed', summary: 'From feed A.' },
      { title: 'Poll Slump', summary: 'From feed A.' },
      { title: 'U-Turn on Fuel Duty', summary: 'From feed B.' }
    ]);
  });

  it('should skip a failing feed and keep the others', async () => {
    const http: FeedHttpClient = {
      get: vi.fn(async (url: string) => {
        if (url.includes('broken')) {
          throw new Error('getaddrinfo ENOTFOUND broken.example.com');
        }
        return okResponse(rss(rssItem('Cabinet Reshuffle', 'Sun, 01 Mar 2026 08:00:00 GMT', 'Musical chairs.')));
      })
    };

    const items = await new IngestModule(http).collectRecentItems(
      ['https://broken.example.com/rss', 'https://feeds.example.com/a.xml'],
      8,
      NOW
    );

    expect(items).toEqual([{ title: 'Cabinet Reshuffle', summary: 'Musical chairs.' }]);
    expect(warnSpy).toHaveBeenCalledWith(
      '⚠️ Failed to fetch https://broken.example.com/rss:',
      'getaddrinfo ENOTFOUND broken.example.com'
    );
  });

  it('should treat a non-200 status as a failed feed', async () => {
    const http: FeedHttpClient = {
      get: vi.fn(async () => ({ status: 204, statusText: 'No Content', data: '' }))
    };

    const items = await new IngestModule(http).collectRecentItems(['https://feeds.example.com/a.xml'], 8, NOW);

    expect(items).toEqual([]);
    expect(warnSpy).toHaveBeenCalledWith('⚠️ Failed to fetch https://feeds.example.com/a.xml:', 'HTTP 204: No Content');
  });

  it('should skip items without a title', async () => {
    const http: FeedHttpClient = {
      get: vi.fn(async () => okResponse(rss(rssItem('   ', 'Sun, 01 Mar 2026 10:00:00 GMT', 'Untitled.'))))
    };

    const items = await new IngestModule(http).collectRecentItems(['https://feeds.example.com/a.xml'], 8, NOW);

    expect(items).toEqual([]);
  });
});

describe('ingest helpers', () => {
  it('should strip markup tags but leave text between them', () => {
    expect(stripTags('<p>One <a href="https://example.com">two</a></p><br/>three')).toBe('One twothree');
  });

  it('should leave text from unbalanced markup in place', () => {
    expect(stripTags('Unclosed <b tag')).toBe('Unclosed <b tag');
  });

  it('should prefer the published time over the updated time', () => {
    const published = resolvePublishedAt({
      pubDate: 'Sun, 01 Mar 2026 10:00:00 GMT',
      updated: '2026-02-01T00:00:00Z'
    });
    expect(published?.toISOString()).toBe('2026-03-01T10:00:00.000Z');
  });

  it('should fall back to the updated time', () => {
    expect(resolvePublishedAt({ updated: '2026-02-27T06:30:00Z' })?.toISOString()).toBe('2026-02-27T06:30:00.000Z');
  });

  it('should treat an unparsable date as absent', () => {
    expect(resolvePublishedAt({ pubDate: 'sometime last week' })).toBeUndefined();
  });

  it('should include entries at or after the cutoff and undated entries', () => {
    const cutoff = new Date('2026-03-01T04:00:00Z');

    expect(isWithinWindow(undefined, cutoff)).toBe(true);
    expect(isWithinWindow(new Date('2026-03-01T04:00:00Z'), cutoff)).toBe(true);
    expect(isWithinWindow(new Date('2026-03-01T03:59:59Z'), cutoff)).toBe(false);
  });

  it('should keep each distinct title once', () => {
    const items = dedupeByTitle([
      { title: 'A', summary: '1' },
      { title: 'B', summary: '2' },
      { title: 'A', summary: '3' },
      { title: 'a', summary: '4' }
    ]);

    expect(items).toEqual([
      { title: 'A', summary: '1' },
      { title: 'B', summary: '2' },
      { title: 'a', summary: '4' }
    ]);
  });
});
