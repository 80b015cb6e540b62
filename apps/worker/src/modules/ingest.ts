import axios from 'axios';
import type { AxiosRequestConfig, AxiosResponse } from 'axios';
import RSSParser from 'rss-parser';
import type { NewsItem } from '@since-sean-left/shared';

type FeedItem = RSSParser.Item & { updated?: string };

export interface FeedHttpClient {
  get(url: string, config?: AxiosRequestConfig): Promise<Pick<AxiosResponse<string>, 'status' | 'statusText' | 'data'>>;
}

export interface NewsCollector {
  collectRecentItems(feedUrls: readonly string[], lookbackHours: number, now?: Date): Promise<NewsItem[]>;
}

const parser = new RSSParser<Record<string, unknown>, { updated?: string }>({
  customFields: { item: ['updated'] }
});

export function stripTags(html: string): string {
  return html.replace(/<[^>]+>/g, '');
}

// published first, then updated; a value that does not parse counts as absent
export function resolvePublishedAt(item: FeedItem): Date | undefined {
  for (const candidate of [item.isoDate, item.pubDate, item.updated]) {
    if (!candidate) continue;
    const date = new Date(candidate);
    if (!isNaN(date.getTime())) {
      return date;
    }
  }
  return undefined;
}

export function isWithinWindow(publishedAt: Date | undefined, cutoff: Date): boolean {
  return publishedAt === undefined || publishedAt.getTime() >= cutoff.getTime();
}

export function dedupeByTitle(items: NewsItem[]): NewsItem[] {
  const seen = new Set<string>();
  const unique: NewsItem[] = [];

  for (const item of items) {
    if (seen.has(item.title)) continue;
    seen.add(item.title);
    unique.push(item);
  }

  return unique;
}

export class IngestModule implements NewsCollector {
  private readonly USER_AGENT = 'Mozilla/5.0 (compatible; SinceSeanLeft/1.0)';
  private readonly TIMEOUT = 15000; // 15 seconds

  constructor(private readonly http: FeedHttpClient = axios) {}

  async collectRecentItems(feedUrls: readonly string[], lookbackHours: number, now: Date = new Date()): Promise<NewsItem[]> {
    const cutoff = new Date(now.getTime() - lookbackHours * 60 * 60 * 1000);
    const items: NewsItem[] = [];

    for (const feedUrl of feedUrls) {
      items.push(...(await this.processFeed(feedUrl, cutoff)));
    }

    return dedupeByTitle(items);
  }

  async processFeed(feedUrl: string, cutoff: Date): Promise<NewsItem[]> {
    try {
      console.log(`Processing feed: ${feedUrl}`);

      const response = await this.http.get(feedUrl, {
        headers: { 'User-Agent': this.USER_AGENT },
        timeout: this.TIMEOUT,
        responseType: 'text'
      });

      if (response.status !== 200) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }

      const feed = await parser.parseString(response.data);
      const recent: NewsItem[] = [];

      for (const item of feed.items) {
        if (!isWithinWindow(resolvePublishedAt(item), cutoff)) continue;

        const title = (item.title ?? '').trim();
        if (!title) continue;

        const summary = stripTags((item.summary ?? item.content ?? '').trim());
        recent.push({ title, summary });
      }

      console.log(`Found ${recent.length} recent items in ${feedUrl}`);
      return recent;
    } catch (error) {
      console.warn(`⚠️ Failed to fetch ${feedUrl}:`, error instanceof Error ? error.message : error);
      return [];
    }
  }
}
