/**
 * News feeds
 *
 * Pages publish articles taken from their RSS feed. Each feed is fetched at
 * most once per simulated day; concurrent readers of the same feed share one
 * request.
 */

import Parser from 'rss-parser';
import { FeedError, errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('News');

export interface Article {
  title: string;
  summary: string;
  link: string;
  published?: string;
}

export interface NewsSource {
  articles(feedUrl: string, day: number, signal?: AbortSignal): Promise<Article[]>;
}

interface CachedFeed {
  day: number;
  pending: Promise<Article[]>;
}

export function toArticle(item: Parser.Item): Article | undefined {
  const title = item.title?.trim();
  const link = item.link?.trim();
  if (!title || !link) return undefined;
  return {
    title,
    summary: (item.contentSnippet ?? item.summary ?? '').trim(),
    link,
    published: item.isoDate ?? item.pubDate,
  };
}

export class RssFeedReader implements NewsSource {
  private readonly parser: Parser = new Parser();
  private readonly cache = new Map<string, CachedFeed>();

  constructor(private readonly fetchImpl: typeof fetch = fetch) {}

  articles(feedUrl: string, day: number, signal?: AbortSignal): Promise<Article[]> {
    const cached = this.cache.get(feedUrl);
    if (cached && cached.day === day) return cached.pending;

    const entry: CachedFeed = { day, pending: this.load(feedUrl, signal) };
    this.cache.set(feedUrl, entry);
    entry.pending.catch(() => {
      if (this.cache.get(feedUrl) === entry) this.cache.delete(feedUrl);
    });
    return entry.pending;
  }

  private async load(feedUrl: string, signal?: AbortSignal): Promise<Article[]> {
    const response = await this.fetchImpl(feedUrl, { signal });
    if (!response.ok) {
      throw new FeedError(feedUrl, `HTTP ${response.status}`, response.status);
    }
    const xml = await response.text();

    let items: Parser.Item[];
    try {
      items = (await this.parser.parseString(xml)).items;
    } catch (error) {
      throw new FeedError(feedUrl, `unreadable feed: ${errorMessage(error)}`);
    }

    const articles: Article[] = [];
    for (const item of items) {
      const article = toArticle(item);
      if (article) articles.push(article);
    }
    log.debug(`Fetched ${articles.length} articles from ${feedUrl}`);
    return articles;
  }
}
