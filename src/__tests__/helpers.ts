import type { CacheStore } from "../cache-store";
import type { FeedFetcher } from "../feed-fetcher";
import { FeedFetchError } from "../lib/errors";
import type { Article, SummaryRecord } from "../lib/types";

export class MemoryCache implements CacheStore {
  readonly records = new Map<string, SummaryRecord>();

  async lookup(fingerprint: string): Promise<SummaryRecord | undefined> {
    return this.records.get(fingerprint);
  }

  async store(fingerprint: string, record: SummaryRecord): Promise<void> {
    this.records.set(fingerprint, record);
  }

  async prune(): Promise<number> {
    return 0;
  }
}

/** Serves canned articles per feed URL; unknown URLs fail like an unreachable feed. */
export class StaticFetcher implements FeedFetcher {
  readonly calls: string[] = [];

  constructor(private readonly feeds: Record<string, Article[]>) {}

  async fetch(url: string): Promise<Article[]> {
    this.calls.push(url);
    const articles = this.feeds[url];
    if (!articles) {
      throw new FeedFetchError(url, "getaddrinfo ENOTFOUND");
    }
    return articles;
  }
}

export function makeArticle(feedUrl: string, slug: string, overrides: Partial<Article> = {}): Article {
  return {
    title: `Story ${slug}`,
    url: `${new URL(feedUrl).origin}/${slug}`,
    published_at: "2024-05-01T08:00:00.000Z",
    raw_content: `<p>Full text of ${slug}.</p>`,
    source_url: feedUrl,
    ...overrides
  };
}
