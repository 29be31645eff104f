import Parser from "rss-parser";
import { USER_AGENT } from "@/lib/constants";
import { FeedFetchError, describeError } from "@/lib/errors";
import type { Article } from "@/lib/types";

export interface FeedFetcher {
  /** Articles in feed order; rejects with FeedFetchError when the feed cannot be used. */
  fetch(url: string): Promise<Article[]>;
}

export class RssFeedFetcher implements FeedFetcher {
  private readonly parser: Parser;

  constructor(options: { timeoutMs?: number } = {}) {
    this.parser = new Parser({
      timeout: options.timeoutMs ?? 10_000,
      headers: {
        "User-Agent": USER_AGENT
      }
    });
  }

  async fetch(url: string): Promise<Article[]> {
    const feed = await this.parser.parseURL(url).catch((error: unknown) => {
      throw new FeedFetchError(url, describeError(error), { cause: error });
    });
    const articles: Article[] = [];
    for (const item of feed.items ?? []) {
      const link = stringOrNull(item.link) ?? stringOrNull(item.guid);
      if (!link) {
        continue;
      }
      articles.push({
        title: stringOrNull(item.title) ?? "Untitled",
        url: link,
        published_at: parsePublishedAt(stringOrNull(item.isoDate) ?? stringOrNull(item.pubDate)),
        raw_content:
          stringOrNull(item["content:encoded"]) ?? stringOrNull(item.content) ?? stringOrNull(item.contentSnippet) ?? "",
        source_url: url
      });
    }
    return articles;
  }
}

function parsePublishedAt(value: string | null): string | null {
  if (!value) {
    return null;
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return null;
  }
  return date.toISOString();
}

function stringOrNull(value: unknown): string | null {
  return typeof value === "string" && value.trim().length > 0 ? value : null;
}
