import type { NormalizedDigest } from "@/lib/types";
import { digestUrl, flattenDigest } from "./shared";

export const JSON_FEED_VERSION = "https://jsonfeed.org/version/1.1";

/**
 * JSON Feed 1.1. The originating source travels in the `_source` extension
 * object, which readers that do not know it ignore.
 */
export function renderJsonFeed(digest: NormalizedDigest): string {
  const feed = {
    version: JSON_FEED_VERSION,
    title: digest.name,
    home_page_url: digest.siteUrl,
    feed_url: digestUrl(digest, ".json"),
    items: flattenDigest(digest).map((article) => ({
      id: article.url,
      url: article.url,
      title: article.title,
      content_text: article.summary,
      date_published: article.publishedAt,
      _source: {
        title: article.source,
        url: article.sourceUrl,
        ...(article.group ? { group: article.group } : {})
      }
    }))
  };
  return `${JSON.stringify(feed, null, 2)}\n`;
}
