import type { NormalizedDigest } from "@/lib/types";
import { buildXml, digestUrl, flattenDigest, latestPublished } from "./shared";

export function renderRss(digest: NormalizedDigest): string {
  const items = flattenDigest(digest).map((article) => ({
    title: article.title,
    link: article.url,
    guid: { "@_isPermaLink": "true", "#text": article.url },
    description: article.summary,
    pubDate: new Date(article.publishedAt).toUTCString(),
    source: { "@_url": article.sourceUrl, "#text": article.source },
    ...(article.group ? { category: article.group } : {})
  }));

  return buildXml({
    rss: {
      "@_version": "2.0",
      "@_xmlns:atom": "http://www.w3.org/2005/Atom",
      channel: {
        title: digest.name,
        link: digest.siteUrl,
        description: `${digest.name} digest`,
        "atom:link": { "@_href": digestUrl(digest, ".xml"), "@_rel": "self", "@_type": "application/rss+xml" },
        lastBuildDate: latestPublished(digest).toUTCString(),
        item: items
      }
    }
  });
}
