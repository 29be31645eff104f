import type { NormalizedDigest } from "@/lib/types";
import { buildXml, digestUrl, flattenDigest, latestPublished } from "./shared";

export function renderAtom(digest: NormalizedDigest): string {
  const selfUrl = digestUrl(digest, ".atom");
  const entries = flattenDigest(digest).map((article) => ({
    title: article.title,
    id: article.url,
    link: { "@_href": article.url },
    published: article.publishedAt,
    updated: article.publishedAt,
    summary: article.summary,
    source: {
      title: article.source,
      link: { "@_href": article.sourceUrl }
    },
    ...(article.group ? { category: { "@_term": article.group } } : {})
  }));

  return buildXml({
    feed: {
      "@_xmlns": "http://www.w3.org/2005/Atom",
      title: digest.name,
      id: selfUrl,
      updated: latestPublished(digest).toISOString(),
      author: { name: digest.name },
      link: [{ "@_href": digest.siteUrl }, { "@_rel": "self", "@_href": selfUrl }],
      entry: entries
    }
  });
}
