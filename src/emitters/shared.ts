import { XMLBuilder } from "fast-xml-parser";
import type { DigestArticle, NormalizedDigest } from "@/lib/types";

const EPOCH = new Date(0).toISOString();

/** Articles in emission order: newest day first, source order within a day. */
export function flattenDigest(digest: NormalizedDigest): DigestArticle[] {
  return digest.days.flatMap((day) => day.articles);
}

/** Most recent publication date in the digest; the epoch for an empty one. */
export function latestPublished(digest: NormalizedDigest): Date {
  let latest = EPOCH;
  for (const article of flattenDigest(digest)) {
    const date = new Date(article.publishedAt);
    if (Number.isNaN(date.getTime())) continue;
    const iso = date.toISOString();
    if (iso > latest) {
      latest = iso;
    }
  }
  return new Date(latest);
}

export function digestUrl(digest: NormalizedDigest, extension: string): string {
  return new URL(`${digest.id}${extension}`, digest.siteUrl).toString();
}

export function buildXml(document: Record<string, unknown>): string {
  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    format: true,
    suppressEmptyNode: true,
    // isPermaLink="true" would otherwise be written as a bare attribute
    suppressBooleanAttributes: false
  });
  return builder.build({
    "?xml": { "@_version": "1.0", "@_encoding": "UTF-8" },
    ...document
  });
}
