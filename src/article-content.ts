import { USER_AGENT } from "@/lib/constants";
import { describeError } from "@/lib/errors";
import { GLYPHS, logDetail } from "@/lib/log";
import { runPool } from "@/lib/run-pool";
import { normaliseContent } from "@/lib/text";
import type { Article } from "@/lib/types";

/** Feed bodies shorter than this, as plain text, are replaced by the linked page when it says more. */
export const MIN_BODY_CHARS = 200;

export interface ContentFetcher {
  /** Plain text of the page at `url`, or null when it cannot be used. */
  fetch(url: string): Promise<string | null>;
}

export class HttpContentFetcher implements ContentFetcher {
  private readonly timeoutMs: number;

  constructor(options: { timeoutMs?: number } = {}) {
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async fetch(url: string): Promise<string | null> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: {
          "User-Agent": USER_AGENT
        }
      });
      if (!response.ok) {
        return null;
      }
      const contentType = response.headers.get("content-type") ?? "";
      if (!contentType.includes("text/html")) {
        return null;
      }
      const text = normaliseContent(await response.text());
      return text.length > 0 ? text : null;
    } catch (error) {
      logDetail(GLYPHS.warn, `Could not fetch ${url}: ${describeError(error)}`);
      return null;
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Fills in articles whose feed entry carries little or no body with the text of
 * the linked page. Articles keep their feed body when the page is unusable.
 */
export async function hydrateArticles(
  articles: readonly Article[],
  contentFetcher: ContentFetcher,
  concurrency: number
): Promise<Article[]> {
  const hydrated = [...articles];
  await runPool(articles, concurrency, async (article, index) => {
    const body = normaliseContent(article.raw_content);
    if (body.length >= MIN_BODY_CHARS) {
      return;
    }
    const page = await contentFetcher.fetch(article.url);
    if (page && page.length > body.length) {
      hydrated[index] = { ...article, raw_content: page };
    }
  });
  return hydrated;
}
