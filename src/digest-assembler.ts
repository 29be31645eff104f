import type { DigestHistory } from "@/digest-history";
import { DigestAbortedError, PermanentProviderError } from "@/lib/errors";
import { summaryFingerprint } from "@/lib/fingerprint";
import { runPool } from "@/lib/run-pool";
import { hostnameOf } from "@/lib/text";
import type { Article, DigestArticle, DigestDay, DigestPlan, NormalizedDigest, ResolvedSource } from "@/lib/types";
import type { Summarizer } from "@/summarizer";

export interface AssembleOptions {
  summarizer: Summarizer;
  history: DigestHistory;
  concurrency: number;
  siteUrl: string;
  now?: () => Date;
  onArticle?: (article: DigestArticle) => void;
}

/**
 * Turns fetched articles into a normalised digest. `articlesBySource` is indexed
 * like `plan.sources`; a null slot is a source whose feed could not be fetched.
 * Sources are summarised concurrently but read back in definition order.
 */
export async function assembleDigest(
  plan: DigestPlan,
  articlesBySource: ReadonlyArray<readonly Article[] | null>,
  options: AssembleOptions
): Promise<NormalizedDigest> {
  const slots: DigestArticle[][] = plan.sources.map(() => []);
  const controller = new AbortController();
  const failures: Array<{ source: ResolvedSource; error: PermanentProviderError }> = [];

  await runPool(
    plan.sources,
    options.concurrency,
    async (source, index) => {
      const articles = articlesBySource[index];
      if (!articles) return;
      try {
        slots[index] = await summariseSource(source, articles, options, controller.signal);
      } catch (error) {
        if (error instanceof PermanentProviderError) {
          if (failures.length === 0) {
            failures.push({ source, error });
          }
          controller.abort(error);
          return;
        }
        if (controller.signal.aborted) {
          return;
        }
        controller.abort(error);
        throw error;
      }
    },
    controller.signal
  );

  const failure = failures[0];
  if (failure) {
    throw new DigestAbortedError(plan.digestId, failure.source.url, failure.error);
  }

  return {
    id: plan.digestId,
    name: plan.name,
    siteUrl: options.siteUrl,
    days: groupByDay(slots.flat())
  };
}

async function summariseSource(
  source: ResolvedSource,
  articles: readonly Article[],
  options: AssembleOptions,
  signal: AbortSignal
): Promise<DigestArticle[]> {
  const results: DigestArticle[] = [];
  for (const article of articles) {
    signal.throwIfAborted();
    const item = await summariseArticle(source, article, options, signal);
    results.push(item);
    options.onArticle?.(item);
  }
  return results;
}

async function summariseArticle(
  source: ResolvedSource,
  article: Article,
  options: AssembleOptions,
  signal: AbortSignal
): Promise<DigestArticle> {
  const now = options.now ?? (() => new Date());
  const previous = options.history.get(article.url);
  const fingerprint = summaryFingerprint(article, source.settings);
  const base = {
    title: article.title,
    url: article.url,
    publishedAt: article.published_at ?? previous?.publishedAt ?? now().toISOString(),
    source: sourceLabel(source),
    sourceUrl: source.url,
    ...(source.group ? { group: source.group } : {}),
    fingerprint
  };

  // Entries made from other content or settings are summarised afresh
  if (previous && previous.fingerprint === fingerprint) {
    return { ...base, title: previous.title, publishedAt: previous.publishedAt, summary: previous.summary, summaryStatus: "history" };
  }
  if (!source.settings.do_summarize) {
    return { ...base, summary: article.raw_content, summaryStatus: "passthrough" };
  }
  const outcome = await options.summarizer.summarize(article, source.settings, signal);
  return { ...base, summary: outcome.text, summaryStatus: outcome.status };
}

export function sourceLabel(source: Pick<ResolvedSource, "title" | "url">): string {
  return source.title ?? hostnameOf(source.url);
}

/** Buckets articles by UTC publication day, newest day first; order inside a day is kept. */
export function groupByDay(articles: readonly DigestArticle[]): DigestDay[] {
  const days = new Map<string, DigestArticle[]>();
  for (const article of articles) {
    const key = dayKey(article.publishedAt);
    const bucket = days.get(key);
    if (bucket) {
      bucket.push(article);
    } else {
      days.set(key, [article]);
    }
  }
  return [...days.keys()]
    .sort((a, b) => b.localeCompare(a))
    .map((date) => ({ date, articles: days.get(date) ?? [] }));
}

function dayKey(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    return iso.slice(0, 10);
  }
  return date.toISOString().slice(0, 10);
}
