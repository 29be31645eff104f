import type { AiProvider } from "@/ai-provider";
import { hydrateArticles, type ContentFetcher } from "@/article-content";
import { createCacheStore, type CacheStore } from "@/cache-store";
import { resolveDigests, type ResolveOptions } from "@/config-resolver";
import { assembleDigest } from "@/digest-assembler";
import { loadDigestHistory, saveDigestHistory, type DigestHistory } from "@/digest-history";
import { writeDigestOutputs } from "@/emitters";
import { flattenDigest } from "@/emitters/shared";
import type { FeedFetcher } from "@/feed-fetcher";
import { CacheIOError, DigestAbortedError, FeedFetchError, HistoryIOError, describeError } from "@/lib/errors";
import { logError, logWarn } from "@/lib/log";
import { runPool } from "@/lib/run-pool";
import type { Article, DigestArticle, DigestConfig, DigestPlan } from "@/lib/types";
import { Summarizer, type SummarizerStats } from "@/summarizer";

export type RunProgress =
  | { type: "digest-start"; plan: DigestPlan }
  | { type: "feed"; plan: DigestPlan; done: number; total: number }
  | { type: "article"; plan: DigestPlan; done: number; total: number }
  | { type: "digest-done"; plan: DigestPlan; files: string[]; articles: number }
  | { type: "digest-aborted"; plan: DigestPlan; reason: string };

export interface RunOptions extends ResolveOptions {
  config: DigestConfig;
  fetcher: FeedFetcher;
  /** Fetches the linked page for summarised articles whose feed body is thin; none when omitted. */
  contentFetcher?: ContentFetcher;
  provider: AiProvider;
  /** Defaults to the store selected by the global cache settings. */
  cache?: CacheStore;
  /** Restricts the run to these digest ids; every digest runs when omitted. */
  digestIds?: readonly string[];
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  baseDelayMs?: number;
  onWarning?: (message: string) => void;
  onProgress?: (event: RunProgress) => void;
}

export interface DigestOutcome {
  digestId: string;
  name: string;
  files: string[];
  articles: number;
}

export interface RunReport {
  digests: DigestOutcome[];
  skippedSources: Array<{ digestId: string; url: string; reason: string }>;
  abortedDigests: Array<{ digestId: string; sourceUrl: string; reason: string }>;
  fallbacks: Array<{ digestId: string; url: string; title: string }>;
  warnings: string[];
  cachePruned: number;
  stats: SummarizerStats;
}

/** True when nothing had to be skipped, aborted or replaced by an excerpt. */
export function runSucceeded(report: RunReport): boolean {
  return (
    report.skippedSources.length === 0 &&
    report.abortedDigests.length === 0 &&
    report.fallbacks.length === 0 &&
    report.warnings.length === 0
  );
}

/**
 * Builds every selected digest, one after the other. Failures that only affect a
 * source or a digest are recorded in the report; anything else rejects.
 */
export async function runDigests(options: RunOptions): Promise<RunReport> {
  const { config } = options;
  const plans = selectPlans(resolveDigests(config, options), options.digestIds);
  const report: RunReport = {
    digests: [],
    skippedSources: [],
    abortedDigests: [],
    fallbacks: [],
    warnings: [],
    cachePruned: 0,
    stats: { cacheHits: 0, cacheMisses: 0, providerCalls: 0, sharedRequests: 0, fallbacks: 0 }
  };
  const warn = (message: string) => {
    report.warnings.push(message);
    (options.onWarning ?? logWarn)(message);
  };

  const cache = options.cache ?? createCacheStore(config.global);
  const summarizer = new Summarizer({
    provider: options.provider,
    cache,
    maxAttempts: config.global.max_attempts,
    baseDelayMs: options.baseDelayMs,
    sleep: options.sleep,
    now: options.now,
    onWarning: warn
  });
  const outputDirectory = config.global.output_directory;

  for (const plan of plans) {
    options.onProgress?.({ type: "digest-start", plan });
    const slots = await fetchSources(plan, options, report, warn);
    const total = slots.reduce((sum, articles) => sum + (articles?.length ?? 0), 0);
    let done = 0;

    try {
      const history = await loadHistory(outputDirectory, plan.digestId, warn);
      const digest = await assembleDigest(plan, slots, {
        summarizer,
        history,
        concurrency: config.global.concurrency,
        siteUrl: config.global.site_url,
        now: options.now,
        onArticle: (article) => {
          done++;
          if (article.summaryStatus === "fallback") {
            report.fallbacks.push({ digestId: plan.digestId, url: article.url, title: article.title });
          }
          options.onProgress?.({ type: "article", plan, done, total });
        }
      });
      const files = await writeDigestOutputs(digest, plan.outputFormats, outputDirectory);
      const articles = flattenDigest(digest);
      await saveHistory(outputDirectory, plan.digestId, history, articles, warn);
      report.digests.push({ digestId: plan.digestId, name: plan.name, files, articles: articles.length });
      options.onProgress?.({ type: "digest-done", plan, files, articles: articles.length });
    } catch (error) {
      if (!(error instanceof DigestAbortedError)) {
        throw error;
      }
      options.onProgress?.({ type: "digest-aborted", plan, reason: error.message });
      logError(error.message);
      report.abortedDigests.push({
        digestId: error.digestId,
        sourceUrl: error.sourceUrl,
        reason: describeError(error.cause)
      });
    }
  }

  try {
    report.cachePruned = await cache.prune(config.global.cache_max_age_days, options.now?.());
  } catch (error) {
    if (!(error instanceof CacheIOError)) {
      throw error;
    }
    warn(`${error.message}; stale summaries kept`);
  }

  report.stats = { ...summarizer.stats };
  return report;
}

async function fetchSources(
  plan: DigestPlan,
  options: RunOptions,
  report: RunReport,
  warn: (message: string) => void
): Promise<Array<Article[] | null>> {
  const slots: Array<Article[] | null> = plan.sources.map(() => null);
  let done = 0;
  await runPool(plan.sources, options.config.global.concurrency, async (source, index) => {
    try {
      const articles = await options.fetcher.fetch(source.url);
      slots[index] =
        options.contentFetcher && source.settings.do_summarize
          ? await hydrateArticles(articles, options.contentFetcher, options.config.global.concurrency)
          : articles;
    } catch (error) {
      if (!(error instanceof FeedFetchError)) {
        throw error;
      }
      report.skippedSources.push({ digestId: plan.digestId, url: source.url, reason: error.message });
      warn(error.message);
    } finally {
      done++;
      options.onProgress?.({ type: "feed", plan, done, total: plan.sources.length });
    }
  });
  return slots;
}

// A broken history only costs the reuse of earlier summaries; the save that
// follows replaces the file.
async function loadHistory(outputDirectory: string, digestId: string, warn: (message: string) => void): Promise<DigestHistory> {
  try {
    return await loadDigestHistory(outputDirectory, digestId);
  } catch (error) {
    if (!(error instanceof HistoryIOError)) {
      throw error;
    }
    warn(`${error.message}; starting digest "${digestId}" from an empty history`);
    return new Map();
  }
}

async function saveHistory(
  outputDirectory: string,
  digestId: string,
  previous: DigestHistory,
  articles: readonly DigestArticle[],
  warn: (message: string) => void
): Promise<void> {
  try {
    await saveDigestHistory(outputDirectory, digestId, previous, articles);
  } catch (error) {
    if (!(error instanceof HistoryIOError)) {
      throw error;
    }
    warn(`${error.message}; history of digest "${digestId}" not updated`);
  }
}

function selectPlans(plans: DigestPlan[], digestIds: readonly string[] | undefined): DigestPlan[] {
  if (!digestIds || digestIds.length === 0) {
    return plans;
  }
  const known = new Set(plans.map((plan) => plan.digestId));
  const unknown = digestIds.filter((id) => !known.has(id));
  if (unknown.length > 0) {
    throw new RangeError(`Unknown digest id: ${unknown.join(", ")} (known: ${[...known].join(", ")})`);
  }
  return plans.filter((plan) => digestIds.includes(plan.digestId));
}
