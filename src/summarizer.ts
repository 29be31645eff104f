import type { AiProvider, AiRequest } from "@/ai-provider";
import type { CacheStore } from "@/cache-store";
import { CacheIOError, TransientProviderError } from "@/lib/errors";
import { summaryFingerprint } from "@/lib/fingerprint";
import { GLYPHS, logDetail, logWarn } from "@/lib/log";
import { buildExcerpt, normaliseModelOutput } from "@/lib/text";
import type { Article, EffectiveSettings, SummaryRecord } from "@/lib/types";
import { buildSummaryPrompt } from "@/summary-prompt";

export interface SummaryOutcome {
  text: string;
  status: "generated" | "cached" | "fallback";
}

export interface SummarizerStats {
  cacheHits: number;
  cacheMisses: number;
  providerCalls: number;
  sharedRequests: number;
  fallbacks: number;
}

export interface SummarizerOptions {
  provider: AiProvider;
  cache: CacheStore;
  /** Provider attempts per article, first call included. */
  maxAttempts?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  /** Receives recoverable problems worth reporting at the end of the run. */
  onWarning?: (message: string) => void;
}

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 500;

/**
 * Cache-aware gateway to the AI provider. Identical requests in flight at the
 * same time share one provider call; transient failures are retried with
 * exponential backoff and end in an excerpt fallback when attempts run out.
 */
export class Summarizer {
  readonly stats: SummarizerStats = {
    cacheHits: 0,
    cacheMisses: 0,
    providerCalls: 0,
    sharedRequests: 0,
    fallbacks: 0
  };

  private readonly inflight = new Map<string, Promise<SummaryOutcome>>();
  private readonly provider: AiProvider;
  private readonly cache: CacheStore;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly onWarning: (message: string) => void;
  private readonly warned = new Set<string>();

  constructor(options: SummarizerOptions) {
    this.provider = options.provider;
    this.cache = options.cache;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.now = options.now ?? (() => new Date());
    this.onWarning = options.onWarning ?? logWarn;
  }

  async summarize(article: Article, settings: Readonly<EffectiveSettings>, signal?: AbortSignal): Promise<SummaryOutcome> {
    if (!settings.do_summarize) {
      throw new Error(`Summarizer called for ${article.url} although do_summarize is off`);
    }
    const fingerprint = summaryFingerprint(article, settings);

    const pending = this.inflight.get(fingerprint);
    if (pending) {
      this.stats.sharedRequests++;
      return pending;
    }
    const task = this.resolve(fingerprint, article, settings, signal).finally(() => {
      this.inflight.delete(fingerprint);
    });
    this.inflight.set(fingerprint, task);
    return task;
  }

  private async resolve(
    fingerprint: string,
    article: Article,
    settings: Readonly<EffectiveSettings>,
    signal?: AbortSignal
  ): Promise<SummaryOutcome> {
    const cached = await this.lookup(fingerprint);
    if (cached) {
      this.stats.cacheHits++;
      return { text: cached.summary_text, status: "cached" };
    }
    this.stats.cacheMisses++;

    if (!settings.api_key) {
      this.warnOnce("No API key configured; summaries fall back to excerpts.");
      return this.fallback(article, settings);
    }

    const request: AiRequest = {
      content: buildSummaryPrompt(article, settings),
      model: settings.model,
      max_tokens: settings.max_tokens,
      temperature: settings.temperature,
      system_prompt: settings.system_prompt,
      api_key: settings.api_key
    };
    const text = await this.generate(request, article, signal);
    if (text === null) {
      this.onWarning(`Summary unavailable after ${this.maxAttempts} attempts, using excerpt: ${article.url}`);
      return this.fallback(article, settings);
    }

    await this.remember({
      fingerprint,
      summary_text: text,
      model: settings.model,
      summary_length: settings.summary_length,
      created_at: this.now().toISOString()
    });
    return { text, status: "generated" };
  }

  /** Returns the normalised text, or null once every attempt failed transiently. */
  private async generate(request: AiRequest, article: Article, signal?: AbortSignal): Promise<string | null> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      signal?.throwIfAborted();
      try {
        this.stats.providerCalls++;
        const response = await this.provider.complete(request, signal);
        const text = normaliseModelOutput(response.text);
        if (!text) {
          throw new TransientProviderError("AI provider returned an empty summary");
        }
        return text;
      } catch (error) {
        if (!(error instanceof TransientProviderError)) {
          throw error;
        }
        logDetail(GLYPHS.warn, `Attempt ${attempt}/${this.maxAttempts} failed for "${article.title}": ${error.message}`);
      }
      if (attempt < this.maxAttempts) {
        await this.sleep(backoffDelay(attempt, this.baseDelayMs));
      }
    }
    return null;
  }

  private async lookup(fingerprint: string): Promise<SummaryRecord | undefined> {
    try {
      return await this.cache.lookup(fingerprint);
    } catch (error) {
      if (error instanceof CacheIOError) {
        this.warnOnce(`${error.message}; treating as a cache miss`);
        return undefined;
      }
      throw error;
    }
  }

  private async remember(record: SummaryRecord): Promise<void> {
    try {
      await this.cache.store(record.fingerprint, record);
    } catch (error) {
      if (error instanceof CacheIOError) {
        this.warnOnce(`${error.message}; summary not cached`);
        return;
      }
      throw error;
    }
  }

  // Cache and key problems repeat for every article; report each distinct one once.
  private warnOnce(message: string): void {
    if (this.warned.has(message)) return;
    this.warned.add(message);
    this.onWarning(message);
  }

  private fallback(article: Article, settings: Readonly<EffectiveSettings>): SummaryOutcome {
    this.stats.fallbacks++;
    return { text: buildExcerpt(article.raw_content, settings.summary_length), status: "fallback" };
  }
}

/** Exponential backoff with 10-30% jitter on top. */
export function backoffDelay(attempt: number, baseDelayMs: number): number {
  const base = baseDelayMs * Math.pow(2, attempt - 1);
  const jitter = base * (0.1 + Math.random() * 0.2);
  return Math.round(base + jitter);
}
