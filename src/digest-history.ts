import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { HISTORY_DIR_NAME } from "@/lib/constants";
import { HistoryIOError, describeError } from "@/lib/errors";
import type { DigestArticle } from "@/lib/types";

const historyEntrySchema = z.object({
  url: z.string(),
  title: z.string(),
  summary: z.string(),
  publishedAt: z.string(),
  /** Entries without one never match and are summarised again. */
  fingerprint: z.string().optional()
});

const historyFileSchema = z.object({
  digest: z.string(),
  articles: z.array(historyEntrySchema)
});

const MAX_HISTORY_ENTRIES = 2_000;

export type HistoryEntry = z.infer<typeof historyEntrySchema>;

/** Articles a digest included in earlier runs, keyed by URL. */
export type DigestHistory = ReadonlyMap<string, HistoryEntry>;

export function historyPath(outputDirectory: string, digestId: string): string {
  return path.resolve(outputDirectory, HISTORY_DIR_NAME, `${digestId}.json`);
}

export async function loadDigestHistory(outputDirectory: string, digestId: string): Promise<DigestHistory> {
  const target = historyPath(outputDirectory, digestId);
  let raw: string;
  try {
    raw = await fs.readFile(target, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return new Map();
    }
    throw new HistoryIOError(digestId, `History file ${target} is unreadable: ${describeError(error)}`, { cause: error });
  }
  const parsed = historyFileSchema.safeParse(parseJson(raw));
  if (!parsed.success) {
    throw new HistoryIOError(digestId, `History file ${target} is malformed`);
  }
  return new Map(parsed.data.articles.map((entry) => [entry.url, entry] as const));
}

/**
 * Records the articles emitted by this run on top of the earlier history.
 * Fallback summaries are left out so the next run retries them.
 */
export async function saveDigestHistory(
  outputDirectory: string,
  digestId: string,
  previous: DigestHistory,
  articles: readonly DigestArticle[]
): Promise<void> {
  const target = historyPath(outputDirectory, digestId);
  const merged = new Map(previous);
  for (const article of articles) {
    if (article.summaryStatus === "fallback") continue;
    merged.set(article.url, {
      url: article.url,
      title: article.title,
      summary: article.summary,
      publishedAt: article.publishedAt,
      fingerprint: article.fingerprint
    });
  }
  const entries = [...merged.values()]
    .sort((a, b) => b.publishedAt.localeCompare(a.publishedAt) || a.url.localeCompare(b.url))
    .slice(0, MAX_HISTORY_ENTRIES);
  try {
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, `${JSON.stringify({ digest: digestId, articles: entries }, null, 2)}\n`, "utf8");
  } catch (error) {
    throw new HistoryIOError(digestId, `History file ${target} could not be written: ${describeError(error)}`, { cause: error });
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}
