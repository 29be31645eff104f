import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { CACHE_FILE_NAME } from "@/lib/constants";
import { CacheIOError, describeError } from "@/lib/errors";
import type { GlobalSettings, SummaryRecord } from "@/lib/types";

export interface CacheStore {
  lookup(fingerprint: string): Promise<SummaryRecord | undefined>;
  store(fingerprint: string, record: SummaryRecord): Promise<void>;
  /** Drops records older than `maxAgeDays`; returns how many were removed. */
  prune(maxAgeDays: number, now?: Date): Promise<number>;
}

const summaryRecordSchema = z.object({
  fingerprint: z.string(),
  summary_text: z.string(),
  model: z.string(),
  summary_length: z.number(),
  created_at: z.string()
});

const cacheFileSchema = z.object({
  version: z.literal(1),
  entries: z.record(summaryRecordSchema)
});

type CacheFile = z.infer<typeof cacheFileSchema>;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Summary cache persisted as one JSON document. Loaded once, then every write
 * rewrites the whole file through a serialized queue (temp file + rename).
 */
export class JsonFileCacheStore implements CacheStore {
  readonly filePath: string;
  private entries: Promise<Map<string, SummaryRecord>> | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(directory: string) {
    this.filePath = path.resolve(directory, CACHE_FILE_NAME);
  }

  async lookup(fingerprint: string): Promise<SummaryRecord | undefined> {
    const entries = await this.load();
    return entries.get(fingerprint);
  }

  async store(fingerprint: string, record: SummaryRecord): Promise<void> {
    const entries = await this.load();
    entries.set(fingerprint, record);
    await this.enqueueWrite(entries);
  }

  async prune(maxAgeDays: number, now: Date = new Date()): Promise<number> {
    const entries = await this.load();
    const cutoff = now.getTime() - maxAgeDays * DAY_MS;
    let removed = 0;
    for (const [fingerprint, record] of entries) {
      const created = Date.parse(record.created_at);
      if (Number.isNaN(created) || created < cutoff) {
        entries.delete(fingerprint);
        removed++;
      }
    }
    if (removed > 0) {
      await this.enqueueWrite(entries);
    }
    return removed;
  }

  private load(): Promise<Map<string, SummaryRecord>> {
    if (!this.entries) {
      this.entries = this.readFile();
    }
    return this.entries;
  }

  private async readFile(): Promise<Map<string, SummaryRecord>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return new Map();
      }
      throw new CacheIOError(`Cannot read summary cache ${this.filePath}: ${describeError(error)}`, { cause: error });
    }
    let parsed: CacheFile;
    try {
      parsed = cacheFileSchema.parse(JSON.parse(raw));
    } catch (error) {
      throw new CacheIOError(`Summary cache ${this.filePath} is corrupt: ${describeError(error)}`, { cause: error });
    }
    return new Map(Object.entries(parsed.entries));
  }

  private enqueueWrite(entries: Map<string, SummaryRecord>): Promise<void> {
    const write = this.writeQueue.then(() => this.writeFile(entries));
    // A failed write is reported to its own caller; later writes still run.
    this.writeQueue = write.catch(() => undefined);
    return write;
  }

  private async writeFile(entries: Map<string, SummaryRecord>): Promise<void> {
    const sorted = [...entries.keys()].sort();
    const document: CacheFile = { version: 1, entries: {} };
    for (const key of sorted) {
      const record = entries.get(key);
      if (record) {
        document.entries[key] = record;
      }
    }
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, "utf8");
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      throw new CacheIOError(`Cannot write summary cache ${this.filePath}: ${describeError(error)}`, { cause: error });
    }
  }
}

/** Stand-in used when caching is switched off: nothing is found, nothing is kept. */
export class DisabledCacheStore implements CacheStore {
  async lookup(): Promise<SummaryRecord | undefined> {
    return undefined;
  }

  async store(): Promise<void> {}

  async prune(): Promise<number> {
    return 0;
  }
}

export function createCacheStore(global: Pick<GlobalSettings, "cache_enabled" | "cache_directory">): CacheStore {
  if (!global.cache_enabled) {
    return new DisabledCacheStore();
  }
  return new JsonFileCacheStore(global.cache_directory);
}
