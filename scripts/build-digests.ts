#!/usr/bin/env tsx
import path from "node:path";
import process from "node:process";
import { parseArgs } from "node:util";
import ora, { type Ora } from "ora";
import { OpenAiProvider } from "../src/ai-provider";
import { HttpContentFetcher } from "../src/article-content";
import { createCacheStore } from "../src/cache-store";
import { RssFeedFetcher } from "../src/feed-fetcher";
import { CONFIG_PATH } from "../src/lib/constants";
import { ValidationError } from "../src/lib/errors";
import { loadConfig } from "../src/lib/load-config";
import { COLORS, GLYPHS, logInfo, logSuccess } from "../src/lib/log";
import { runDigests, runSucceeded, type RunReport } from "../src/run-digests";

const USAGE = `Usage: tsx scripts/build-digests.ts [--config config.yml] [--digest <id>]... [--api-key <key>]`;

async function main() {
  const startTime = Date.now();
  let spinner: Ora | null = null;

  // Keep warnings off the spinner line
  const originalWarn = console.warn.bind(console);
  console.warn = (...args: unknown[]) => {
    if (spinner && spinner.isSpinning) {
      process.stdout.write("\n");
    }
    originalWarn(...args);
  };
  const originalError = console.error.bind(console);
  console.error = (...args: unknown[]) => {
    if (spinner && spinner.isSpinning) {
      process.stdout.write("\n");
    }
    originalError(...args);
  };

  try {
    const { values } = parseArgs({
      options: {
        config: { type: "string", short: "c" },
        digest: { type: "string", short: "d", multiple: true },
        "api-key": { type: "string" },
        help: { type: "boolean", short: "h" }
      }
    });
    if (values.help) {
      console.log(USAGE);
      process.exit(0);
    }

    const configPath = values.config ? path.resolve(values.config) : CONFIG_PATH;
    spinner = ora(`Loading configuration...`).start();
    const config = await loadConfig(configPath);
    spinner.succeed(`Configuration loaded (${config.digests.length} digests from ${path.relative(process.cwd(), configPath)})`);

    const report = await runDigests({
      config,
      fetcher: new RssFeedFetcher(),
      contentFetcher: new HttpContentFetcher(),
      provider: new OpenAiProvider({ baseURL: config.global.api_base_url, timeoutMs: config.global.timeout_ms }),
      cache: createCacheStore(config.global),
      apiKey: values["api-key"],
      digestIds: values.digest,
      onProgress: (event) => {
        switch (event.type) {
          case "digest-start":
            spinner = ora(`${event.plan.name}: fetching feeds (0/${event.plan.sources.length})`).start();
            break;
          case "feed":
            if (spinner) spinner.text = `${event.plan.name}: fetching feeds (${event.done}/${event.total})`;
            break;
          case "article":
            if (spinner) spinner.text = `${event.plan.name}: summarising (${event.done}/${event.total})`;
            break;
          case "digest-done":
            spinner?.succeed(`${event.plan.name}: ${event.articles} articles`);
            for (const file of event.files) {
              console.log(`  ${COLORS.detail}${GLYPHS.folder} ${path.relative(process.cwd(), file)}${COLORS.reset}`);
            }
            break;
          case "digest-aborted":
            spinner?.fail(`${event.plan.name}: aborted`);
            break;
        }
      }
    });

    printReport(report, Date.now() - startTime);
    if (runSucceeded(report)) {
      logSuccess("All digests built without warnings");
      process.exit(0);
    }
    process.exit(1);
  } catch (error) {
    if (spinner && spinner.isSpinning) {
      spinner.fail("Digest build failed");
    }
    if (error instanceof ValidationError) {
      console.error(`\n${COLORS.error}${error.message}${COLORS.reset}`);
    } else {
      console.error(`\n${COLORS.warn}Error:${COLORS.reset}`, error);
    }
    process.exit(1);
  }
}

function printReport(report: RunReport, elapsedMs: number) {
  const seconds = Math.round(elapsedMs / 1000);
  const minutes = Math.floor(seconds / 60);
  const timeStr = minutes > 0 ? `${minutes}m ${seconds % 60}s` : `${seconds}s`;
  const { stats } = report;

  console.log("");
  logInfo(GLYPHS.stats, `${report.digests.length} digests written, ${report.abortedDigests.length} aborted`);
  console.log(
    `  ${COLORS.detail}${GLYPHS.cache} ${stats.cacheHits} cache hits, ${stats.cacheMisses} misses, ${stats.providerCalls} provider calls, ${report.cachePruned} stale entries pruned${COLORS.reset}`
  );
  console.log(`  ${COLORS.detail}${GLYPHS.timer} Finished in ${timeStr}${COLORS.reset}`);

  if (report.skippedSources.length > 0) {
    console.log(`\n${COLORS.warn}${GLYPHS.warn} Skipped sources:${COLORS.reset}`);
    for (const entry of report.skippedSources) {
      console.log(`  - [${entry.digestId}] ${entry.url}`);
    }
  }
  if (report.abortedDigests.length > 0) {
    console.log(`\n${COLORS.error}${GLYPHS.error} Aborted digests:${COLORS.reset}`);
    for (const entry of report.abortedDigests) {
      console.log(`  - ${entry.digestId} at ${entry.sourceUrl}: ${entry.reason}`);
    }
  }
  if (report.fallbacks.length > 0) {
    console.log(`\n${COLORS.warn}${GLYPHS.warn} Excerpts used instead of summaries:${COLORS.reset}`);
    for (const entry of report.fallbacks) {
      console.log(`  - [${entry.digestId}] ${entry.title} (${entry.url})`);
    }
  }
  if (report.warnings.length > 0) {
    console.log(`\n${COLORS.warn}${GLYPHS.warn} Warnings:${COLORS.reset}`);
    for (const warning of report.warnings) {
      console.log(`  - ${warning}`);
    }
  }
  console.log("");
}

void main();
