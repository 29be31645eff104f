#!/usr/bin/env tsx

/**
 * Checks a digest config without fetching anything.
 *
 * Usage:
 *   npx tsx scripts/validate-config.ts [config.yml]
 *
 * Prints every problem found, each with its location in the document, and the
 * resolved settings of every source when the file is valid.
 */

import path from "node:path";
import process from "node:process";
import { resolveDigests } from "../src/config-resolver";
import { CONFIG_PATH } from "../src/lib/constants";
import { ValidationError, describeError } from "../src/lib/errors";
import { loadConfig } from "../src/lib/load-config";
import { COLORS, GLYPHS } from "../src/lib/log";

async function main(): Promise<void> {
  const configPath = process.argv[2] ? path.resolve(process.argv[2]) : CONFIG_PATH;
  console.log(`🔍 Validating ${path.relative(process.cwd(), configPath)}...\n`);

  try {
    const config = await loadConfig(configPath);
    for (const plan of resolveDigests(config)) {
      console.log(`${COLORS.info}${GLYPHS.digest}${COLORS.reset} ${plan.name} (${plan.digestId}) → ${plan.outputFormats.join(", ")}`);
      for (const source of plan.sources) {
        const { settings } = source;
        const summary = settings.do_summarize
          ? `${settings.model}, ${settings.summary_length} chars, max_tokens ${settings.max_tokens}`
          : "not summarised";
        console.log(`  ${COLORS.detail}${GLYPHS.feed} ${source.url} (${summary})${COLORS.reset}`);
      }
    }
    console.log("\n✅ Configuration is valid!\n");
    process.exit(0);
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error("❌ Validation errors found:\n");
      for (const issue of error.issues) {
        console.error(`  Field: ${issue.path}`);
        console.error(`  Error: ${issue.message}\n`);
      }
    } else {
      console.error(`❌ ${describeError(error)}\n`);
    }
    process.exit(1);
  }
}

void main();
