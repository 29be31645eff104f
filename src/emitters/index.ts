import fs from "node:fs/promises";
import path from "node:path";
import type { NormalizedDigest, OutputFormat } from "@/lib/types";
import { renderAtom } from "./atom";
import { renderJsonFeed } from "./json-feed";
import { renderRss } from "./rss";

export const FORMAT_EXTENSIONS: Record<OutputFormat, string> = {
  json: ".json",
  rss: ".xml",
  atom: ".atom"
};

const RENDERERS: Record<OutputFormat, (digest: NormalizedDigest) => string> = {
  json: renderJsonFeed,
  rss: renderRss,
  atom: renderAtom
};

export function renderDigest(digest: NormalizedDigest, format: OutputFormat): string {
  return RENDERERS[format](digest);
}

export function outputPath(outputDirectory: string, digestId: string, format: OutputFormat): string {
  return path.resolve(outputDirectory, `${digestId}${FORMAT_EXTENSIONS[format]}`);
}

/** Writes one file per requested format and returns their paths in format order. */
export async function writeDigestOutputs(
  digest: NormalizedDigest,
  formats: readonly OutputFormat[],
  outputDirectory: string
): Promise<string[]> {
  await fs.mkdir(outputDirectory, { recursive: true });
  const written: string[] = [];
  for (const format of formats) {
    const target = outputPath(outputDirectory, digest.id, format);
    await fs.writeFile(target, renderDigest(digest, format), "utf8");
    written.push(target);
  }
  return written;
}

export { renderAtom, renderJsonFeed, renderRss };
