import crypto from "node:crypto";
import type { Article, EffectiveSettings } from "@/lib/types";

export interface FingerprintInput {
  content: string;
  model: string;
  summaryLength: number;
  systemPrompt: string;
  userPrompt?: string | null;
}

/**
 * SHA-256 over the JSON encoding of the summarization inputs. JSON keeps field
 * boundaries unambiguous, so distinct tuples never share a preimage.
 */
export function fingerprintSummary(input: FingerprintInput): string {
  const tuple: Array<string | number> = [input.content, input.model, input.summaryLength, input.systemPrompt];
  if (input.userPrompt) {
    tuple.push(input.userPrompt);
  }
  return crypto.createHash("sha256").update(JSON.stringify(tuple)).digest("hex");
}

/**
 * Fingerprint of what an article's summary would be built from under `settings`.
 * Passthrough articles hash their content only, so switching summarising on or
 * off never matches an earlier entry.
 */
export function summaryFingerprint(article: Pick<Article, "raw_content">, settings: Readonly<EffectiveSettings>): string {
  if (!settings.do_summarize) {
    return crypto.createHash("sha256").update(JSON.stringify(["passthrough", article.raw_content])).digest("hex");
  }
  return fingerprintSummary({
    content: article.raw_content,
    model: settings.model,
    summaryLength: settings.summary_length,
    systemPrompt: settings.system_prompt,
    userPrompt: settings.user_prompt
  });
}
