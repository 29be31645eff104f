import { normaliseContent } from "@/lib/text";
import type { Article, EffectiveSettings } from "@/lib/types";

const PLACEHOLDER = /\{(title|content|summary_length|url)\}/g;

/**
 * User message sent with the system prompt. A configured `user_prompt` is a
 * template; `{title}`, `{content}`, `{summary_length}` and `{url}` are filled in.
 */
export function buildSummaryPrompt(
  article: Pick<Article, "title" | "url" | "raw_content">,
  settings: Pick<EffectiveSettings, "summary_length" | "user_prompt">
): string {
  const text = normaliseContent(article.raw_content);

  if (settings.user_prompt) {
    const values: Record<string, string> = {
      title: article.title,
      content: text,
      summary_length: String(settings.summary_length),
      url: article.url
    };
    return settings.user_prompt.replace(PLACEHOLDER, (_match, key: string) => values[key] ?? "");
  }

  return [
    `Summarize this article in about ${settings.summary_length} characters (2-3 sentences).`,
    "Reply with the summary only: no heading, no preamble, no bullet points.",
    "",
    `Title: ${article.title}`,
    "",
    `Content: ${text}`
  ].join("\n");
}
