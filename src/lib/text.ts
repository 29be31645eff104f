import { htmlToText } from "html-to-text";

export const SUMMARY_UNAVAILABLE = "Summary unavailable.";

export function normaliseContent(html: string): string {
  if (!html) {
    return "";
  }
  return htmlToText(html, {
    wordwrap: false,
    selectors: [
      { selector: "a", options: { ignoreHref: true } },
      { selector: "img", format: "skip" }
    ]
  })
    .replace(/\s+/g, " ")
    .trim();
}

/** Plain-text excerpt of at most `length` characters, marked with an ellipsis when cut. */
export function buildExcerpt(html: string, length: number): string {
  const text = normaliseContent(html);
  if (!text) {
    return SUMMARY_UNAVAILABLE;
  }
  if (text.length <= length) {
    return text;
  }
  return `${text.slice(0, length).trimEnd()}…`;
}

export function normaliseModelOutput(raw: string): string {
  return raw
    .replace(/\r/g, "")
    .split("\n")
    .map((line) => line.trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return "unknown";
  }
}
