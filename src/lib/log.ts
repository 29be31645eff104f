export const COLORS = {
  reset: "\x1b[0m",
  info: "\x1b[36m",
  success: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  detail: "\x1b[90m"
} as const;

export const GLYPHS = {
  digest: "◆",
  feed: "→",
  summary: "✦",
  cache: "⛁",
  success: "✓",
  warn: "⚠",
  error: "✗",
  info: "ℹ",
  folder: "▸",
  stats: "≡",
  timer: "⏱"
} as const;

export function logInfo(icon: string, message: string) {
  console.log(`${COLORS.info}${icon}${COLORS.reset} ${message}`);
}

export function logDetail(icon: string, message: string) {
  console.log(`${COLORS.detail}${icon}${COLORS.reset} ${message}`);
}

export function logSuccess(message: string) {
  console.log(`${COLORS.success}${GLYPHS.success}${COLORS.reset} ${message}`);
}

export function logWarn(message: string) {
  console.warn(`${COLORS.warn}${GLYPHS.warn}${COLORS.reset} ${message}`);
}

export function logError(message: string) {
  console.error(`${COLORS.error}${GLYPHS.error}${COLORS.reset} ${message}`);
}
