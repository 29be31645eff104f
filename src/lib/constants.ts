import path from "node:path";
import type { EffectiveSettings, GlobalSettings } from "./types";

export const ROOT_DIR = process.cwd();
export const CONFIG_PATH = path.resolve(ROOT_DIR, "config.yml");
export const EXAMPLE_CONFIG_NAME = "config.example.yml";

export const CACHE_FILE_NAME = "summary-cache.json";
export const HISTORY_DIR_NAME = ".history";

export const API_KEY_ENV = "OPENAI_API_KEY";

// Rough conversion used to check that max_tokens can hold summary_length characters.
export const CHARS_PER_TOKEN = 4;

export const DEFAULT_SETTINGS: EffectiveSettings = {
  summary_length: 150,
  model: "gpt-4o-mini",
  system_prompt: "You are a helpful assistant that summarizes articles concisely.",
  user_prompt: null,
  max_tokens: 150,
  temperature: 0.3,
  output_formats: ["json"],
  do_summarize: true
};

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  output_directory: "output",
  cache_directory: ".cache",
  cache_enabled: true,
  cache_max_age_days: 30,
  concurrency: 4,
  site_url: "https://example.com/",
  timeout_ms: 30_000,
  max_attempts: 3
};

export const USER_AGENT = "feed-digest/0.9 (+https://example.com/)";
