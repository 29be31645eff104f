export const OUTPUT_FORMATS = ["json", "rss", "atom"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface EffectiveSettings {
  summary_length: number;
  model: string;
  system_prompt: string;
  user_prompt: string | null;
  max_tokens: number;
  temperature: number;
  output_formats: readonly OutputFormat[];
  do_summarize: boolean;
  api_key?: string;
}

export type SettingsOverrides = Partial<EffectiveSettings>;

export interface GlobalSettings {
  output_directory: string;
  cache_directory: string;
  cache_enabled: boolean;
  cache_max_age_days: number;
  concurrency: number;
  site_url: string;
  api_base_url?: string;
  timeout_ms: number;
  max_attempts: number;
}

export interface SourceLeaf {
  kind: "source";
  /** Dotted location inside the config document, used in error messages. */
  path: string;
  url: string;
  title?: string;
  overrides: SettingsOverrides;
}

export interface SourceGroup {
  kind: "group";
  path: string;
  label: string;
  overrides: SettingsOverrides;
  children: SourceNode[];
}

export type SourceNode = SourceLeaf | SourceGroup;

export interface DigestDefinition {
  path: string;
  name: string;
  digestId: string;
  overrides: SettingsOverrides;
  sources: SourceNode[];
}

export interface DigestConfig {
  global: GlobalSettings;
  overrides: SettingsOverrides;
  digests: DigestDefinition[];
}

export interface ResolvedSource {
  path: string;
  url: string;
  title?: string;
  /** Innermost group label, for display only. */
  group?: string;
  settings: Readonly<EffectiveSettings>;
}

export interface DigestPlan {
  name: string;
  digestId: string;
  outputFormats: readonly OutputFormat[];
  sources: ResolvedSource[];
}

export interface Article {
  title: string;
  url: string;
  published_at: string | null;
  raw_content: string;
  source_url: string;
}

export interface SummaryRecord {
  fingerprint: string;
  summary_text: string;
  model: string;
  summary_length: number;
  created_at: string;
}

export type SummaryStatus = "generated" | "cached" | "passthrough" | "fallback" | "history";

export interface DigestArticle {
  title: string;
  url: string;
  summary: string;
  publishedAt: string;
  source: string;
  sourceUrl: string;
  group?: string;
  summaryStatus: SummaryStatus;
  /** Fingerprint of the content and settings the summary was made from. */
  fingerprint: string;
}

export interface DigestDay {
  date: string;
  articles: DigestArticle[];
}

export interface NormalizedDigest {
  id: string;
  name: string;
  siteUrl: string;
  days: DigestDay[];
}
