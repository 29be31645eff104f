import { z } from "zod";
import { API_KEY_ENV, CHARS_PER_TOKEN, DEFAULT_GLOBAL_SETTINGS, DEFAULT_SETTINGS } from "@/lib/constants";
import { ValidationError, type ValidationIssue } from "@/lib/errors";
import {
  OUTPUT_FORMATS,
  type DigestConfig,
  type DigestDefinition,
  type DigestPlan,
  type EffectiveSettings,
  type GlobalSettings,
  type ResolvedSource,
  type SettingsOverrides,
  type SourceLeaf,
  type SourceNode
} from "@/lib/types";

const overridableSettingsSchema = z
  .object({
    summary_length: z.number().int().min(20).max(10_000),
    model: z.string().min(1),
    system_prompt: z.string().min(1),
    user_prompt: z.string().min(1).nullable(),
    max_tokens: z.number().int().min(1).max(100_000),
    temperature: z.number().min(0).max(2),
    output_formats: z
      .array(z.enum(OUTPUT_FORMATS))
      .min(1)
      .transform((formats) => Array.from(new Set(formats))),
    do_summarize: z.boolean(),
    api_key: z.string().min(1)
  })
  .partial();

const globalOnlySettingsSchema = z
  .object({
    output_directory: z.string().min(1),
    cache_directory: z.string().min(1),
    cache_enabled: z.boolean(),
    cache_max_age_days: z.number().int().min(1),
    concurrency: z.number().int().min(1).max(16),
    site_url: z.string().url(),
    api_base_url: z.string().url(),
    timeout_ms: z.number().int().min(1_000).max(600_000),
    max_attempts: z.number().int().min(1).max(10)
  })
  .partial();

const GLOBAL_ONLY_KEYS = Object.keys(globalOnlySettingsSchema.shape);

const globalNodeSchema = overridableSettingsSchema
  .merge(globalOnlySettingsSchema)
  .extend({ digests: z.array(z.unknown()).min(1) })
  .strict();

const digestNodeSchema = overridableSettingsSchema
  .extend({
    name: z.string().trim().min(1),
    digest_id: z
      .string()
      .regex(/^[A-Za-z0-9_-]+$/, "Must contain only letters, digits, '_' or '-'")
      .optional(),
    sources: z.array(z.unknown()).min(1)
  })
  .strict();

const sourceNodeSchema = overridableSettingsSchema
  .extend({
    url: z.string().url(),
    title: z.string().min(1).optional()
  })
  .strict();

const groupNodeSchema = overridableSettingsSchema
  .extend({
    label: z.string().min(1),
    sources: z.array(z.unknown()).min(1)
  })
  .strict();

export interface ResolveOptions {
  /** Environment consulted for the API key; defaults to process.env. */
  env?: Record<string, string | undefined>;
  /** Key given on the command line; takes precedence over everything else. */
  apiKey?: string;
}

/**
 * Validates a raw config document in one pass and returns its typed form.
 * Every problem found is reported together, each with its location in the document.
 */
export function validateConfig(raw: unknown): DigestConfig {
  const issues: ValidationIssue[] = [];

  if (!isRecord(raw)) {
    throw new ValidationError([{ path: "<root>", message: "Config must be a mapping" }]);
  }

  const globalParsed = globalNodeSchema.safeParse(raw);
  if (!globalParsed.success) {
    collectZodIssues(issues, "", globalParsed.error);
  }

  const rawDigests = Array.isArray(raw.digests) ? raw.digests : [];
  const digests: DigestDefinition[] = [];
  rawDigests.forEach((node, index) => {
    const digest = validateDigest(node, `digests[${index}]`, issues);
    if (digest) {
      digests.push(digest);
    }
  });

  checkDigestIdentity(digests, issues);

  if (issues.length > 0 || !globalParsed.success) {
    throw new ValidationError(issues);
  }

  const { digests: _digests, ...globalNode } = globalParsed.data;
  const global: GlobalSettings = { ...DEFAULT_GLOBAL_SETTINGS, ...definedEntries(globalOnlySettingsSchema.parse(globalNode)) };
  const config: DigestConfig = {
    global,
    overrides: overridableSettingsSchema.parse(globalNode),
    digests
  };

  checkResolvedLimits(config, issues);
  if (issues.length > 0) {
    throw new ValidationError(issues);
  }
  return config;
}

function validateDigest(node: unknown, path: string, issues: ValidationIssue[]): DigestDefinition | null {
  const scoped = checkNodeShape(node, path, issues);
  if (!scoped) return null;

  const parsed = digestNodeSchema.safeParse(scoped);
  const sources = validateSourceList(scoped.sources, path, issues);
  if (!parsed.success) {
    collectZodIssues(issues, path, parsed.error);
    return null;
  }

  const digestId = parsed.data.digest_id ?? deriveDigestId(parsed.data.name);
  if (!digestId) {
    issues.push({ path: `${path}.name`, message: `Cannot derive a digest_id from "${parsed.data.name}"; set digest_id explicitly` });
    return null;
  }

  return {
    path,
    name: parsed.data.name,
    digestId,
    overrides: overridableSettingsSchema.parse(parsed.data),
    sources
  };
}

function validateSourceList(value: unknown, path: string, issues: ValidationIssue[]): SourceNode[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const nodes: SourceNode[] = [];
  value.forEach((child, index) => {
    const node = validateSourceNode(child, `${path}.sources[${index}]`, issues);
    if (node) {
      nodes.push(node);
    }
  });
  return nodes;
}

function validateSourceNode(node: unknown, path: string, issues: ValidationIssue[]): SourceNode | null {
  const scoped = checkNodeShape(node, path, issues);
  if (!scoped) return null;

  if ("sources" in scoped) {
    const children = validateSourceList(scoped.sources, path, issues);
    const parsed = groupNodeSchema.safeParse(scoped);
    if (!parsed.success) {
      collectZodIssues(issues, path, parsed.error);
      return null;
    }
    return {
      kind: "group",
      path,
      label: parsed.data.label,
      overrides: overridableSettingsSchema.parse(parsed.data),
      children
    };
  }

  const parsed = sourceNodeSchema.safeParse(scoped);
  if (!parsed.success) {
    collectZodIssues(issues, path, parsed.error);
    return null;
  }
  return {
    kind: "source",
    path,
    url: parsed.data.url,
    ...(parsed.data.title ? { title: parsed.data.title } : {}),
    overrides: overridableSettingsSchema.parse(parsed.data)
  };
}

/** Rejects non-mappings and global-only keys; returns the node without those keys. */
function checkNodeShape(node: unknown, path: string, issues: ValidationIssue[]): Record<string, unknown> | null {
  if (!isRecord(node)) {
    issues.push({ path, message: "Must be a mapping" });
    return null;
  }
  const scoped: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(node)) {
    if (GLOBAL_ONLY_KEYS.includes(key)) {
      issues.push({ path: `${path}.${key}`, message: "Global-only setting; allowed only at the top level" });
      continue;
    }
    scoped[key] = value;
  }
  return scoped;
}

function checkDigestIdentity(digests: DigestDefinition[], issues: ValidationIssue[]): void {
  const names = new Map<string, string>();
  const ids = new Map<string, string>();
  for (const digest of digests) {
    const sameName = names.get(digest.name);
    if (sameName) {
      issues.push({ path: `${digest.path}.name`, message: `Duplicate digest name "${digest.name}" (also at ${sameName})` });
    } else {
      names.set(digest.name, digest.path);
    }
    const sameId = ids.get(digest.digestId);
    if (sameId) {
      issues.push({
        path: `${digest.path}.digest_id`,
        message: `digest_id "${digest.digestId}" collides with the digest at ${sameId}`
      });
    } else {
      ids.set(digest.digestId, digest.path);
    }
  }
}

function checkResolvedLimits(config: DigestConfig, issues: ValidationIssue[]): void {
  for (const digest of config.digests) {
    walkSources(digest.sources, [config.overrides, digest.overrides], undefined, (leaf, scopes) => {
      const settings = mergeScopes(scopes);
      const needed = Math.ceil(settings.summary_length / CHARS_PER_TOKEN);
      if (settings.do_summarize && needed > settings.max_tokens) {
        issues.push({
          path: leaf.path,
          message: `max_tokens (${settings.max_tokens}) cannot hold a ${settings.summary_length}-character summary; needs at least ${needed}`
        });
      }
    });
  }
}

/** Lower-cases the name and collapses every run of non-alphanumerics into one "_". */
export function deriveDigestId(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/** Folds scopes from least to most specific over the defaults. */
export function mergeScopes(scopes: readonly SettingsOverrides[]): EffectiveSettings {
  const merged: EffectiveSettings = { ...DEFAULT_SETTINGS };
  for (const scope of scopes) {
    Object.assign(merged, definedEntries(scope));
  }
  return merged;
}

export function resolveSettings(
  scopes: readonly SettingsOverrides[],
  options: ResolveOptions = {}
): Readonly<EffectiveSettings> {
  const { api_key: configKey, ...merged } = mergeScopes(scopes);
  const env = options.env ?? process.env;
  const apiKey = firstNonEmpty(options.apiKey, env[API_KEY_ENV], configKey);
  const settings: EffectiveSettings = {
    ...merged,
    output_formats: Object.freeze([...merged.output_formats]),
    ...(apiKey ? { api_key: apiKey } : {})
  };
  return Object.freeze(settings);
}

/** Resolves every leaf of every digest, depth first, in definition order. */
export function resolveDigests(config: DigestConfig, options: ResolveOptions = {}): DigestPlan[] {
  return config.digests.map((digest) => {
    const digestScopes = [config.overrides, digest.overrides];
    const sources: ResolvedSource[] = [];
    walkSources(digest.sources, digestScopes, undefined, (leaf, scopes, group) => {
      sources.push({
        path: leaf.path,
        url: leaf.url,
        ...(leaf.title ? { title: leaf.title } : {}),
        ...(group ? { group } : {}),
        settings: resolveSettings(scopes, options)
      });
    });
    return {
      name: digest.name,
      digestId: digest.digestId,
      outputFormats: mergeScopes(digestScopes).output_formats,
      sources
    };
  });
}

/**
 * Resolves the settings of one source, addressed by digest id and the index path
 * through nested groups (e.g. [1, 0] is the first child of the second node).
 */
export function resolveSettingsAt(
  config: DigestConfig,
  digestId: string,
  sourcePath: readonly number[],
  options: ResolveOptions = {}
): Readonly<EffectiveSettings> {
  const digest = config.digests.find((candidate) => candidate.digestId === digestId);
  if (!digest) {
    throw new RangeError(`Unknown digest "${digestId}"`);
  }
  const scopes: SettingsOverrides[] = [config.overrides, digest.overrides];
  let nodes = digest.sources;
  for (let depth = 0; depth < sourcePath.length; depth++) {
    const node = nodes[sourcePath[depth]];
    if (!node) {
      throw new RangeError(`No source at [${sourcePath.join(", ")}] in digest "${digestId}"`);
    }
    scopes.push(node.overrides);
    if (node.kind === "source") {
      if (depth !== sourcePath.length - 1) {
        throw new RangeError(`Path [${sourcePath.join(", ")}] descends past a source in digest "${digestId}"`);
      }
      return resolveSettings(scopes, options);
    }
    nodes = node.children;
  }
  throw new RangeError(`Path [${sourcePath.join(", ")}] ends on a group in digest "${digestId}"`);
}

function walkSources(
  nodes: readonly SourceNode[],
  scopes: readonly SettingsOverrides[],
  group: string | undefined,
  visit: (leaf: SourceLeaf, scopes: SettingsOverrides[], group: string | undefined) => void
): void {
  for (const node of nodes) {
    const nested = [...scopes, node.overrides];
    if (node.kind === "group") {
      walkSources(node.children, nested, node.label, visit);
    } else {
      visit(node, nested, group);
    }
  }
}

function collectZodIssues(issues: ValidationIssue[], base: string, error: z.ZodError): void {
  for (const issue of error.issues) {
    issues.push({ path: joinPath(base, issue.path), message: issue.message });
  }
}

function joinPath(base: string, segments: ReadonlyArray<string | number>): string {
  let path = base;
  for (const segment of segments) {
    if (typeof segment === "number") {
      path = `${path}[${segment}]`;
    } else {
      path = path ? `${path}.${segment}` : segment;
    }
  }
  return path || "<root>";
}

function definedEntries<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in value) {
    if (value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => typeof value === "string" && value.length > 0);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
