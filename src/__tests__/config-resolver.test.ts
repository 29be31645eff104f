import { describe, expect, it } from "vitest";
import { deriveDigestId, resolveDigests, resolveSettingsAt, validateConfig } from "../config-resolver";
import { DEFAULT_SETTINGS } from "../lib/constants";
import { ValidationError, type ValidationIssue } from "../lib/errors";

function issuesOf(raw: unknown): ValidationIssue[] {
  try {
    validateConfig(raw);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error("expected the config to be rejected");
}

const noEnv = { env: {} };

describe("validateConfig", () => {
  it("fills global defaults and derives digest ids", () => {
    const config = validateConfig({
      digests: [{ name: "Tech News", sources: [{ url: "https://feeds.example.com/tech.xml" }] }]
    });

    expect(config.global.output_directory).toBe("output");
    expect(config.global.cache_enabled).toBe(true);
    expect(config.global.concurrency).toBe(4);
    expect(config.digests[0].digestId).toBe("tech_news");
    expect(config.digests[0].sources[0]).toEqual({
      kind: "source",
      path: "digests[0].sources[0]",
      url: "https://feeds.example.com/tech.xml",
      overrides: {}
    });
  });

  it("reports every problem with its location", () => {
    const issues = issuesOf({
      digests: [
        {
          name: "Daily",
          cache_enabled: false,
          sources: [
            { url: "https://feeds.example.com/a.xml" },
            { url: "not a url" },
            { label: "Nested", sources: [{ url: "https://feeds.example.com/b.xml", temperature: 5 }] }
          ]
        }
      ]
    });

    expect(issues).toContainEqual({
      path: "digests[0].cache_enabled",
      message: "Global-only setting; allowed only at the top level"
    });
    expect(issues).toContainEqual({ path: "digests[0].sources[1].url", message: "Invalid url" });
    expect(issues.map((issue) => issue.path)).toContain("digests[0].sources[2].sources[0].temperature");
  });

  it("rejects unknown keys at the top level", () => {
    const issues = issuesOf({
      bogus: true,
      digests: [{ name: "Daily", sources: [{ url: "https://feeds.example.com/a.xml" }] }]
    });

    expect(issues).toHaveLength(1);
    expect(issues[0].path).toBe("<root>");
    expect(issues[0].message).toContain("bogus");
  });

  it("rejects a document without digests", () => {
    expect(issuesOf({ digests: [] }).map((issue) => issue.path)).toEqual(["digests"]);
    expect(issuesOf("just a string")).toEqual([{ path: "<root>", message: "Config must be a mapping" }]);
  });

  it("rejects digest ids that collide after derivation", () => {
    const issues = issuesOf({
      digests: [
        { name: "Tech News", sources: [{ url: "https://feeds.example.com/a.xml" }] },
        { name: "tech-news", sources: [{ url: "https://feeds.example.com/b.xml" }] }
      ]
    });

    expect(issues).toEqual([
      { path: "digests[1].digest_id", message: 'digest_id "tech_news" collides with the digest at digests[0]' }
    ]);
  });

  it("rejects a name that derives an empty id", () => {
    const issues = issuesOf({ digests: [{ name: "!!!", sources: [{ url: "https://feeds.example.com/a.xml" }] }] });

    expect(issues).toEqual([
      { path: "digests[0].name", message: 'Cannot derive a digest_id from "!!!"; set digest_id explicitly' }
    ]);
  });

  it("rejects a max_tokens too small for the requested summary length", () => {
    const raw = {
      max_tokens: 40,
      digests: [
        {
          name: "Daily",
          sources: [{ url: "https://feeds.example.com/a.xml", summary_length: 180 }]
        }
      ]
    };

    expect(issuesOf(raw)).toEqual([
      { path: "digests[0].sources[0]", message: "max_tokens (40) cannot hold a 180-character summary; needs at least 45" }
    ]);
    expect(() => validateConfig({ ...raw, do_summarize: false })).not.toThrow();
  });
});

describe("deriveDigestId", () => {
  it("lower-cases and collapses separators", () => {
    expect(deriveDigestId("  Tech -- News! 2024 ")).toBe("tech_news_2024");
    expect(deriveDigestId("AI/ML")).toBe("ai_ml");
  });
});

describe("resolveDigests", () => {
  it("gives a source its own override and its sibling the global value", () => {
    const config = validateConfig({
      summary_length: 150,
      digests: [
        {
          name: "Daily",
          sources: [
            { url: "https://feeds.example.com/a.xml", summary_length: 180 },
            { url: "https://feeds.example.com/b.xml" }
          ]
        }
      ]
    });

    const [plan] = resolveDigests(config, noEnv);
    expect(plan.sources.map((source) => source.settings.summary_length)).toEqual([180, 150]);
  });

  it("takes each key from the most specific scope that defines it", () => {
    const scopes = ["global", "digest", "group", "source"] as const;
    for (let mask = 0; mask < 16; mask++) {
      const defined = scopes.filter((_scope, index) => (mask & (1 << index)) !== 0);
      const model = (scope: (typeof scopes)[number]) => (defined.includes(scope) ? { model: `model-${scope}` } : {});
      const config = validateConfig({
        ...model("global"),
        digests: [
          {
            name: "Daily",
            ...model("digest"),
            sources: [{ label: "Group", ...model("group"), sources: [{ url: "https://feeds.example.com/a.xml", ...model("source") }] }]
          }
        ]
      });

      const mostSpecific = defined[defined.length - 1];
      const expected = mostSpecific ? `model-${mostSpecific}` : DEFAULT_SETTINGS.model;
      expect(resolveDigests(config, noEnv)[0].sources[0].settings.model).toBe(expected);
    }
  });

  it("flattens groups depth first and keeps the innermost label", () => {
    const config = validateConfig({
      digests: [
        {
          name: "Daily",
          sources: [
            { url: "https://feeds.example.com/a.xml", title: "A" },
            {
              label: "Outer",
              sources: [
                { label: "Inner", sources: [{ url: "https://feeds.example.com/b.xml" }] },
                { url: "https://feeds.example.com/c.xml" }
              ]
            }
          ]
        }
      ]
    });

    const [plan] = resolveDigests(config, noEnv);
    expect(plan.sources.map((source) => [source.url, source.group])).toEqual([
      ["https://feeds.example.com/a.xml", undefined],
      ["https://feeds.example.com/b.xml", "Inner"],
      ["https://feeds.example.com/c.xml", "Outer"]
    ]);
    expect(plan.sources[0].title).toBe("A");
  });

  it("returns frozen settings", () => {
    const config = validateConfig({ digests: [{ name: "Daily", sources: [{ url: "https://feeds.example.com/a.xml" }] }] });
    const { settings } = resolveDigests(config, noEnv)[0].sources[0];

    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.output_formats)).toBe(true);
  });

  it("takes output formats from the digest scope", () => {
    const config = validateConfig({
      output_formats: ["json"],
      digests: [
        {
          name: "Daily",
          output_formats: ["rss", "atom", "rss"],
          sources: [{ url: "https://feeds.example.com/a.xml", output_formats: ["json"] }]
        },
        { name: "Weekly", sources: [{ url: "https://feeds.example.com/b.xml" }] }
      ]
    });

    expect(resolveDigests(config, noEnv).map((plan) => plan.outputFormats)).toEqual([["rss", "atom"], ["json"]]);
  });

  it("prefers the command-line key, then the environment, then the config", () => {
    const config = validateConfig({
      digests: [{ name: "Daily", api_key: "config-key", sources: [{ url: "https://feeds.example.com/a.xml" }] }]
    });
    const keyFor = (options: Parameters<typeof resolveDigests>[1]) => resolveDigests(config, options)[0].sources[0].settings.api_key;

    expect(keyFor(noEnv)).toBe("config-key");
    expect(keyFor({ env: { OPENAI_API_KEY: "env-key" } })).toBe("env-key");
    expect(keyFor({ env: { OPENAI_API_KEY: "env-key" }, apiKey: "cli-key" })).toBe("cli-key");
  });

  it("leaves api_key out when none is configured", () => {
    const config = validateConfig({ digests: [{ name: "Daily", sources: [{ url: "https://feeds.example.com/a.xml" }] }] });
    const { settings } = resolveDigests(config, noEnv)[0].sources[0];

    expect("api_key" in settings).toBe(false);
  });
});

describe("resolveSettingsAt", () => {
  const config = validateConfig({
    temperature: 0.5,
    digests: [
      {
        name: "Daily",
        sources: [
          { url: "https://feeds.example.com/a.xml" },
          { label: "Science", temperature: 0.9, sources: [{ url: "https://feeds.example.com/b.xml", model: "science-model" }] }
        ]
      }
    ]
  });

  it("resolves a nested source by index path", () => {
    const settings = resolveSettingsAt(config, "daily", [1, 0], noEnv);

    expect(settings.temperature).toBe(0.9);
    expect(settings.model).toBe("science-model");
    expect(resolveSettingsAt(config, "daily", [0], noEnv).temperature).toBe(0.5);
  });

  it("rejects paths that do not end on a source", () => {
    expect(() => resolveSettingsAt(config, "weekly", [0], noEnv)).toThrow(RangeError);
    expect(() => resolveSettingsAt(config, "daily", [5], noEnv)).toThrow(RangeError);
    expect(() => resolveSettingsAt(config, "daily", [1], noEnv)).toThrow(RangeError);
    expect(() => resolveSettingsAt(config, "daily", [0, 0], noEnv)).toThrow(RangeError);
  });
});
