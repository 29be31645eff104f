import { describe, expect, it, vi } from "vitest";
import type { AiRequest, AiResponse } from "../ai-provider";
import { resolveDigests, validateConfig } from "../config-resolver";
import { assembleDigest, groupByDay } from "../digest-assembler";
import type { DigestHistory } from "../digest-history";
import { DigestAbortedError, PermanentProviderError } from "../lib/errors";
import { summaryFingerprint } from "../lib/fingerprint";
import type { DigestArticle } from "../lib/types";
import { Summarizer } from "../summarizer";
import { MemoryCache, makeArticle } from "./helpers";

const FEED_A = "https://alpha.example.com/feed.xml";
const FEED_B = "https://beta.example.com/feed.xml";

function planFor(raw: Record<string, unknown>) {
  const config = validateConfig({
    api_key: "test-secret",
    digests: [
      {
        name: "Daily",
        sources: [
          { url: FEED_A, title: "Alpha" },
          { label: "Friends", sources: [{ url: FEED_B }] }
        ],
        ...raw
      }
    ]
  });
  return resolveDigests(config, { env: {} })[0];
}

function setup() {
  const complete = vi.fn<(request: AiRequest, signal?: AbortSignal) => Promise<AiResponse>>();
  const summarizer = new Summarizer({ provider: { complete }, cache: new MemoryCache(), sleep: async () => {} });
  return { complete, summarizer };
}

const options = (summarizer: Summarizer, history: DigestHistory = new Map()) => ({
  summarizer,
  history,
  concurrency: 2,
  siteUrl: "https://digest.example.com/",
  now: () => new Date("2024-05-03T12:00:00.000Z")
});

describe("assembleDigest", () => {
  it("groups articles by UTC day, newest first, in source order within a day", async () => {
    const { summarizer, complete } = setup();
    const plan = planFor({ do_summarize: false });
    const a1 = makeArticle(FEED_A, "a1", { published_at: "2024-05-02T23:30:00.000Z" });
    const a2 = makeArticle(FEED_A, "a2", { published_at: "2024-05-01T10:00:00.000Z" });
    const b1 = makeArticle(FEED_B, "b1", { published_at: "2024-05-02T01:00:00.000Z" });
    const b2 = makeArticle(FEED_B, "b2", { published_at: null });

    const digest = await assembleDigest(plan, [[a1, a2], [b1, b2]], options(summarizer));

    expect(digest.id).toBe("daily");
    expect(digest.name).toBe("Daily");
    expect(digest.siteUrl).toBe("https://digest.example.com/");
    expect(digest.days.map((day) => [day.date, day.articles.map((article) => article.url)])).toEqual([
      ["2024-05-03", ["https://beta.example.com/b2"]],
      ["2024-05-02", ["https://alpha.example.com/a1", "https://beta.example.com/b1"]],
      ["2024-05-01", ["https://alpha.example.com/a2"]]
    ]);
    expect(digest.days[0].articles[0].publishedAt).toBe("2024-05-03T12:00:00.000Z");
    expect(complete).not.toHaveBeenCalled();
  });

  it("passes content through verbatim when summarising is off", async () => {
    const { summarizer } = setup();
    const plan = planFor({ do_summarize: false });
    const article = makeArticle(FEED_A, "a1", { raw_content: "<p>Keep <b>this</b> as is</p>" });

    const digest = await assembleDigest(plan, [[article], []], options(summarizer));

    expect(digest.days[0].articles[0]).toEqual({
      title: "Story a1",
      url: "https://alpha.example.com/a1",
      summary: "<p>Keep <b>this</b> as is</p>",
      publishedAt: "2024-05-01T08:00:00.000Z",
      source: "Alpha",
      sourceUrl: FEED_A,
      summaryStatus: "passthrough",
      fingerprint: summaryFingerprint(article, plan.sources[0].settings)
    });
  });

  it("labels untitled sources by host and keeps the group", async () => {
    const { summarizer, complete } = setup();
    complete.mockResolvedValue({ text: "Short summary." });

    const digest = await assembleDigest(planFor({}), [[], [makeArticle(FEED_B, "b1")]], options(summarizer));

    expect(digest.days[0].articles[0]).toMatchObject({
      source: "beta.example.com",
      group: "Friends",
      summary: "Short summary.",
      summaryStatus: "generated"
    });
  });

  it("reuses the summary of articles already in the history", async () => {
    const { summarizer, complete } = setup();
    const plan = planFor({});
    const article = makeArticle(FEED_A, "a1", { published_at: null });
    const fingerprint = summaryFingerprint(article, plan.sources[0].settings);
    const history: DigestHistory = new Map([
      [
        "https://alpha.example.com/a1",
        {
          url: "https://alpha.example.com/a1",
          title: "Earlier title",
          summary: "Earlier summary.",
          publishedAt: "2024-04-30T06:00:00.000Z",
          fingerprint
        }
      ]
    ]);

    const digest = await assembleDigest(plan, [[article], null], options(summarizer, history));

    expect(complete).not.toHaveBeenCalled();
    expect(digest.days).toEqual([
      {
        date: "2024-04-30",
        articles: [
          {
            title: "Earlier title",
            url: "https://alpha.example.com/a1",
            summary: "Earlier summary.",
            publishedAt: "2024-04-30T06:00:00.000Z",
            source: "Alpha",
            sourceUrl: FEED_A,
            summaryStatus: "history",
            fingerprint
          }
        ]
      }
    ]);
  });

  it("summarises again when the settings behind a history entry changed", async () => {
    const { summarizer, complete } = setup();
    complete.mockResolvedValue({ text: "Longer summary." });
    const article = makeArticle(FEED_A, "a1", { published_at: null });
    const earlier = planFor({ summary_length: 100 });
    const history: DigestHistory = new Map([
      [
        "https://alpha.example.com/a1",
        {
          url: "https://alpha.example.com/a1",
          title: "Story a1",
          summary: "Earlier summary.",
          publishedAt: "2024-04-30T06:00:00.000Z",
          fingerprint: summaryFingerprint(article, earlier.sources[0].settings)
        }
      ]
    ]);
    const plan = planFor({ summary_length: 300 });

    const digest = await assembleDigest(plan, [[article], null], options(summarizer, history));

    expect(complete).toHaveBeenCalledTimes(1);
    expect(digest.days[0].articles[0]).toMatchObject({
      summary: "Longer summary.",
      summaryStatus: "generated",
      publishedAt: "2024-04-30T06:00:00.000Z",
      fingerprint: summaryFingerprint(article, plan.sources[0].settings)
    });
  });

  it("does not reuse history entries that carry no fingerprint", async () => {
    const { summarizer, complete } = setup();
    complete.mockResolvedValue({ text: "Fresh summary." });
    const history: DigestHistory = new Map([
      [
        "https://alpha.example.com/a1",
        { url: "https://alpha.example.com/a1", title: "Story a1", summary: "Old summary.", publishedAt: "2024-05-01T08:00:00.000Z" }
      ]
    ]);

    const digest = await assembleDigest(planFor({}), [[makeArticle(FEED_A, "a1")], null], options(summarizer, history));

    expect(digest.days[0].articles[0]).toMatchObject({ summary: "Fresh summary.", summaryStatus: "generated" });
  });

  it("leaves out sources whose feed was not fetched", async () => {
    const { summarizer } = setup();
    const digest = await assembleDigest(planFor({ do_summarize: false }), [null, [makeArticle(FEED_B, "b1")]], options(summarizer));

    expect(digest.days.flatMap((day) => day.articles.map((article) => article.sourceUrl))).toEqual([FEED_B]);
  });

  it("aborts the digest on a permanent provider failure", async () => {
    const { summarizer, complete } = setup();
    complete.mockImplementation(async (request) => {
      if (request.content.includes("Story a1")) {
        throw new PermanentProviderError("invalid api key", { status: 401 });
      }
      return { text: "Fine." };
    });

    const run = assembleDigest(planFor({}), [[makeArticle(FEED_A, "a1"), makeArticle(FEED_A, "a2")], [makeArticle(FEED_B, "b1")]], options(summarizer));

    await expect(run).rejects.toBeInstanceOf(DigestAbortedError);
    await expect(run).rejects.toMatchObject({ digestId: "daily", sourceUrl: FEED_A });
    expect(complete.mock.calls.some(([request]) => request.content.includes("Story a2"))).toBe(false);
  });
});

describe("groupByDay", () => {
  it("returns no days for no articles", () => {
    expect(groupByDay([])).toEqual([]);
  });

  it("keeps input order inside a day", () => {
    const article = (url: string, publishedAt: string): DigestArticle => ({
      title: url,
      url,
      summary: "",
      publishedAt,
      source: "s",
      sourceUrl: "https://s.example.com/feed",
      summaryStatus: "passthrough",
      fingerprint: url
    });
    const days = groupByDay([article("late", "2024-05-01T22:00:00.000Z"), article("early", "2024-05-01T01:00:00.000Z")]);

    expect(days).toEqual([{ date: "2024-05-01", articles: [expect.objectContaining({ url: "late" }), expect.objectContaining({ url: "early" })] }]);
  });
});
