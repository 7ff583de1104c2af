/**
 * Tests for candidate scoring and ordering
 */

import { describe, it, expect } from "vitest";
import { compareCandidates, keywordCoverage, rankCandidates, scoreCandidate } from "@/src/lib/pipeline/rank";
import { normalizeCandidates } from "@/src/lib/pipeline/normalize";
import { extractKeywords } from "@/src/lib/pipeline/query";
import type { CandidateDraft, GuideCandidate, LinkGuideCandidate } from "@/src/lib/model";

const NOW = Date.UTC(2026, 5, 1);
const DAY_MS = 24 * 60 * 60 * 1000;

// ["test", "game", "achievement"]
const KEYWORDS = extractKeywords({ gameName: "Test Game", achievementName: "Achievement X" });

function createMockLink(overrides: Partial<LinkGuideCandidate> = {}): LinkGuideCandidate {
  return {
    sourceKind: "web_search",
    title: "Untitled",
    snippet: "Some text",
    url: "https://example.com/page",
    qualityScore: 0,
    fetchedAt: NOW,
    ...overrides,
  };
}

const aiCandidate: GuideCandidate = {
  sourceKind: "ai_generated",
  title: "AI Guide: Achievement X",
  snippet: "Finish the test level.",
  qualityScore: 0,
  fetchedAt: NOW,
  content: {
    summary: "Finish the test level.",
    strategies: [],
    tips: [],
    difficulty: 3,
    estimatedTime: "10 minutes",
    generatedAt: NOW,
  },
};

describe("keywordCoverage", () => {
  it("counts whole-token matches only", () => {
    const candidate = createMockLink({ title: "Gamers testing achievements", snippet: "" });
    expect(keywordCoverage(candidate, KEYWORDS)).toBe(0);
  });

  it("is zero without keywords", () => {
    expect(keywordCoverage(createMockLink(), [])).toBe(0);
  });

  it("is full for a generated guide whatever its text", () => {
    const unrelated: GuideCandidate = {
      ...aiCandidate,
      title: "AI Guide: Achievement X",
      snippet: "Beat the final boss without taking damage.",
    };
    expect(keywordCoverage(unrelated, ["counter", "strike", "achievement"])).toBe(1);
  });
});

describe("scoreCandidate", () => {
  it("scores a fresh generated guide", () => {
    // 60 + 30 + 10
    expect(scoreCandidate(aiCandidate, KEYWORDS, NOW)).toBe(100);
  });

  it("halves the freshness bonus at 30 days", () => {
    const candidate = createMockLink({
      title: "Test Game Achievement X guide",
      snippet: "Step by step",
      fetchedAt: NOW - 30 * DAY_MS,
    });
    // 45 + 30 + 5
    expect(scoreCandidate(candidate, KEYWORDS, NOW)).toBe(80);
  });

  it("penalizes a missing snippet", () => {
    const candidate = createMockLink({ sourceKind: "wiki", title: "Wiki", snippet: undefined });
    // 35 + 0 + 10 - 10
    expect(scoreCandidate(candidate, KEYWORDS, NOW)).toBe(35);
  });

  it("rounds to two decimals", () => {
    const candidate = createMockLink({
      sourceKind: "video",
      title: "Test Game achievement video",
      fetchedAt: NOW - 60 * DAY_MS,
    });
    // 42 + 30 + 2.5
    expect(scoreCandidate(candidate, KEYWORDS, NOW)).toBe(74.5);
  });
});

describe("compareCandidates", () => {
  it("breaks score ties by source priority", () => {
    const community = createMockLink({ sourceKind: "community_forum", title: "B", qualityScore: 65 });
    const web = createMockLink({ sourceKind: "web_search", title: "A", qualityScore: 65 });
    expect(compareCandidates(community, web)).toBeLessThan(0);
  });

  it("then by title and url", () => {
    const a = createMockLink({ title: "Alpha", url: "https://example.com/z", qualityScore: 50 });
    const b = createMockLink({ title: "Beta", url: "https://example.com/a", qualityScore: 50 });
    const c = createMockLink({ title: "Alpha", url: "https://example.com/y", qualityScore: 50 });
    expect([a, b, c].sort(compareCandidates).map((x) => x.url)).toEqual([
      "https://example.com/y",
      "https://example.com/z",
      "https://example.com/a",
    ]);
  });
});

describe("rankCandidates", () => {
  const candidates: GuideCandidate[] = [
    createMockLink({ sourceKind: "wiki", title: "Wiki", snippet: undefined, url: "https://example.com/wiki" }),
    createMockLink({
      title: "Test Game Achievement X guide",
      fetchedAt: NOW - 30 * DAY_MS,
      url: "https://example.com/guide",
    }),
    aiCandidate,
    createMockLink({ sourceKind: "community_forum", title: "Other", snippet: "y", url: "https://example.com/c" }),
    createMockLink({ title: "Test notes", snippet: "y", url: "https://example.com/w" }),
  ];

  it("orders by score with deterministic tie-breaks", () => {
    const ranked = rankCandidates(candidates, KEYWORDS, NOW);

    expect(ranked.map((c) => [c.title, c.qualityScore])).toEqual([
      ["AI Guide: Achievement X", 100],
      ["Test Game Achievement X guide", 80],
      ["Other", 65],
      ["Test notes", 65],
      ["Wiki", 35],
    ]);
  });

  it("gives the same order for any input order", () => {
    const forward = rankCandidates(candidates, KEYWORDS, NOW);
    const reversed = rankCandidates([...candidates].reverse(), KEYWORDS, NOW);
    const rotated = rankCandidates([...candidates.slice(2), ...candidates.slice(0, 2)], KEYWORDS, NOW);

    expect(reversed).toEqual(forward);
    expect(rotated).toEqual(forward);
  });

  it("puts a month-old generated guide above the best possible link", () => {
    const oldGuide: GuideCandidate = {
      ...aiCandidate,
      snippet: "Beat the final boss without taking damage.",
      fetchedAt: NOW - 30 * DAY_MS,
    };
    const perfectLink = createMockLink({
      sourceKind: "community_forum",
      title: "Test Game Achievement X guide",
      url: "https://example.com/best",
    });

    const ranked = rankCandidates([perfectLink, oldGuide], KEYWORDS, NOW);

    // 60 + 30 + 5 ties 55 + 30 + 10; priority decides
    expect(ranked.map((c) => [c.sourceKind, c.qualityScore])).toEqual([
      ["ai_generated", 95],
      ["community_forum", 95],
    ]);
  });

  it("does not mutate its input", () => {
    rankCandidates(candidates, KEYWORDS, NOW);
    expect(candidates.every((c) => c.qualityScore === 0)).toBe(true);
  });
});

describe("normalize then rank", () => {
  const drafts: CandidateDraft[] = [
    { sourceKind: "web_search", title: "Test Game Achievement X walkthrough", snippet: "a", url: "https://guides.example.com/x?utm_source=feed" },
    { sourceKind: "web_search", title: "Test Game Achievement X walkthrough", snippet: "a", url: "https://guides.example.com/x" },
    { title: "Test Game clip", snippet: "c", url: "https://www.youtube.com/watch?v=abc" },
    { title: "Reddit thread", snippet: "d", url: "https://www.reddit.com/r/testgame/1" },
    { title: "Plain page", url: "https://example.org/plain" },
    {
      sourceKind: "ai_generated",
      title: "AI Guide: Achievement X",
      snippet: "Beat the final boss without taking damage.",
      content: { ...aiCandidate.content, summary: "Beat the final boss without taking damage." },
    },
  ];

  function pipeline(input: CandidateDraft[]): GuideCandidate[] {
    return rankCandidates(normalizeCandidates(input, NOW), KEYWORDS, NOW);
  }

  it("gives the same output for every rotation of the drafts", () => {
    const expected = pipeline(drafts);

    for (let shift = 1; shift < drafts.length; shift++) {
      const rotated = [...drafts.slice(shift), ...drafts.slice(0, shift)];
      expect(pipeline(rotated)).toEqual(expected);
      expect(pipeline([...rotated].reverse())).toEqual(expected);
    }
  });

  it("keeps one copy of a duplicated URL and ranks the generated guide first", () => {
    const ranked = pipeline([...drafts].reverse());

    expect(ranked).toHaveLength(5);
    expect(ranked[0].sourceKind).toBe("ai_generated");
  });
});
