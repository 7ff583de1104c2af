import { describe, it, expect, vi } from "vitest";
import { achievementQuery, warmAiGuides } from "@/src/lib/pipeline/batch";
import type { AdapterResult, SourceAdapter } from "@/src/lib/pipeline/sources/types";
import type { AiGuideRepository, StoredAiGuide } from "@/src/lib/db/ai-guides";
import type { Achievement } from "@/src/lib/model";

const GAME = { appId: 730, name: "Test Game" };

function createMockAchievement(apiName: string): Achievement {
  return {
    apiName,
    name: `Name ${apiName}`,
    description: `Description ${apiName}`,
    achieved: false,
    unlockTime: 0,
    icon: "",
    iconGray: "",
    hidden: false,
    globalPercent: 4.5,
  };
}

function createStore(storedIds: string[]): AiGuideRepository {
  return {
    get: (appId, achievementId): StoredAiGuide | null =>
      storedIds.includes(achievementId)
        ? {
            id: 1,
            appId,
            achievementId,
            achievementName: achievementId,
            content: { summary: "s", strategies: [], tips: [], difficulty: 1, estimatedTime: "1m", generatedAt: 0 },
            views: 0,
            rating: 0,
            ratingCount: 0,
          }
        : null,
    save: () => {
      throw new Error("not used");
    },
  };
}

function createMockAdapter(statuses: AdapterResult["status"][]) {
  let call = 0;
  const fetch = vi.fn<SourceAdapter["fetch"]>(async () => ({ status: statuses[call++] ?? "ok", candidates: [] }));
  const adapter: SourceAdapter = { kind: "ai_generated", fetch };
  return { adapter, fetch };
}

describe("achievementQuery", () => {
  it("carries the achievement text and rarity", () => {
    expect(achievementQuery(GAME, createMockAchievement("ACH_1"))).toEqual({
      appId: 730,
      achievementId: "ACH_1",
      gameName: "Test Game",
      achievementName: "Name ACH_1",
      achievementDescription: "Description ACH_1",
      globalPercent: 4.5,
    });
  });
});

describe("warmAiGuides", () => {
  it("skips stored guides and counts generated ones", async () => {
    const { adapter, fetch } = createMockAdapter(["ok", "ok"]);
    const locked = ["A", "B", "C"].map(createMockAchievement);

    const result = await warmAiGuides(adapter, createStore(["B"]), GAME, locked);

    expect(result).toEqual({ generated: 2, failed: 0, skipped: 1 });
    expect(fetch.mock.calls.map((call) => call[0].achievementId)).toEqual(["A", "C"]);
  });

  it("stops at the first quota refusal", async () => {
    const { adapter, fetch } = createMockAdapter(["malformed_response", "quota_exceeded", "ok"]);
    const locked = ["A", "B", "C", "D"].map(createMockAchievement);

    const result = await warmAiGuides(adapter, createStore([]), GAME, locked);

    expect(result).toEqual({ generated: 0, failed: 2, skipped: 0, stoppedBy: "quota_exceeded" });
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it("processes at most maxCount achievements", async () => {
    const { adapter, fetch } = createMockAdapter([]);
    const locked = ["A", "B", "C", "D"].map(createMockAchievement);

    await warmAiGuides(adapter, createStore([]), GAME, locked, 2);

    expect(fetch).toHaveBeenCalledTimes(2);
  });
});
