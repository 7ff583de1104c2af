/**
 * Tests for the guide lookup endpoints
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { NextRequest } from "next/server";
import { POST } from "@/app/api/guides/route";
import { GET as getCached } from "@/app/api/guides/cached/route";
import { POST as rateGuide } from "@/app/api/guides/ai/rate/route";
import { POST as viewGuide } from "@/app/api/guides/ai/view/route";
import * as services from "@/src/lib/services";
import { openDatabase } from "@/src/lib/db/index";
import { parseConfig } from "@/src/config/env";
import { CacheUnavailableError } from "@/src/lib/errors";
import type { TextGenerator } from "@/src/lib/openrouter/client";
import type { SearchProvider } from "@/src/lib/search/duckduckgo";

vi.mock("@/src/lib/services", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@/src/lib/services")>();
  return { ...actual, getGuideServices: vi.fn() };
});

const GENERATED = JSON.stringify({
  summary: "Clear the test arena without reloading.",
  strategies: ["Use the shotgun"],
  tips: ["Ammo respawns"],
  difficulty_rating: 6,
  estimated_time: "20 minutes",
});

const generator: TextGenerator = {
  model: "test-model",
  generate: async () => ({ text: GENERATED, model: "test-model" }),
};

const searchProvider: SearchProvider = {
  name: "fake",
  search: async () => [
    { title: "Test Game Achievement X guide", url: "https://guides.example.com/x", snippet: "Full walkthrough" },
  ],
};

function createGuideRequest(body: unknown): NextRequest {
  return new NextRequest("http://localhost/api/guides", {
    method: "POST",
    headers: { "x-forwarded-for": "192.0.2.10" },
    body: JSON.stringify(body),
  });
}

const LOOKUP = {
  appId: 730,
  achievementId: "ACH_X",
  gameName: "Test Game",
  achievementName: "Achievement X",
  sources: ["ai_generated", "web_search"],
};

describe("guide endpoints", () => {
  let current: services.GuideServices;

  beforeEach(() => {
    vi.clearAllMocks();
    current = services.createGuideServices({
      config: parseConfig({ GUIDE_SOURCES: "ai_generated,web_search" }),
      db: openDatabase(":memory:"),
      generator,
      searchProvider,
    });
    vi.mocked(services.getGuideServices).mockReturnValue(current);
  });

  describe("POST /api/guides", () => {
    it("returns ranked guides", async () => {
      const response = await POST(createGuideRequest(LOOKUP));
      const data = await response.json();

      expect(response.status).toBe(200);
      expect(data.success).toBe(true);
      expect(data.fromCache).toBe(false);
      expect(data.generationQuotaExceeded).toBe(false);
      expect(data.candidates.map((c: { sourceKind: string }) => c.sourceKind)).toEqual([
        "ai_generated",
        "web_search",
      ]);
      expect(data.candidates[0].content.summary).toBe("Clear the test arena without reloading.");
    });

    it("serves the second lookup from cache", async () => {
      await POST(createGuideRequest(LOOKUP));
      const response = await POST(createGuideRequest(LOOKUP));
      const data = await response.json();

      expect(data.fromCache).toBe(true);
      expect(data.candidates).toHaveLength(2);
    });

    it("rejects a request without an achievement name", async () => {
      const response = await POST(createGuideRequest({ appId: 730, achievementId: "ACH_X" }));
      const data = await response.json();

      expect(response.status).toBe(400);
      expect(data.success).toBe(false);
      expect(data.error).toBe("Invalid request");
    });

    it("rejects a body that is not JSON", async () => {
      const response = await POST(
        new NextRequest("http://localhost/api/guides", { method: "POST", body: "{appId: 730" })
      );

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ success: false, error: "Request body is not valid JSON" });
    });

    it("rejects unknown sources", async () => {
      const response = await POST(createGuideRequest({ ...LOOKUP, sources: ["carrier_pigeon"] }));
      expect(response.status).toBe(400);
    });

    it("answers 503 when the cache store is unavailable", async () => {
      vi.spyOn(current.aggregator, "aggregateGuides").mockRejectedValue(
        new CacheUnavailableError("Cache store failed to read")
      );

      const response = await POST(createGuideRequest(LOOKUP));
      const data = await response.json();

      expect(response.status).toBe(503);
      expect(data).toEqual({ success: false, error: "Guide search temporarily unavailable", unavailable: true });
    });
  });

  describe("GET /api/guides/cached", () => {
    it("reports a miss without searching", async () => {
      const request = new NextRequest(
        "http://localhost/api/guides/cached?appId=730&achievementId=ACH_X&sources=ai_generated,web_search"
      );

      const response = await getCached(request);

      expect(await response.json()).toEqual({ success: true, candidates: [], fromCache: false });
    });

    it("returns a cached aggregation", async () => {
      await POST(createGuideRequest(LOOKUP));
      const request = new NextRequest(
        "http://localhost/api/guides/cached?appId=730&achievementId=ach_x&sources=web_search,ai_generated"
      );

      const data = await (await getCached(request)).json();

      expect(data.fromCache).toBe(true);
      expect(data.candidates).toHaveLength(2);
    });
  });

  describe("AI guide feedback", () => {
    it("records ratings and views", async () => {
      await POST(createGuideRequest(LOOKUP));

      const rated = await rateGuide(
        new NextRequest("http://localhost/api/guides/ai/rate", {
          method: "POST",
          body: JSON.stringify({ appId: 730, achievementId: "ACH_X", rating: 4 }),
        })
      );
      await viewGuide(
        new NextRequest("http://localhost/api/guides/ai/view", {
          method: "POST",
          body: JSON.stringify({ appId: 730, achievementId: "ACH_X" }),
        })
      );

      expect(await rated.json()).toEqual({ success: true, rating: 4, ratingCount: 1 });
      expect(current.aiGuides.get(730, "ACH_X")?.views).toBe(1);
    });

    it("rejects a rating body that is not JSON", async () => {
      const response = await rateGuide(
        new NextRequest("http://localhost/api/guides/ai/rate", { method: "POST", body: "rating=5" })
      );

      expect(response.status).toBe(400);
    });

    it("returns 404 when rating a guide that does not exist", async () => {
      const response = await rateGuide(
        new NextRequest("http://localhost/api/guides/ai/rate", {
          method: "POST",
          body: JSON.stringify({ appId: 730, achievementId: "MISSING", rating: 3 }),
        })
      );

      expect(response.status).toBe(404);
    });
  });
});
