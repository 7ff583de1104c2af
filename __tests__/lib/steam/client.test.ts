/**
 * Tests for the Steam Web API client and achievement merging
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { SteamClient, computeStats, mergeAchievementData, sortLockedFirst } from "@/src/lib/steam/client";
import { SteamApiError } from "@/src/lib/errors";
import type { Achievement } from "@/src/lib/model";
import type { SteamGlobalPercentage, SteamPlayerAchievement, SteamSchemaAchievement } from "@/src/lib/steam/types";

const PLAYER: SteamPlayerAchievement[] = [
  { apiname: "A", achieved: 0 },
  { apiname: "B", achieved: 1, unlocktime: 100 },
  { apiname: "C", achieved: 0 },
  { apiname: "D", achieved: 1, unlocktime: 200 },
];

const SCHEMA: SteamSchemaAchievement[] = [
  { name: "A", displayName: "Alpha", description: "First", icon: "a.jpg", icongray: "a_gray.jpg", hidden: 1 },
  { name: "B", displayName: "Beta", description: "Second" },
  { name: "C", displayName: "Gamma" },
  { name: "D", displayName: "Delta" },
];

const GLOBAL: SteamGlobalPercentage[] = [
  { name: "A", percent: "12.5" },
  { name: "B", percent: 50 },
  { name: "C", percent: 1.2 },
];

function stubSteamApi(routes: Record<string, () => Response>) {
  const fetchMock = vi.fn(async (input: string | URL | Request, _init?: RequestInit) => {
    const url = new URL(String(input));
    const route = Object.keys(routes).find((path) => url.pathname.includes(path));
    return route ? routes[route]() : new Response("", { status: 404 });
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("mergeAchievementData", () => {
  it("joins player progress with schema metadata and rarity", () => {
    const [alpha, , , delta] = mergeAchievementData(PLAYER, SCHEMA, GLOBAL);

    expect(alpha).toEqual({
      apiName: "A",
      name: "Alpha",
      description: "First",
      achieved: false,
      unlockTime: 0,
      icon: "a.jpg",
      iconGray: "a_gray.jpg",
      hidden: true,
      globalPercent: 12.5,
    });
    expect(delta.globalPercent).toBe(0);
    expect(delta.unlockTime).toBe(200);
  });

  it("returns nothing without player or schema data", () => {
    expect(mergeAchievementData([], SCHEMA, GLOBAL)).toEqual([]);
    expect(mergeAchievementData(PLAYER, [], GLOBAL)).toEqual([]);
  });
});

describe("sortLockedFirst", () => {
  it("puts locked achievements first, rarest first, then the most recent unlocks", () => {
    const sorted = sortLockedFirst(mergeAchievementData(PLAYER, SCHEMA, GLOBAL));
    expect(sorted.map((a) => a.apiName)).toEqual(["C", "A", "D", "B"]);
  });
});

describe("computeStats", () => {
  it("rounds completion to one decimal", () => {
    const achievements: Achievement[] = mergeAchievementData(PLAYER.slice(0, 3), SCHEMA, GLOBAL);
    expect(computeStats(achievements)).toEqual({ total: 3, unlocked: 1, locked: 2, completionPercent: 33.3 });
  });

  it("handles a game without achievements", () => {
    expect(computeStats([])).toEqual({ total: 0, unlocked: 0, locked: 0, completionPercent: 0 });
  });
});

describe("SteamClient", () => {
  const client = new SteamClient("test-steam-key", "https://steam.test");

  it("fetches owned games sorted by playtime", async () => {
    const fetchMock = stubSteamApi({
      GetOwnedGames: () =>
        json({
          response: {
            game_count: 2,
            games: [
              { appid: 10, name: "Short", playtime_forever: 5 },
              { appid: 20, name: "Long", img_icon_url: "abc", playtime_forever: 900 },
            ],
          },
        }),
    });

    const games = await client.getOwnedGames("76561198000000001");

    expect(games.map((g) => g.name)).toEqual(["Long", "Short"]);
    expect(games[0].iconUrl).toBe("https://cdn.cloudflare.steamstatic.com/steamcommunity/public/images/apps/20/abc.jpg");
    const requested = new URL(String(fetchMock.mock.calls[0][0]));
    expect(requested.searchParams.get("key")).toBe("test-steam-key");
    expect(requested.searchParams.get("steamid")).toBe("76561198000000001");
  });

  it("reports a private profile when the library is hidden", async () => {
    stubSteamApi({ GetOwnedGames: () => json({ response: {} }) });

    await expect(client.getOwnedGames("76561198000000001")).rejects.toMatchObject({
      name: "SteamApiError",
      status: 403,
    });
  });

  it("maps upstream failures to 502", async () => {
    stubSteamApi({ GetOwnedGames: () => new Response("", { status: 500, statusText: "Internal Server Error" }) });

    const error = await client.getOwnedGames("76561198000000001").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SteamApiError);
    expect(error instanceof SteamApiError && error.status).toBe(502);
  });

  it("merges the three achievement endpoints", async () => {
    stubSteamApi({
      GetPlayerAchievements: () => json({ playerstats: { success: true, achievements: PLAYER } }),
      GetSchemaForGame: () => json({ game: { gameName: "Test Game", availableGameStats: { achievements: SCHEMA } } }),
      GetGlobalAchievementPercentagesForApp: () => json({ achievementpercentages: { achievements: GLOBAL } }),
    });

    const result = await client.getAchievementsForGame("76561198000000001", 730);

    expect(result.gameName).toBe("Test Game");
    expect(result.achievements.map((a) => a.apiName)).toEqual(["C", "A", "D", "B"]);
    expect(result.stats).toEqual({ total: 4, unlocked: 2, locked: 2, completionPercent: 50 });
  });

  it("still returns achievements when rarity data is unavailable", async () => {
    stubSteamApi({
      GetPlayerAchievements: () => json({ playerstats: { success: true, achievements: PLAYER } }),
      GetSchemaForGame: () => json({ game: { gameName: "Test Game", availableGameStats: { achievements: SCHEMA } } }),
      GetGlobalAchievementPercentagesForApp: () => new Response("", { status: 503 }),
    });

    const result = await client.getAchievementsForGame("76561198000000001", 730);

    expect(result.achievements.every((a) => a.globalPercent === 0)).toBe(true);
  });

  it("rejects when the player has no stats for the game", async () => {
    stubSteamApi({
      GetPlayerAchievements: () => json({ playerstats: { success: false, error: "Requested app has no stats" } }),
      GetSchemaForGame: () => json({ game: { gameName: "Test Game" } }),
      GetGlobalAchievementPercentagesForApp: () => json({}),
    });

    await expect(client.getAchievementsForGame("76561198000000001", 730)).rejects.toMatchObject({
      message: "Requested app has no stats",
      status: 400,
    });
  });
});
