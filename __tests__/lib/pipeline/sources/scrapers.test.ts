/**
 * Tests for the page-based sources: Steam Community, PCGamingWiki, YouTube and Reddit
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { SteamCommunityAdapter, guideSearchUrl, parseGuideLinks } from "@/src/lib/pipeline/sources/steam-community";
import { PcGamingWikiAdapter, wikiPageUrl } from "@/src/lib/pipeline/sources/pcgamingwiki";
import { RedditAdapter, YouTubeAdapter } from "@/src/lib/pipeline/sources/links";
import { RateLimiter } from "@/src/lib/rate-limit";
import type { GuideQuery } from "@/src/lib/model";

const NOW = Date.UTC(2026, 7, 1);
const OPTIONS = { maxResults: 10, forceRegenerate: false };

const QUERY: GuideQuery = {
  appId: 440,
  achievementId: "QUICK_WIN",
  gameName: "Test Fortress",
  achievementName: "Quick Win",
  achievementDescription: "",
};

const GUIDES_PAGE = `
<div class="workshopBrowseItems">
  <a href="https://steamcommunity.com/sharedfiles/filedetails/?id=111&amp;searchtext=x" class="workshopItemCollection ugc">
    <div class="workshopItemTitle">Quick Win Guide</div>
    <div class="workshopItemShortDesc">All &quot;speed&quot; tips</div>
  </a>
  <a class="workshopItemTitle" href="https://steamcommunity.com/sharedfiles/filedetails/?id=222">Map tour</a>
  <a href="https://steamcommunity.com/sharedfiles/filedetails/?id=333"><div class="workshopItemTitle">All achievements 100%</div></a>
  <a href="/login">Sign in</a>
</div>`;

function openLimiter(): RateLimiter {
  return new RateLimiter("scrape", { perMinute: 10, perDay: 100 }, NOW);
}

function closedLimiter(): RateLimiter {
  return new RateLimiter("scrape", { perMinute: 0, perDay: 100 }, NOW);
}

function stubFetch(response: () => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response());
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("Steam Community guides", () => {
  it("builds the guide search URL", () => {
    expect(guideSearchUrl(440, "Quick Win")).toBe("https://steamcommunity.com/app/440/guides/?searchText=Quick%20Win");
  });

  it("parses titled guide links in page order", () => {
    expect(parseGuideLinks(GUIDES_PAGE)).toEqual([
      {
        title: "Quick Win Guide",
        url: "https://steamcommunity.com/sharedfiles/filedetails/?id=111&searchtext=x",
        description: 'All "speed" tips',
      },
      { title: "Map tour", url: "https://steamcommunity.com/sharedfiles/filedetails/?id=222", description: undefined },
      {
        title: "All achievements 100%",
        url: "https://steamcommunity.com/sharedfiles/filedetails/?id=333",
        description: undefined,
      },
    ]);
  });

  it("keeps guides that mention the achievement", async () => {
    const fetchMock = stubFetch(() => new Response(GUIDES_PAGE, { status: 200 }));
    const adapter = new SteamCommunityAdapter({ limiter: openLimiter(), clock: () => NOW });

    const result = await adapter.fetch(QUERY, OPTIONS);

    expect(fetchMock.mock.calls[0][0]).toBe(guideSearchUrl(440, "Quick Win"));
    expect(result).toEqual({
      status: "ok",
      candidates: [
        {
          sourceKind: "community_forum",
          title: "Quick Win Guide",
          url: "https://steamcommunity.com/sharedfiles/filedetails/?id=111&searchtext=x",
          snippet: 'All "speed" tips',
        },
        {
          sourceKind: "community_forum",
          title: "All achievements 100%",
          url: "https://steamcommunity.com/sharedfiles/filedetails/?id=333",
          snippet: "Steam Community Guide",
        },
      ],
    });
  });

  it("does not fetch when rate limited", async () => {
    const fetchMock = stubFetch(() => new Response("", { status: 200 }));
    const adapter = new SteamCommunityAdapter({ limiter: closedLimiter(), clock: () => NOW });

    const result = await adapter.fetch(QUERY, OPTIONS);

    expect(result.status).toBe("rate_limited");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("reports a throttled response as rate limited", async () => {
    stubFetch(() => new Response("", { status: 429 }));
    const adapter = new SteamCommunityAdapter({ limiter: openLimiter(), clock: () => NOW });

    const result = await adapter.fetch(QUERY, OPTIONS);

    expect(result).toMatchObject({ status: "rate_limited", error: "steamcommunity.com throttled the request" });
  });
});

describe("PCGamingWiki", () => {
  it("builds the page URL from the game name", () => {
    expect(wikiPageUrl(" Test Fortress 2 ")).toBe("https://www.pcgamingwiki.com/wiki/Test_Fortress_2");
  });

  it("links the page when it mentions achievements", async () => {
    stubFetch(() => new Response("<h2>Achievements</h2><p>Steam achievements: yes</p>", { status: 200 }));
    const adapter = new PcGamingWikiAdapter({ limiter: openLimiter(), clock: () => NOW });

    const result = await adapter.fetch(QUERY, OPTIONS);

    expect(result.candidates).toEqual([
      {
        sourceKind: "wiki",
        title: "Test Fortress - PCGamingWiki",
        url: "https://www.pcgamingwiki.com/wiki/Test_Fortress",
        snippet: "Technical and achievement information on PCGamingWiki",
      },
    ]);
  });

  it("returns empty for a missing page", async () => {
    stubFetch(() => new Response("Not found", { status: 404 }));
    const adapter = new PcGamingWikiAdapter({ limiter: openLimiter(), clock: () => NOW });

    expect(await adapter.fetch(QUERY, OPTIONS)).toEqual({ status: "empty", candidates: [] });
  });

  it("reports server errors and network failures as transport errors", async () => {
    const adapter = new PcGamingWikiAdapter({ limiter: openLimiter(), clock: () => NOW });

    stubFetch(() => new Response("", { status: 500 }));
    expect(await adapter.fetch(QUERY, OPTIONS)).toMatchObject({
      status: "transport_error",
      error: "PCGamingWiki returned 500",
    });

    stubFetch(() => Promise.reject(new TypeError("fetch failed")));
    expect(await adapter.fetch(QUERY, OPTIONS)).toMatchObject({
      status: "transport_error",
      error: "Request to www.pcgamingwiki.com failed: fetch failed",
    });
  });

  it("skips the lookup without a game name", async () => {
    const fetchMock = stubFetch(() => new Response("", { status: 200 }));
    const adapter = new PcGamingWikiAdapter({ limiter: openLimiter(), clock: () => NOW });

    const result = await adapter.fetch({ ...QUERY, gameName: " " }, OPTIONS);

    expect(result.status).toBe("empty");
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("link sources", () => {
  it("links a YouTube search", async () => {
    const adapter = new YouTubeAdapter({ limiter: openLimiter(), clock: () => NOW });

    const result = await adapter.fetch(QUERY, OPTIONS);

    expect(result.candidates).toEqual([
      {
        sourceKind: "video",
        title: "YouTube: Quick Win Guide",
        url: "https://www.youtube.com/results?search_query=Test%20Fortress%20Quick%20Win%20achievement%20guide",
        snippet: "Video guides and walkthroughs on YouTube",
      },
    ]);
  });

  it("links a Reddit search", async () => {
    const adapter = new RedditAdapter({ limiter: openLimiter(), clock: () => NOW });

    const result = await adapter.fetch(QUERY, OPTIONS);

    expect(result.candidates[0].url).toBe("https://www.reddit.com/search/?q=Test%20Fortress%20Quick%20Win");
  });

  it("spends the limiter budget and reports aborts", async () => {
    const limited = new YouTubeAdapter({ limiter: closedLimiter(), clock: () => NOW });
    const controller = new AbortController();
    controller.abort();
    const aborted = new RedditAdapter({ limiter: openLimiter(), clock: () => NOW });

    expect((await limited.fetch(QUERY, OPTIONS)).status).toBe("rate_limited");
    expect((await aborted.fetch(QUERY, { ...OPTIONS, signal: controller.signal })).status).toBe("timeout");
  });
});
