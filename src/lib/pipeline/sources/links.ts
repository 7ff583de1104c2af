/**
 * Link-only sources: search pages on video and discussion sites.
 * No network I/O, but each still spends its limiter budget.
 */

import type { GuideQuery } from "../../model";
import type { RateLimiter } from "../../rate-limit";
import {
  failedResult,
  okResult,
  rateLimitedResult,
  type AdapterResult,
  type Clock,
  type FetchOptions,
  type SourceAdapter,
} from "./types";

interface LinkDeps {
  limiter: RateLimiter;
  clock?: Clock;
}

function gate(adapter: SourceAdapter, deps: LinkDeps, clock: Clock, signal?: AbortSignal): AdapterResult | null {
  if (signal?.aborted) {
    return failedResult("timeout", "Request aborted");
  }
  const acquired = deps.limiter.tryAcquire(clock());
  return acquired.allowed ? null : rateLimitedResult(adapter.kind, acquired);
}

export class YouTubeAdapter implements SourceAdapter {
  readonly kind = "video" as const;
  private readonly clock: Clock;

  constructor(private readonly deps: LinkDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  async fetch(query: GuideQuery, options: FetchOptions): Promise<AdapterResult> {
    const refused = gate(this, this.deps, this.clock, options.signal);
    if (refused) return refused;

    const search = `${query.gameName} ${query.achievementName} achievement guide`.trim();
    return okResult([
      {
        sourceKind: "video",
        title: `YouTube: ${query.achievementName} Guide`,
        url: `https://www.youtube.com/results?search_query=${encodeURIComponent(search)}`,
        snippet: "Video guides and walkthroughs on YouTube",
      },
    ]);
  }
}

export class RedditAdapter implements SourceAdapter {
  readonly kind = "discussion_board" as const;
  private readonly clock: Clock;

  constructor(private readonly deps: LinkDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  async fetch(query: GuideQuery, options: FetchOptions): Promise<AdapterResult> {
    const refused = gate(this, this.deps, this.clock, options.signal);
    if (refused) return refused;

    const search = `${query.gameName} ${query.achievementName}`.trim();
    return okResult([
      {
        sourceKind: "discussion_board",
        title: `Reddit Discussions: ${query.achievementName}`,
        url: `https://www.reddit.com/search/?q=${encodeURIComponent(search)}`,
        snippet: "Community discussions and tips on Reddit",
      },
    ]);
  }
}
