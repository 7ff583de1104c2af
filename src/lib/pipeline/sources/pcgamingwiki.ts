/**
 * PCGamingWiki game page
 * One link when the page exists and mentions achievements
 */

import type { GuideQuery } from "../../model";
import type { RateLimiter } from "../../rate-limit";
import { GuideSourceError } from "../../errors";
import { createLogger } from "../../logger";
import {
  SCRAPER_USER_AGENT,
  fetchPage,
  okResult,
  rateLimitedResult,
  resultFromError,
  type AdapterResult,
  type Clock,
  type FetchOptions,
  type SourceAdapter,
} from "./types";

const log = createLogger("source:pcgamingwiki");

export function wikiPageUrl(gameName: string): string {
  return `https://www.pcgamingwiki.com/wiki/${encodeURIComponent(gameName.trim().replace(/\s+/g, "_"))}`;
}

export class PcGamingWikiAdapter implements SourceAdapter {
  readonly kind = "wiki" as const;
  private readonly clock: Clock;

  constructor(private readonly deps: { limiter: RateLimiter; clock?: Clock }) {
    this.clock = deps.clock ?? Date.now;
  }

  async fetch(query: GuideQuery, options: FetchOptions): Promise<AdapterResult> {
    if (!query.gameName.trim()) {
      return okResult([]);
    }

    const acquired = this.deps.limiter.tryAcquire(this.clock());
    if (!acquired.allowed) {
      return rateLimitedResult(this.kind, acquired);
    }

    const url = wikiPageUrl(query.gameName);
    try {
      const response = await fetchPage(url, options.signal, SCRAPER_USER_AGENT);
      if (response.status === 404) {
        return okResult([]);
      }
      if (!response.ok) {
        throw new GuideSourceError("AdapterTransportError", `PCGamingWiki returned ${response.status}`);
      }

      const page = await response.text();
      if (!page.toLowerCase().includes("achievement")) {
        return okResult([]);
      }

      return okResult([
        {
          sourceKind: "wiki",
          title: `${query.gameName} - PCGamingWiki`,
          url,
          snippet: "Technical and achievement information on PCGamingWiki",
        },
      ]);
    } catch (error) {
      const result = resultFromError(error);
      log.warn(`PCGamingWiki lookup failed for ${query.gameName}`, { status: result.status, error: result.error });
      return result;
    }
  }
}
