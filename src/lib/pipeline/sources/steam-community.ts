/**
 * Steam Community guides
 * Scrapes the app's guide search page for workshop guide links
 */

import type { CandidateDraft, GuideQuery } from "../../model";
import type { RateLimiter } from "../../rate-limit";
import { GuideSourceError } from "../../errors";
import { htmlToText } from "../../utils/html";
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

const log = createLogger("source:steam-community");

const ANCHOR = /<a\b([^>]*)>([\s\S]*?)<\/a>/gi;
const HREF = /\bhref="([^"]+)"/i;
const TITLE_DIV = /<div[^>]*class="[^"]*\bworkshopItemTitle\b[^"]*"[^>]*>([\s\S]*?)<\/div>/i;
const DESC_DIV = /<div[^>]*class="[^"]*\bworkshopItemShortDesc\b[^"]*"[^>]*>([\s\S]*?)<\/div>/i;

export function guideSearchUrl(appId: number, achievementName: string): string {
  return `https://steamcommunity.com/app/${appId}/guides/?searchText=${encodeURIComponent(achievementName)}`;
}

export interface WorkshopGuideLink {
  title: string;
  url: string;
  description?: string;
}

/**
 * Guide links in page order. The title is either the anchor itself
 * (class="workshopItemTitle") or a title div inside it.
 */
export function parseGuideLinks(html: string): WorkshopGuideLink[] {
  const links: WorkshopGuideLink[] = [];

  for (const match of html.matchAll(ANCHOR)) {
    const attributes = match[1];
    const inner = match[2];
    const href = attributes.match(HREF)?.[1];
    if (!href) continue;

    let title: string | undefined;
    if (/class="[^"]*\bworkshopItemTitle\b/i.test(attributes)) {
      title = htmlToText(inner);
    } else {
      const titleDiv = inner.match(TITLE_DIV);
      title = titleDiv ? htmlToText(titleDiv[1]) : undefined;
    }
    if (!title) continue;

    const desc = inner.match(DESC_DIV);
    links.push({
      title,
      url: href.replace(/&amp;/g, "&"),
      description: desc ? htmlToText(desc[1]) || undefined : undefined,
    });
  }

  return links;
}

export interface SteamCommunityAdapterDeps {
  limiter: RateLimiter;
  clock?: Clock;
}

export class SteamCommunityAdapter implements SourceAdapter {
  readonly kind = "community_forum" as const;
  private readonly clock: Clock;

  constructor(private readonly deps: SteamCommunityAdapterDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  async fetch(query: GuideQuery, options: FetchOptions): Promise<AdapterResult> {
    const acquired = this.deps.limiter.tryAcquire(this.clock());
    if (!acquired.allowed) {
      return rateLimitedResult(this.kind, acquired);
    }

    try {
      const response = await fetchPage(guideSearchUrl(query.appId, query.achievementName), options.signal, SCRAPER_USER_AGENT);
      if (!response.ok) {
        throw new GuideSourceError("AdapterTransportError", `Steam Community returned ${response.status}`);
      }

      const achievement = query.achievementName.toLowerCase();
      const drafts: CandidateDraft[] = parseGuideLinks(await response.text())
        .filter((link) => {
          const title = link.title.toLowerCase();
          return title.includes(achievement) || title.includes("achievement");
        })
        .slice(0, options.maxResults)
        .map((link): CandidateDraft => ({
          sourceKind: "community_forum",
          title: link.title,
          url: link.url,
          snippet: link.description ?? "Steam Community Guide",
        }));

      log.info(`Steam Community: ${drafts.length} guides for ${query.appId}`);
      return okResult(drafts);
    } catch (error) {
      const result = resultFromError(error);
      log.warn(`Steam Community lookup failed for ${query.appId}`, { status: result.status, error: result.error });
      return result;
    }
  }
}
