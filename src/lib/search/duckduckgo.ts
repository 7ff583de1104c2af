/**
 * DuckDuckGo HTML search
 * Parses the no-JS results page; no API key needed
 */

import { GuideSourceError, errorMessage } from "../errors";
import { htmlToText } from "../utils/html";
import { logger } from "../logger";

export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
}

export interface SearchOptions {
  maxResults: number;
  signal?: AbortSignal;
}

export interface SearchProvider {
  readonly name: string;
  search(query: string, options: SearchOptions): Promise<SearchResult[]>;
}

const SEARCH_URL = "https://html.duckduckgo.com/html/";
const USER_AGENT = "Mozilla/5.0 (compatible; AchievementGuideHub/0.1)";

const RESULT_LINK = /<a[^>]+class="[^"]*\bresult__a\b[^"]*"[^>]*href="([^"]+)"[^>]*>([\s\S]*?)<\/a>/gi;
const RESULT_SNIPPET = /class="[^"]*\bresult__snippet\b[^"]*"[^>]*>([\s\S]*?)<\/(?:a|div|td)>/gi;

/**
 * Result links go through a redirector: //duckduckgo.com/l/?uddg=<encoded target>
 */
export function resolveResultUrl(href: string): string | null {
  const decodedHref = href.replace(/&amp;/g, "&");
  try {
    const url = new URL(decodedHref, "https://duckduckgo.com");
    if (url.hostname.endsWith("duckduckgo.com") && url.pathname === "/l/") {
      return url.searchParams.get("uddg");
    }
    return url.protocol === "http:" || url.protocol === "https:" ? url.toString() : null;
  } catch {
    return null;
  }
}

/**
 * Pair result links with their snippets, in page order
 */
export function parseResultsPage(html: string): SearchResult[] {
  const links = Array.from(html.matchAll(RESULT_LINK));
  const snippets = Array.from(html.matchAll(RESULT_SNIPPET), (match) => htmlToText(match[1]));

  const results: SearchResult[] = [];
  links.forEach((match, index) => {
    const url = resolveResultUrl(match[1]);
    const title = htmlToText(match[2]);
    if (!url || !title) return;
    results.push({ title, url, snippet: snippets[index] ?? "" });
  });
  return results;
}

export class DuckDuckGoSearch implements SearchProvider {
  readonly name = "duckduckgo";

  async search(query: string, options: SearchOptions): Promise<SearchResult[]> {
    let response: Response;
    try {
      response = await fetch(SEARCH_URL, {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          "User-Agent": USER_AGENT,
        },
        body: new URLSearchParams({ q: query }),
        signal: options.signal,
      });
    } catch (error) {
      throw new GuideSourceError("AdapterTransportError", `Search request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (response.status === 429 || response.status === 202) {
      // 202 is DuckDuckGo's anomaly/throttle page
      throw new GuideSourceError("AdapterRateLimited", `Search provider throttled (${response.status})`);
    }
    if (!response.ok) {
      throw new GuideSourceError("AdapterTransportError", `Search provider returned ${response.status}`);
    }

    const html = await response.text();
    const results = parseResultsPage(html);
    logger.debug(`DuckDuckGo returned ${results.length} results`, { query });
    return results.slice(0, options.maxResults);
  }
}
