/**
 * General web search source
 *
 * Tries query variants from most to least specific and stops at the first
 * one that yields a usable result. Raw provider results are cached per
 * variant so repeat lookups spend no search budget.
 */

import type { CandidateDraft, GuideQuery } from "../../model";
import type { CacheStore } from "../../db/cache";
import type { AcquireResult, RateLimiter } from "../../rate-limit";
import type { SearchProvider, SearchResult } from "../../search/duckduckgo";
import { CACHE_TTL_SECONDS } from "../../../config/sources";
import { buildQueryVariants } from "../query";
import { canonicalizeUrl } from "../normalize";
import { createLogger } from "../../logger";
import {
  okResult,
  rateLimitedResult,
  resultFromError,
  type AdapterResult,
  type Clock,
  type FetchOptions,
  type SourceAdapter,
} from "./types";

const log = createLogger("source:web");

export interface WebSearchAdapterDeps {
  provider: SearchProvider;
  cache: CacheStore;
  limiter: RateLimiter;
  clock?: Clock;
}

export function rawSearchCacheKey(providerName: string, variant: string): string {
  return `search:v1:${providerName}:${variant}`;
}

type VariantOutcome = { results: SearchResult[] } | { denied: AcquireResult };

function isAcceptable(result: SearchResult): boolean {
  return result.title.trim().length > 0 && canonicalizeUrl(result.url) !== null;
}

export class WebSearchAdapter implements SourceAdapter {
  readonly kind = "web_search" as const;
  private readonly clock: Clock;

  constructor(private readonly deps: WebSearchAdapterDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  private async searchVariant(variant: string, options: FetchOptions): Promise<VariantOutcome> {
    const key = rawSearchCacheKey(this.deps.provider.name, variant);
    const cached = this.deps.cache.get<SearchResult[]>(key, this.clock());
    if (cached) {
      log.debug(`Using cached search results for: ${variant}`);
      return { results: cached.value };
    }

    const acquired = this.deps.limiter.tryAcquire(this.clock());
    if (!acquired.allowed) {
      return { denied: acquired };
    }

    const results = await this.deps.provider.search(variant, {
      maxResults: options.maxResults,
      signal: options.signal,
    });

    if (results.length > 0) {
      this.deps.cache.set(key, results, CACHE_TTL_SECONDS.rawSearch, this.clock());
    }
    return { results };
  }

  async fetch(query: GuideQuery, options: FetchOptions): Promise<AdapterResult> {
    const variants = buildQueryVariants(query);

    try {
      for (const variant of variants) {
        const outcome = await this.searchVariant(variant, options);

        if ("denied" in outcome) {
          log.warn(`Search budget spent before "${variant}"`);
          return rateLimitedResult(this.kind, outcome.denied);
        }

        const acceptable = outcome.results.filter(isAcceptable);
        if (acceptable.length > 0) {
          const drafts: CandidateDraft[] = acceptable.slice(0, options.maxResults).map((result) => ({
            title: result.title,
            url: result.url,
            snippet: result.snippet,
          }));
          log.info(`Web search found ${drafts.length} results`, { variant });
          return okResult(drafts);
        }
      }

      return okResult([]);
    } catch (error) {
      const result = resultFromError(error);
      log.warn(`Web search failed for ${query.appId}/${query.achievementId}`, { status: result.status, error: result.error });
      return result;
    }
  }
}
