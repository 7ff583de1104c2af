/**
 * Process-wide guide services
 * Limiters, stores and adapters are constructed once and injected
 */

import type Database from "better-sqlite3";
import { getConfig, type AppConfig } from "../config/env";
import { getSqlite, getOrm } from "./db/index";
import { SqliteCacheStore, type CacheStore } from "./db/cache";
import { AiGuideStore } from "./db/ai-guides";
import { createSourceRateLimiters, type SourceRateLimiters } from "./rate-limit";
import { getTextGenerator, type TextGenerator } from "./openrouter/client";
import { DuckDuckGoSearch, type SearchProvider } from "./search/duckduckgo";
import { GuideAggregator } from "./pipeline/aggregate";
import { AiGuideAdapter } from "./pipeline/sources/ai";
import { WebSearchAdapter } from "./pipeline/sources/web";
import { SteamCommunityAdapter } from "./pipeline/sources/steam-community";
import { PcGamingWikiAdapter } from "./pipeline/sources/pcgamingwiki";
import { RedditAdapter, YouTubeAdapter } from "./pipeline/sources/links";
import type { Clock } from "./pipeline/sources/types";

export interface GuideServices {
  aggregator: GuideAggregator;
  aiAdapter: AiGuideAdapter;
  aiGuides: AiGuideStore;
  cache: CacheStore;
  limiters: SourceRateLimiters;
}

export interface GuideServicesOptions {
  config: AppConfig;
  db: Database.Database;
  generator: TextGenerator | null;
  searchProvider: SearchProvider;
  clock?: Clock;
}

export function createGuideServices(options: GuideServicesOptions): GuideServices {
  const { config, db, generator, searchProvider } = options;
  const clock = options.clock ?? Date.now;

  const cache = new SqliteCacheStore(db);
  const aiGuides = new AiGuideStore(getOrm(db));
  const limiters = createSourceRateLimiters(config, clock());

  const aiAdapter = new AiGuideAdapter({ generator, store: aiGuides, limiter: limiters.ai_generated, clock });

  const aggregator = new GuideAggregator({
    cache,
    adapters: [
      aiAdapter,
      new SteamCommunityAdapter({ limiter: limiters.community_forum, clock }),
      new WebSearchAdapter({ provider: searchProvider, cache, limiter: limiters.web_search, clock }),
      new YouTubeAdapter({ limiter: limiters.video, clock }),
      new RedditAdapter({ limiter: limiters.discussion_board, clock }),
      new PcGamingWikiAdapter({ limiter: limiters.wiki, clock }),
    ],
    defaultSources: config.GUIDE_SOURCES,
    deadlineMs: config.GUIDE_FANOUT_DEADLINE_MS,
    clock,
  });

  return { aggregator, aiAdapter, aiGuides, cache, limiters };
}

let services: GuideServices | null = null;

export function getGuideServices(): GuideServices {
  if (!services) {
    services = createGuideServices({
      config: getConfig(),
      db: getSqlite(),
      generator: getTextGenerator(),
      searchProvider: new DuckDuckGoSearch(),
    });
  }
  return services;
}
