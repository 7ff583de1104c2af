/**
 * Guide source policy tables
 * Weights, tie-break priority, host classification and cache lifetimes
 */

import type { SourceKind } from "../lib/model";

export interface SourceConfig {
  label: string;
  weight: number; // base quality score, 0-100 scale
  priority: number; // lower wins ties
}

/**
 * Weights must stay strictly decreasing in priority order so that a
 * higher-priority kind never scores below a lower-priority one on equal terms.
 *
 * A generated guide gets full keyword coverage and is at most one half-life old
 * (its store TTL), so its floor of 60 + 30 + 5 meets the best link ceiling of
 * 55 + 30 + 10 and wins the tie on priority.
 */
export const SOURCE_CONFIG: Record<SourceKind, SourceConfig> = {
  ai_generated: { label: "AI Guide", weight: 60, priority: 0 },
  community_forum: { label: "Steam Community", weight: 55, priority: 1 },
  web_search: { label: "Web", weight: 45, priority: 2 },
  video: { label: "Video", weight: 42, priority: 3 },
  discussion_board: { label: "Discussion", weight: 40, priority: 4 },
  wiki: { label: "Wiki", weight: 35, priority: 5 },
};

export const KEYWORD_BONUS_MAX = 30;
export const FRESHNESS_BONUS_MAX = 10;
export const FRESHNESS_HALF_LIFE_DAYS = 30;
export const MISSING_SNIPPET_PENALTY = 10;

/**
 * Host patterns used to classify search results. First match wins.
 */
export const HOST_PATTERNS: Array<{ kind: Exclude<SourceKind, "ai_generated">; pattern: RegExp }> = [
  { kind: "video", pattern: /(^|\.)youtube\.com$|(^|\.)youtu\.be$|(^|\.)twitch\.tv$/ },
  { kind: "discussion_board", pattern: /(^|\.)reddit\.com$|(^|\.)redd\.it$/ },
  { kind: "community_forum", pattern: /(^|\.)steamcommunity\.com$|(^|\.)gamefaqs\.gamespot\.com$/ },
  {
    kind: "wiki",
    pattern: /(^|\.)fandom\.com$|(^|\.)wikia\.com$|(^|\.)wiki\.gg$|(^|\.)gamepedia\.com$|(^|\.)pcgamingwiki\.com$|(^|\.)wikipedia\.org$/,
  },
];

/**
 * Query parameters that never change what a page shows
 */
export const TRACKING_PARAMS = new Set([
  "fbclid",
  "gclid",
  "dclid",
  "msclkid",
  "mc_cid",
  "mc_eid",
  "igshid",
  "ref",
  "ref_src",
  "si",
  "feature",
]);

export const SECONDS = {
  minute: 60,
  hour: 60 * 60,
  day: 24 * 60 * 60,
} as const;

export const CACHE_TTL_SECONDS = {
  gameLibrary: SECONDS.hour,
  achievements: 30 * SECONDS.minute,
  guideAggregation: 7 * SECONDS.day,
  degradedAggregation: SECONDS.hour,
  aiGuide: 30 * SECONDS.day,
  rawSearch: 7 * SECONDS.day,
} as const;

export const DEFAULT_MAX_RESULTS = 15;
export const MAX_RESULTS_LIMIT = 50;
export const PER_SOURCE_MAX_RESULTS = 10;

export const KEYWORD_STOPWORDS = new Set([
  "a",
  "an",
  "and",
  "the",
  "of",
  "in",
  "on",
  "to",
  "for",
  "with",
  "at",
  "by",
  "from",
  "is",
  "it",
  "or",
  "as",
]);
