/**
 * Core data models for the achievement guide hub
 */

/**
 * Origin category of a guide. Listed in tie-break priority order.
 */
export const SOURCE_KINDS = [
  "ai_generated",
  "community_forum",
  "web_search",
  "video",
  "discussion_board",
  "wiki",
] as const;

export type SourceKind = (typeof SOURCE_KINDS)[number];

// ---------------------------------------------------------------------------
// Steam library data
// ---------------------------------------------------------------------------

export interface GameImages {
  header: string;
  capsule: string;
  capsuleSmall: string;
  capsuleLarge: string;
  hero: string;
  logo: string;
  libraryCapsule: string;
}

export interface Game {
  appId: number;
  name: string;
  iconUrl?: string;
  playtimeForever: number; // minutes
  playtime2Weeks: number; // minutes
  lastPlayed: number; // unix seconds, 0 = never
  images: GameImages;
}

export interface Achievement {
  apiName: string;
  name: string;
  description: string;
  achieved: boolean;
  unlockTime: number; // unix seconds
  icon: string;
  iconGray: string;
  hidden: boolean;
  globalPercent: number;
}

export interface AchievementStats {
  total: number;
  unlocked: number;
  locked: number;
  completionPercent: number;
}

export interface GameAchievements {
  appId: number;
  gameName: string;
  achievements: Achievement[];
  stats: AchievementStats;
}

export interface SteamUser {
  steamId: string;
  personaName?: string;
  profileUrl?: string;
  avatarUrl?: string;
  lastLogin?: number;
}

// ---------------------------------------------------------------------------
// Guides
// ---------------------------------------------------------------------------

/**
 * Structured content of a generated guide
 */
export interface AiGuideContent {
  summary: string;
  strategies: string[];
  tips: string[];
  difficulty: number; // integer 1-10
  estimatedTime: string;
  model?: string;
  generatedAt: number; // epoch ms
}

/**
 * Form of an achievement id used in every stored key (aggregations and generated guides)
 */
export function achievementKey(achievementId: string): string {
  return achievementId.toLowerCase();
}

/**
 * Lookup key plus the text an adapter needs to build its queries.
 * `globalPercent` is the rarity hint.
 */
export interface GuideQuery {
  appId: number;
  achievementId: string;
  gameName: string;
  achievementName: string;
  achievementDescription: string;
  globalPercent?: number;
}

interface CandidateBase {
  title: string;
  snippet?: string;
  qualityScore: number; // 0-100, assigned by the ranker
  fetchedAt: number; // epoch ms
}

export interface AiGuideCandidate extends CandidateBase {
  sourceKind: "ai_generated";
  url?: string;
  content: AiGuideContent;
}

export interface LinkGuideCandidate extends CandidateBase {
  sourceKind: Exclude<SourceKind, "ai_generated">;
  url: string;
}

export type GuideCandidate = AiGuideCandidate | LinkGuideCandidate;

/**
 * What an adapter hands to the normalizer. Web results may leave
 * `sourceKind` unset so the normalizer can classify them by host.
 */
export type CandidateDraft =
  | {
      sourceKind: "ai_generated";
      title: string;
      snippet?: string;
      url?: string;
      content: AiGuideContent;
      fetchedAt?: number;
    }
  | {
      sourceKind?: Exclude<SourceKind, "ai_generated">;
      title: string;
      snippet?: string;
      url: string;
      fetchedAt?: number;
    };

export type AdapterStatus =
  | "ok"
  | "empty"
  | "rate_limited"
  | "transport_error"
  | "malformed_response"
  | "quota_exceeded"
  | "timeout";

export interface SourceReport {
  kind: SourceKind;
  status: AdapterStatus;
  count: number;
  durationMs: number;
  error?: string;
}

export interface AggregationCacheEntry {
  key: string;
  candidates: GuideCandidate[];
  sources: SourceReport[];
  computedAt: number; // epoch ms
  expiresAt: number; // epoch ms
}

export interface AggregationResult {
  candidates: GuideCandidate[];
  fromCache: boolean;
  computedAt: number;
  expiresAt: number;
  sources: SourceReport[];
  generationQuotaExceeded: boolean;
}
