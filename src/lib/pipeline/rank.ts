/**
 * Ranking pipeline
 * Source weight + keyword overlap + freshness, minus a missing-snippet penalty
 */

import type { GuideCandidate } from "../model";
import {
  FRESHNESS_BONUS_MAX,
  FRESHNESS_HALF_LIFE_DAYS,
  KEYWORD_BONUS_MAX,
  MISSING_SNIPPET_PENALTY,
  SOURCE_CONFIG,
} from "../../config/sources";
import { tokenize } from "./query";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Exponential decay: 1.0 when fresh, 0.5 at the half-life
 */
function computeFreshness(fetchedAt: number, now: number, halfLifeDays: number): number {
  const ageDays = Math.max(0, now - fetchedAt) / DAY_MS;
  return Math.pow(2, -ageDays / halfLifeDays);
}

/**
 * Fraction of keywords present as whole tokens in title + snippet.
 * A generated guide was written for this exact lookup, so it covers all of them.
 */
export function keywordCoverage(candidate: GuideCandidate, keywords: string[]): number {
  if (keywords.length === 0) return 0;
  if (candidate.sourceKind === "ai_generated") return 1;
  const tokens = new Set(tokenize(`${candidate.title} ${candidate.snippet ?? ""}`));
  const matched = keywords.filter((keyword) => tokens.has(keyword)).length;
  return matched / keywords.length;
}

export function scoreCandidate(candidate: GuideCandidate, keywords: string[], now: number): number {
  let score = SOURCE_CONFIG[candidate.sourceKind].weight;
  score += KEYWORD_BONUS_MAX * keywordCoverage(candidate, keywords);
  score += FRESHNESS_BONUS_MAX * computeFreshness(candidate.fetchedAt, now, FRESHNESS_HALF_LIFE_DAYS);
  if (!candidate.snippet) {
    score -= MISSING_SNIPPET_PENALTY;
  }

  const clamped = Math.max(0, Math.min(100, score));
  return Math.round(clamped * 100) / 100;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Score desc, then source priority, then title, then url
 */
export function compareCandidates(a: GuideCandidate, b: GuideCandidate): number {
  return (
    b.qualityScore - a.qualityScore ||
    SOURCE_CONFIG[a.sourceKind].priority - SOURCE_CONFIG[b.sourceKind].priority ||
    compareText(a.title, b.title) ||
    compareText(a.url ?? "", b.url ?? "")
  );
}

/**
 * Score every candidate and return a new, fully ordered list
 */
export function rankCandidates(candidates: GuideCandidate[], keywords: string[], now: number): GuideCandidate[] {
  return candidates
    .map((candidate) => ({ ...candidate, qualityScore: scoreCandidate(candidate, keywords, now) }))
    .sort(compareCandidates);
}
