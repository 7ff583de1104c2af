/**
 * Search query construction
 */

import type { GuideQuery } from "../model";
import { KEYWORD_STOPWORDS } from "../../config/sources";

/**
 * Lowercase word tokens (letters and digits)
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean);
}

/**
 * Query variants, most specific first. Adapters try them in order.
 */
export function buildQueryVariants(query: Pick<GuideQuery, "gameName" | "achievementName">): string[] {
  const game = query.gameName.trim();
  const achievement = query.achievementName.trim();

  if (!achievement) {
    return [];
  }

  const variants = game
    ? [
        `"${game}" "${achievement}" achievement guide`,
        `${game} ${achievement} how to unlock`,
        `"${achievement}" achievement guide`,
      ]
    : [`"${achievement}" achievement guide`];

  return Array.from(new Set(variants));
}

/**
 * Keywords the ranker looks for in candidate text
 */
export function extractKeywords(query: Pick<GuideQuery, "gameName" | "achievementName">): string[] {
  const tokens = tokenize(`${query.gameName} ${query.achievementName}`).filter(
    (token) => token.length >= 2 && !KEYWORD_STOPWORDS.has(token)
  );
  return Array.from(new Set(tokens));
}
