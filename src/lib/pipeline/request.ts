/**
 * Validation for guide lookup requests
 */

import { z } from "zod";
import { SOURCE_KINDS, type SourceKind } from "../model";
import { MAX_RESULTS_LIMIT } from "../../config/sources";

export const GuideRequestSchema = z.object({
  appId: z.coerce.number().int().positive(),
  achievementId: z.string().trim().min(1),
  gameName: z.string().trim().default(""),
  achievementName: z.string().trim().min(1),
  achievementDescription: z.string().trim().default(""),
  globalPercent: z.number().min(0).max(100).optional(),
  sources: z.array(z.enum(SOURCE_KINDS)).optional(),
  maxResults: z.number().int().min(1).max(MAX_RESULTS_LIMIT).optional(),
  forceRegenerate: z.boolean().default(false),
});

const SourcesParamSchema = z.array(z.enum(SOURCE_KINDS));

/**
 * "web_search,video" -> ["web_search", "video"]; empty -> undefined
 */
export function parseSourcesParam(value: string | null): SourceKind[] | undefined {
  if (!value) return undefined;
  const kinds = value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return kinds.length > 0 ? SourcesParamSchema.parse(kinds) : undefined;
}

export const AiGuideRefSchema = z.object({
  appId: z.coerce.number().int().positive(),
  achievementId: z.string().trim().min(1),
});

export const AiGuideRatingSchema = AiGuideRefSchema.extend({
  rating: z.number().int().min(1).max(5),
});
