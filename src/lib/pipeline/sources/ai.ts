/**
 * Generated guide source
 *
 * Serves the stored guide for (app, achievement) while it is within its
 * TTL; otherwise asks the text generator for a new one and stores it.
 */

import { z } from "zod";
import type { AiGuideContent, CandidateDraft, GuideQuery } from "../../model";
import type { AiGuideRepository, StoredAiGuide } from "../../db/ai-guides";
import type { TextGenerator } from "../../openrouter/client";
import type { RateLimiter } from "../../rate-limit";
import { GuideSourceError } from "../../errors";
import { createLogger } from "../../logger";
import {
  failedResult,
  okResult,
  rateLimitedResult,
  resultFromError,
  type AdapterResult,
  type Clock,
  type FetchOptions,
  type SourceAdapter,
} from "./types";

const log = createLogger("source:ai");

const GUIDE_MAX_TOKENS = 1500;
const RARE_THRESHOLD_PERCENT = 10;

const GeneratedGuideSchema = z.object({
  summary: z.string().trim().min(1),
  strategies: z.array(z.string()),
  tips: z.array(z.string()),
  difficulty_rating: z.number().int().min(1).max(10),
  estimated_time: z.string().trim().min(1),
});

export function buildGuidePrompt(query: GuideQuery): string {
  const percent = query.globalPercent;
  const rarity = percent !== undefined && percent < RARE_THRESHOLD_PERCENT ? "rare" : "common";
  const rarityInfo = percent !== undefined ? ` (Only ${percent.toFixed(1)}% of players have unlocked this)` : "";

  return `Generate an achievement guide for:

Game: ${query.gameName}
Achievement: ${query.achievementName}
Description: ${query.achievementDescription}
Rarity: ${rarity}${rarityInfo}

Provide specific, actionable strategies to unlock this achievement. Include any tips about timing, difficulty, or prerequisites.

Respond with a single JSON object with exactly these fields:
- "summary": 2-3 sentence overview of what the achievement requires
- "strategies": array of strings, each a different approach
- "tips": array of helpful tips and warnings
- "difficulty_rating": integer 1-10 (1 = very easy, 10 = extremely hard)
- "estimated_time": string such as "5-10 minutes" or "20+ hours"`;
}

/**
 * Parse generator output into guide content. Returns null unless every
 * field is present and well-formed.
 */
export function parseGeneratedGuide(text: string): Omit<AiGuideContent, "model" | "generatedAt"> | null {
  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(jsonMatch[0]);
  } catch {
    return null;
  }

  const parsed = GeneratedGuideSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  return {
    summary: parsed.data.summary,
    strategies: parsed.data.strategies.map((s) => s.trim()).filter(Boolean),
    tips: parsed.data.tips.map((t) => t.trim()).filter(Boolean),
    difficulty: parsed.data.difficulty_rating,
    estimatedTime: parsed.data.estimated_time,
  };
}

function toDraft(query: GuideQuery, content: AiGuideContent): CandidateDraft {
  return {
    sourceKind: "ai_generated",
    title: `AI Guide: ${query.achievementName}`,
    snippet: content.summary,
    content,
    fetchedAt: content.generatedAt,
  };
}

export interface AiGuideAdapterDeps {
  generator: TextGenerator | null;
  store: AiGuideRepository;
  limiter: RateLimiter;
  clock?: Clock;
}

export class AiGuideAdapter implements SourceAdapter {
  readonly kind = "ai_generated" as const;
  private readonly clock: Clock;

  constructor(private readonly deps: AiGuideAdapterDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  /**
   * Stored guide within its TTL, without generating
   */
  cached(query: GuideQuery): StoredAiGuide | null {
    return this.deps.store.get(query.appId, query.achievementId, this.clock());
  }

  async fetch(query: GuideQuery, options: FetchOptions): Promise<AdapterResult> {
    try {
      if (!options.forceRegenerate) {
        const stored = this.cached(query);
        if (stored) {
          log.debug(`Serving stored guide for ${query.appId}/${query.achievementId}`);
          return okResult([toDraft(query, stored.content)]);
        }
      }

      const generator = this.deps.generator;
      if (!generator) {
        return failedResult("empty", "Text generation is not configured");
      }

      const acquired = this.deps.limiter.tryAcquire(this.clock());
      if (!acquired.allowed) {
        if (acquired.window === "day") {
          return failedResult("quota_exceeded", "Daily AI generation quota exceeded", acquired.retryAfterMs);
        }
        return rateLimitedResult(this.kind, acquired);
      }

      const generated = await generator.generate(buildGuidePrompt(query), {
        maxTokens: GUIDE_MAX_TOKENS,
        signal: options.signal,
      });

      const parsed = parseGeneratedGuide(generated.text);
      if (!parsed) {
        throw new GuideSourceError("AdapterMalformedResponse", "Generated guide was not valid structured JSON");
      }

      const content: AiGuideContent = { ...parsed, model: generated.model, generatedAt: this.clock() };
      this.deps.store.save({
        appId: query.appId,
        achievementId: query.achievementId,
        achievementName: query.achievementName,
        gameName: query.gameName,
        content,
      });

      log.info(`Generated guide for ${query.appId}/${query.achievementId}`, { model: generated.model });
      return okResult([toDraft(query, content)]);
    } catch (error) {
      const result = resultFromError(error);
      log.warn(`Guide generation failed for ${query.appId}/${query.achievementId}`, {
        status: result.status,
        error: result.error,
      });
      return result;
    }
  }
}
