/**
 * Generated guide store
 * One row per (app, achievement); rows older than the AI guide TTL read as absent.
 * Achievement ids are stored and matched in their achievementKey() form.
 */

import { and, eq, sql } from "drizzle-orm";
import { z } from "zod";
import { getOrm, type Orm } from "./index";
import { aiGuides } from "./schema";
import { achievementKey, type AiGuideContent } from "../model";
import { CACHE_TTL_SECONDS } from "../../config/sources";
import { logger } from "../logger";

export interface StoredAiGuide {
  id: number;
  appId: number;
  achievementId: string;
  achievementName: string;
  content: AiGuideContent;
  views: number;
  rating: number; // mean of 1-5 ratings, 0 when unrated
  ratingCount: number;
}

export interface SaveAiGuideInput {
  appId: number;
  achievementId: string;
  achievementName: string;
  gameName?: string;
  content: AiGuideContent;
}

export interface AiGuideRepository {
  get(appId: number, achievementId: string, now?: number): StoredAiGuide | null;
  save(input: SaveAiGuideInput): StoredAiGuide;
}

const stringList = z.array(z.string());

function parseList(json: string): string[] {
  const parsed = stringList.safeParse(safeJson(json));
  return parsed.success ? parsed.data : [];
}

function safeJson(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch {
    return null;
  }
}

type AiGuideRow = typeof aiGuides.$inferSelect;

function toStoredGuide(row: AiGuideRow): StoredAiGuide {
  return {
    id: row.id,
    appId: row.appId,
    achievementId: row.achievementId,
    achievementName: row.achievementName,
    content: {
      summary: row.summary,
      strategies: parseList(row.strategies),
      tips: parseList(row.tips),
      difficulty: row.difficulty,
      estimatedTime: row.estimatedTime,
      model: row.modelUsed ?? undefined,
      generatedAt: row.generatedAt,
    },
    views: row.views,
    rating: row.ratingCount > 0 ? Math.round((row.ratingTotal / row.ratingCount) * 10) / 10 : 0,
    ratingCount: row.ratingCount,
  };
}

export class AiGuideStore implements AiGuideRepository {
  constructor(
    private readonly orm: Orm,
    private readonly ttlSeconds: number = CACHE_TTL_SECONDS.aiGuide
  ) {}

  get(appId: number, achievementId: string, now: number = Date.now()): StoredAiGuide | null {
    const row = this.orm
      .select()
      .from(aiGuides)
      .where(and(eq(aiGuides.appId, appId), eq(aiGuides.achievementId, achievementKey(achievementId))))
      .get();

    if (!row) {
      return null;
    }

    if (now > row.generatedAt + this.ttlSeconds * 1000) {
      logger.debug(`AI guide for ${appId}/${achievementId} is past its TTL`);
      return null;
    }

    return toStoredGuide(row);
  }

  /**
   * Insert or replace the guide for (app, achievement). Ratings and views
   * belong to the old text and are reset.
   */
  save(input: SaveAiGuideInput): StoredAiGuide {
    const values = {
      appId: input.appId,
      achievementId: achievementKey(input.achievementId),
      achievementName: input.achievementName,
      gameName: input.gameName ?? null,
      summary: input.content.summary,
      difficulty: input.content.difficulty,
      estimatedTime: input.content.estimatedTime,
      strategies: JSON.stringify(input.content.strategies),
      tips: JSON.stringify(input.content.tips),
      modelUsed: input.content.model ?? null,
      generatedAt: input.content.generatedAt,
      ratingTotal: 0,
      ratingCount: 0,
      views: 0,
    };

    const row = this.orm
      .insert(aiGuides)
      .values(values)
      .onConflictDoUpdate({
        target: [aiGuides.appId, aiGuides.achievementId],
        set: values,
      })
      .returning()
      .get();

    logger.info(`Saved AI guide for ${input.appId}/${input.achievementId}`);
    return toStoredGuide(row);
  }

  /**
   * Record a 1-5 rating. Returns the updated guide, or null if there is none.
   */
  rate(appId: number, achievementId: string, rating: number): StoredAiGuide | null {
    if (!Number.isInteger(rating) || rating < 1 || rating > 5) {
      throw new RangeError("Rating must be an integer between 1 and 5");
    }

    const row = this.orm
      .update(aiGuides)
      .set({
        ratingTotal: sql`${aiGuides.ratingTotal} + ${rating}`,
        ratingCount: sql`${aiGuides.ratingCount} + 1`,
      })
      .where(and(eq(aiGuides.appId, appId), eq(aiGuides.achievementId, achievementKey(achievementId))))
      .returning()
      .get();

    return row ? toStoredGuide(row) : null;
  }

  incrementViews(appId: number, achievementId: string): void {
    this.orm
      .update(aiGuides)
      .set({ views: sql`${aiGuides.views} + 1` })
      .where(and(eq(aiGuides.appId, appId), eq(aiGuides.achievementId, achievementKey(achievementId))))
      .run();
  }
}
