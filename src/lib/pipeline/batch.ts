/**
 * Pre-generate AI guides for a game's locked achievements
 */

import type { Achievement, AdapterStatus, GuideQuery } from "../model";
import type { AiGuideRepository } from "../db/ai-guides";
import type { SourceAdapter } from "./sources/types";
import { createLogger } from "../logger";

const log = createLogger("warm");

export interface WarmResult {
  generated: number;
  failed: number;
  skipped: number;
  stoppedBy?: AdapterStatus;
}

const STOP_STATUSES: ReadonlySet<AdapterStatus> = new Set(["rate_limited", "quota_exceeded"]);

export function achievementQuery(game: { appId: number; name: string }, achievement: Achievement): GuideQuery {
  return {
    appId: game.appId,
    achievementId: achievement.apiName,
    gameName: game.name,
    achievementName: achievement.name,
    achievementDescription: achievement.description,
    globalPercent: achievement.globalPercent,
  };
}

/**
 * Generate guides for up to `maxCount` achievements, skipping ones already
 * stored. Stops at the first rate-limit or quota refusal.
 */
export async function warmAiGuides(
  adapter: SourceAdapter,
  store: AiGuideRepository,
  game: { appId: number; name: string },
  lockedAchievements: Achievement[],
  maxCount = 5
): Promise<WarmResult> {
  const result: WarmResult = { generated: 0, failed: 0, skipped: 0 };

  for (const achievement of lockedAchievements.slice(0, maxCount)) {
    if (store.get(game.appId, achievement.apiName)) {
      result.skipped++;
      continue;
    }

    const fetched = await adapter.fetch(achievementQuery(game, achievement), { maxResults: 1, forceRegenerate: false });
    if (fetched.status === "ok") {
      result.generated++;
      continue;
    }

    result.failed++;
    if (STOP_STATUSES.has(fetched.status)) {
      result.stoppedBy = fetched.status;
      log.warn(`Stopping warm-up for ${game.appId}: ${fetched.status}`, { retryAfterMs: fetched.retryAfterMs });
      break;
    }
  }

  log.info(`Warm-up for ${game.name}`, { ...result });
  return result;
}
