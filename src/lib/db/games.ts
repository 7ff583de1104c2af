/**
 * Game library cache
 * The whole library for a user is replaced in one transaction
 */

import { and, eq, gt, desc } from "drizzle-orm";
import { getOrm, type Orm } from "./index";
import { cachedGames } from "./schema";
import type { Game } from "../model";
import { CACHE_TTL_SECONDS } from "../../config/sources";
import { buildGameImages } from "../steam/images";
import { logger } from "../logger";

export function cacheGames(steamId: string, games: Game[], orm: Orm = getOrm(), nowSeconds = Math.floor(Date.now() / 1000)): void {
  orm.transaction((tx) => {
    tx.delete(cachedGames).where(eq(cachedGames.steamId, steamId)).run();

    for (const game of games) {
      tx.insert(cachedGames)
        .values({
          steamId,
          appId: game.appId,
          name: game.name,
          iconUrl: game.iconUrl ?? null,
          playtimeForever: game.playtimeForever,
          playtime2Weeks: game.playtime2Weeks,
          lastPlayed: game.lastPlayed,
          cachedAt: nowSeconds,
        })
        .run();
    }
  });

  logger.info(`Cached ${games.length} games for ${steamId}`);
}

/**
 * Cached library, most played first. Null when nothing fresh is cached.
 */
export function getCachedGames(
  steamId: string,
  orm: Orm = getOrm(),
  nowSeconds = Math.floor(Date.now() / 1000)
): Game[] | null {
  const freshAfter = nowSeconds - CACHE_TTL_SECONDS.gameLibrary;

  const rows = orm
    .select()
    .from(cachedGames)
    .where(and(eq(cachedGames.steamId, steamId), gt(cachedGames.cachedAt, freshAfter)))
    .orderBy(desc(cachedGames.playtimeForever))
    .all();

  if (rows.length === 0) {
    return null;
  }

  return rows.map((row) => ({
    appId: row.appId,
    name: row.name,
    iconUrl: row.iconUrl ?? undefined,
    playtimeForever: row.playtimeForever,
    playtime2Weeks: row.playtime2Weeks,
    lastPlayed: row.lastPlayed,
    images: buildGameImages(row.appId),
  }));
}
