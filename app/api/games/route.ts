/**
 * GET /api/games
 * The signed-in user's library, most played first.
 * Served from the 1-hour library cache unless ?refresh=1.
 */

import { NextRequest, NextResponse } from "next/server";
import { requireSession } from "@/src/lib/auth/guards";
import { initializeDatabase } from "@/src/lib/db/index";
import { cacheGames, getCachedGames } from "@/src/lib/db/games";
import { getSteamClient } from "@/src/lib/steam/client";
import { errorResponse } from "@/src/lib/http";
import { logger } from "@/src/lib/logger";

export async function GET(request: NextRequest) {
  const { session, response } = await requireSession(request);
  if (!session) return response;

  const refresh = request.nextUrl.searchParams.get("refresh") === "1";

  try {
    await initializeDatabase();

    if (!refresh) {
      const cached = getCachedGames(session.steamId);
      if (cached) {
        return NextResponse.json({ success: true, games: cached, fromCache: true });
      }
    }

    const games = await getSteamClient().getOwnedGames(session.steamId);
    cacheGames(session.steamId, games);
    logger.info(`Fetched ${games.length} games for ${session.steamId}`);

    return NextResponse.json({ success: true, games, fromCache: false });
  } catch (error) {
    return errorResponse(error, "Game library lookup");
  }
}
