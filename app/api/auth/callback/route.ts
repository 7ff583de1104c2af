/**
 * GET /api/auth/callback
 * Steam redirects here after sign-in. Verifies the assertion, records the
 * user and sets the session cookie.
 */

import { NextRequest, NextResponse } from "next/server";
import { getConfig, isProduction } from "@/src/config/env";
import { verifyCallback } from "@/src/lib/steam/openid";
import { getSteamClient } from "@/src/lib/steam/client";
import { upsertUser } from "@/src/lib/db/users";
import { initializeDatabase } from "@/src/lib/db/index";
import { createSessionToken, sessionCookieOptions, SESSION_COOKIE } from "@/src/lib/auth/session";
import type { SteamUser } from "@/src/lib/model";
import { errorMessage } from "@/src/lib/errors";
import { logger } from "@/src/lib/logger";

async function loadProfile(steamId: string): Promise<SteamUser> {
  try {
    const [player] = await getSteamClient().getPlayerSummaries([steamId]);
    if (player) {
      return {
        steamId,
        personaName: player.personaname,
        profileUrl: player.profileurl,
        avatarUrl: player.avatarfull,
      };
    }
  } catch (error) {
    logger.warn(`Could not load Steam profile for ${steamId}`, { error: errorMessage(error) });
  }
  return { steamId };
}

export async function GET(request: NextRequest) {
  const config = getConfig();
  const result = await verifyCallback(config.STEAM_OPENID_URL, request.nextUrl.searchParams);

  if (!result.ok) {
    logger.warn(`Steam login rejected: ${result.error}`);
    const url = new URL("/", request.url);
    url.searchParams.set("error", result.error);
    return NextResponse.redirect(url);
  }

  try {
    await initializeDatabase();
    upsertUser(await loadProfile(result.steamId));

    const token = await createSessionToken(result.steamId, config.SESSION_SECRET);
    const response = NextResponse.redirect(new URL("/dashboard", request.url));
    response.cookies.set(SESSION_COOKIE, token, sessionCookieOptions(isProduction()));

    logger.info(`User ${result.steamId} signed in`);
    return response;
  } catch (error) {
    logger.error("Login callback failed", error);
    const url = new URL("/", request.url);
    url.searchParams.set("error", "Login failed");
    return NextResponse.redirect(url);
  }
}
