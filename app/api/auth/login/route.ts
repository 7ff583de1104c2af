/**
 * GET /api/auth/login
 * Redirect to Steam's OpenID sign-in page
 */

import { NextRequest, NextResponse } from "next/server";
import { getConfig } from "@/src/config/env";
import { buildLoginUrl } from "@/src/lib/steam/openid";

export async function GET(request: NextRequest) {
  const origin = request.nextUrl.origin;
  const loginUrl = buildLoginUrl(getConfig().STEAM_OPENID_URL, `${origin}/api/auth/callback`, origin);
  return NextResponse.redirect(loginUrl);
}
