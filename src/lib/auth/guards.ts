/**
 * Route guards
 *
 * Each returns a NextResponse to send when the request is refused, or
 * null when the handler may proceed.
 */

import { NextRequest, NextResponse } from "next/server";
import { getConfig, isProduction } from "../../config/env";
import { SESSION_COOKIE, verifySessionToken, type Session } from "./session";

/**
 * Require ADMIN_API_TOKEN as a bearer token
 */
export function requireAdminToken(authHeader: string | null): NextResponse | null {
  const adminToken = getConfig().ADMIN_API_TOKEN;

  if (isProduction() && !adminToken) {
    return NextResponse.json({ error: "ADMIN_API_TOKEN not configured" }, { status: 500 });
  }

  if (adminToken && authHeader !== `Bearer ${adminToken}`) {
    return NextResponse.json({ error: "Unauthorized" }, { status: 401 });
  }

  return null;
}

export type SessionCheck = { session: Session; response: null } | { session: null; response: NextResponse };

/**
 * Resolve the signed-in user from the session cookie
 */
export async function requireSession(request: NextRequest): Promise<SessionCheck> {
  const token = request.cookies.get(SESSION_COOKIE)?.value;
  const session = await verifySessionToken(token, getConfig().SESSION_SECRET);

  if (!session) {
    return {
      session: null,
      response: NextResponse.json({ success: false, error: "Not authenticated" }, { status: 401 }),
    };
  }

  return { session, response: null };
}
