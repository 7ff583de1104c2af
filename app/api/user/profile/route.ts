/**
 * GET /api/user/profile
 * The signed-in user's stored Steam profile
 */

import { NextRequest, NextResponse } from "next/server";
import { requireSession } from "@/src/lib/auth/guards";
import { initializeDatabase } from "@/src/lib/db/index";
import { getUser } from "@/src/lib/db/users";
import { errorResponse } from "@/src/lib/http";

export async function GET(request: NextRequest) {
  const { session, response } = await requireSession(request);
  if (!session) return response;

  try {
    await initializeDatabase();
    const user = getUser(session.steamId);
    if (!user) {
      return NextResponse.json({ success: false, error: "User not found" }, { status: 404 });
    }
    return NextResponse.json({ success: true, user });
  } catch (error) {
    return errorResponse(error, "Profile lookup");
  }
}
