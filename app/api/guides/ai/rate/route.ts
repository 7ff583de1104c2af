/**
 * POST /api/guides/ai/rate
 * Body: { appId, achievementId, rating: 1-5 }
 */

import { NextRequest, NextResponse } from "next/server";
import { enforceRateLimit } from "@/src/lib/rate-limit";
import { initializeDatabase } from "@/src/lib/db/index";
import { getGuideServices } from "@/src/lib/services";
import { AiGuideRatingSchema } from "@/src/lib/pipeline/request";
import { errorResponse, readJsonBody } from "@/src/lib/http";

export async function POST(request: NextRequest) {
  try {
    await initializeDatabase();

    const limited = enforceRateLimit(request, "/api/guides/ai/rate");
    if (limited) return limited;

    const { appId, achievementId, rating } = AiGuideRatingSchema.parse(await readJsonBody(request));
    const guide = getGuideServices().aiGuides.rate(appId, achievementId, rating);
    if (!guide) {
      return NextResponse.json({ success: false, error: "Guide not found" }, { status: 404 });
    }

    return NextResponse.json({ success: true, rating: guide.rating, ratingCount: guide.ratingCount });
  } catch (error) {
    return errorResponse(error, "Guide rating");
  }
}
