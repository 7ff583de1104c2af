/**
 * POST /api/guides
 * Aggregate guides for one achievement from the enabled sources
 *
 * Body: { appId, achievementId, achievementName, gameName?, achievementDescription?,
 *         globalPercent?, sources?, maxResults?, forceRegenerate? }
 */

import { NextRequest, NextResponse } from "next/server";
import { enforceRateLimit } from "@/src/lib/rate-limit";
import { initializeDatabase } from "@/src/lib/db/index";
import { getGuideServices } from "@/src/lib/services";
import { GuideRequestSchema } from "@/src/lib/pipeline/request";
import { errorResponse, readJsonBody } from "@/src/lib/http";

export async function POST(request: NextRequest) {
  try {
    await initializeDatabase();

    const limited = enforceRateLimit(request, "/api/guides");
    if (limited) return limited;

    const body = GuideRequestSchema.parse(await readJsonBody(request));
    const result = await getGuideServices().aggregator.aggregateGuides(body);

    return NextResponse.json({ success: true, ...result });
  } catch (error) {
    return errorResponse(error, "Guide aggregation");
  }
}
