/**
 * POST /api/guides/ai/view
 * Body: { appId, achievementId }
 */

import { NextRequest, NextResponse } from "next/server";
import { initializeDatabase } from "@/src/lib/db/index";
import { getGuideServices } from "@/src/lib/services";
import { AiGuideRefSchema } from "@/src/lib/pipeline/request";
import { errorResponse, readJsonBody } from "@/src/lib/http";

export async function POST(request: NextRequest) {
  try {
    await initializeDatabase();
    const { appId, achievementId } = AiGuideRefSchema.parse(await readJsonBody(request));
    getGuideServices().aiGuides.incrementViews(appId, achievementId);
    return NextResponse.json({ success: true });
  } catch (error) {
    return errorResponse(error, "Guide view");
  }
}
