/**
 * GET /api/guides/cached?appId=&achievementId=&sources=
 * Cached aggregation only; never triggers a search
 */

import { NextRequest, NextResponse } from "next/server";
import { initializeDatabase } from "@/src/lib/db/index";
import { getGuideServices } from "@/src/lib/services";
import { AiGuideRefSchema, parseSourcesParam } from "@/src/lib/pipeline/request";
import { errorResponse } from "@/src/lib/http";

export async function GET(request: NextRequest) {
  try {
    const params = request.nextUrl.searchParams;
    const { appId, achievementId } = AiGuideRefSchema.parse({
      appId: params.get("appId"),
      achievementId: params.get("achievementId"),
    });
    const sources = parseSourcesParam(params.get("sources"));

    await initializeDatabase();
    const cached = getGuideServices().aggregator.peekCached({
      appId,
      achievementId,
      sources,
      gameName: "",
      achievementName: "",
      achievementDescription: "",
    });

    if (!cached) {
      return NextResponse.json({ success: true, candidates: [], fromCache: false });
    }
    return NextResponse.json({ success: true, ...cached });
  } catch (error) {
    return errorResponse(error, "Cached guide lookup");
  }
}
