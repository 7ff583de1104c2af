/**
 * GET /api/guides/status
 * Remaining budget per source and whether generation is configured
 */

import { NextResponse } from "next/server";
import { initializeDatabase } from "@/src/lib/db/index";
import { getGuideServices } from "@/src/lib/services";
import { getConfig } from "@/src/config/env";
import { errorResponse } from "@/src/lib/http";

export async function GET() {
  try {
    await initializeDatabase();
    const { aggregator, limiters } = getGuideServices();
    const now = Date.now();

    return NextResponse.json({
      success: true,
      generationConfigured: Boolean(getConfig().OPENROUTER_API_KEY),
      enabledSources: aggregator.enabledSources,
      defaultSources: getConfig().GUIDE_SOURCES,
      limits: aggregator.enabledSources.map((kind) => ({ kind, ...limiters[kind].status(now) })),
    });
  } catch (error) {
    return errorResponse(error, "Guide status");
  }
}
