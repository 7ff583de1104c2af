/**
 * GET /api/health
 * Database and cache store liveness, plus whether AI generation is configured
 */

import { NextResponse } from "next/server";
import { pingDatabase } from "@/src/lib/db/index";
import { getCacheStore } from "@/src/lib/db/cache";
import { getConfig } from "@/src/config/env";
import { CacheUnavailableError, errorMessage } from "@/src/lib/errors";

function probeCache(): boolean {
  try {
    getCacheStore().get("health:probe");
    return true;
  } catch (error) {
    if (error instanceof CacheUnavailableError) {
      return false;
    }
    throw error;
  }
}

export async function GET() {
  try {
    const database = pingDatabase();
    const cache = database && probeCache();
    const ok = database && cache;

    return NextResponse.json(
      {
        status: ok ? "healthy" : "degraded",
        database,
        cache,
        generationConfigured: Boolean(getConfig().OPENROUTER_API_KEY),
        checkedAt: new Date().toISOString(),
      },
      { status: ok ? 200 : 503 }
    );
  } catch (error) {
    return NextResponse.json({ status: "unhealthy", error: errorMessage(error) }, { status: 500 });
  }
}
