/**
 * API route: POST /api/admin/cache/invalidate
 * Drop cached guide aggregations
 */

import { NextRequest, NextResponse } from "next/server";
import { z } from "zod";
import { logger } from "@/src/lib/logger";
import { initializeDatabase } from "@/src/lib/db/index";
import { requireAdminToken } from "@/src/lib/auth/guards";
import { getGuideServices } from "@/src/lib/services";
import { errorResponse, readJsonBody } from "@/src/lib/http";

const InvalidateSchema = z.object({
  scope: z.enum(["guides", "expired", "all"]).default("guides"),
  appId: z.number().int().positive().optional(),
  achievementId: z.string().trim().min(1).optional(),
});

/**
 * POST /api/admin/cache/invalidate
 * Body: { "scope": "guides" | "expired" | "all", "appId"?: number, "achievementId"?: string }
 */
export async function POST(req: NextRequest) {
  const unauthorized = requireAdminToken(req.headers.get("authorization"));
  if (unauthorized) return unauthorized;

  try {
    const { scope, appId, achievementId } = InvalidateSchema.parse(await readJsonBody(req));
    logger.info(`[CACHE] Invalidation request: scope=${scope}, appId=${appId ?? "*"}`);

    await initializeDatabase();
    const { aggregator, cache } = getGuideServices();

    let removed: number;
    if (scope === "guides") {
      removed = aggregator.invalidate(appId, achievementId);
    } else if (scope === "expired") {
      removed = cache.sweepExpired();
    } else {
      removed = cache.deletePrefix("");
    }

    return NextResponse.json({ success: true, scope, removed });
  } catch (error) {
    return errorResponse(error, "Cache invalidation");
  }
}
