/**
 * Shared route-handler responses
 */

import { NextResponse, type NextRequest } from "next/server";
import { ZodError } from "zod";
import { CacheUnavailableError, InvalidRequestBodyError, SteamApiError, errorMessage } from "./errors";
import { logger } from "./logger";

/**
 * Parsed JSON body; a malformed body throws InvalidRequestBodyError
 */
export async function readJsonBody(request: NextRequest): Promise<unknown> {
  try {
    return await request.json();
  } catch (error) {
    throw new InvalidRequestBodyError({ cause: error });
  }
}

/**
 * Map an error to a JSON failure response.
 * Bad body or validation -> 400, Steam -> its status, cache store down -> 503, else 500.
 */
export function errorResponse(error: unknown, context: string): NextResponse {
  if (error instanceof ZodError) {
    return NextResponse.json(
      { success: false, error: "Invalid request", details: error.errors },
      { status: 400 }
    );
  }

  if (error instanceof InvalidRequestBodyError) {
    return NextResponse.json({ success: false, error: error.message }, { status: 400 });
  }

  logger.error(`${context} failed`, error);

  if (error instanceof SteamApiError) {
    return NextResponse.json({ success: false, error: error.message }, { status: error.status });
  }
  if (error instanceof CacheUnavailableError) {
    return NextResponse.json(
      { success: false, error: "Guide search temporarily unavailable", unavailable: true },
      { status: 503 }
    );
  }

  return NextResponse.json({ success: false, error: errorMessage(error) }, { status: 500 });
}
