/**
 * Source adapter contract
 *
 * Adapters never throw: every failure is reported as an AdapterStatus
 * with an empty candidate list.
 */

import type { AdapterStatus, CandidateDraft, GuideQuery, SourceKind } from "../../model";
import type { AcquireResult } from "../../rate-limit";
import { GuideSourceError, errorMessage, type GuideErrorCode } from "../../errors";

export interface FetchOptions {
  maxResults: number;
  forceRegenerate: boolean;
  signal?: AbortSignal;
}

export interface AdapterResult {
  status: AdapterStatus;
  candidates: CandidateDraft[];
  error?: string;
  retryAfterMs?: number;
}

export interface SourceAdapter {
  readonly kind: SourceKind;
  fetch(query: GuideQuery, options: FetchOptions): Promise<AdapterResult>;
}

export type Clock = () => number;

const STATUS_BY_CODE: Record<GuideErrorCode, AdapterStatus> = {
  AdapterRateLimited: "rate_limited",
  AdapterTransportError: "transport_error",
  AdapterMalformedResponse: "malformed_response",
  AdapterTimeout: "timeout",
};

export function okResult(candidates: CandidateDraft[]): AdapterResult {
  return { status: candidates.length > 0 ? "ok" : "empty", candidates };
}

export function failedResult(status: AdapterStatus, error: string, retryAfterMs?: number): AdapterResult {
  return { status, candidates: [], error, retryAfterMs };
}

export function rateLimitedResult(kind: SourceKind, acquired: AcquireResult): AdapterResult {
  return failedResult("rate_limited", `${kind} rate limit reached`, acquired.retryAfterMs);
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

/**
 * Map anything an adapter caught to a status
 */
export function resultFromError(error: unknown): AdapterResult {
  if (error instanceof GuideSourceError) {
    return failedResult(STATUS_BY_CODE[error.code], error.message);
  }
  if (isAbortError(error)) {
    return failedResult("timeout", "Request aborted");
  }
  return failedResult("transport_error", errorMessage(error));
}

/**
 * Shared guard for adapters that fetch a single page
 */
export async function fetchPage(url: string, signal: AbortSignal | undefined, userAgent: string): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, { headers: { "User-Agent": userAgent }, signal });
  } catch (error) {
    if (isAbortError(error)) {
      throw new GuideSourceError("AdapterTimeout", `Request to ${new URL(url).hostname} aborted`, { cause: error });
    }
    throw new GuideSourceError("AdapterTransportError", `Request to ${new URL(url).hostname} failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (response.status === 429) {
    throw new GuideSourceError("AdapterRateLimited", `${new URL(url).hostname} throttled the request`);
  }
  return response;
}

export const SCRAPER_USER_AGENT = "Mozilla/5.0 (compatible; AchievementGuideHub/0.1)";
