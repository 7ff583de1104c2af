/**
 * Error taxonomy for guide lookups and the Steam integration
 *
 * Only CacheUnavailableError is fatal to an aggregation. Everything a
 * source adapter raises is caught at the adapter boundary and reported
 * as an AdapterStatus instead.
 */

export type GuideErrorCode =
  | "AdapterRateLimited"
  | "AdapterTransportError"
  | "AdapterMalformedResponse"
  | "AdapterTimeout";

export class GuideSourceError extends Error {
  readonly code: GuideErrorCode;

  constructor(code: GuideErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GuideSourceError";
    this.code = code;
  }
}

export class CacheUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CacheUnavailableError";
  }
}

export class InvalidRequestBodyError extends Error {
  constructor(options?: { cause?: unknown }) {
    super("Request body is not valid JSON", options);
    this.name = "InvalidRequestBodyError";
  }
}

export class SteamApiError extends Error {
  readonly status: number;

  constructor(message: string, status = 502) {
    super(message);
    this.name = "SteamApiError";
    this.status = status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
