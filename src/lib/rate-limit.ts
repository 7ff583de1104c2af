/**
 * Rate limiting and usage tracking utilities
 *
 * Two layers:
 * - RateLimiter: in-process per-source budgets (minute + day windows) that
 *   keep outbound calls to search, scraping and text generation in check
 * - enforceRateLimit: per-client hourly/daily limits on the guide endpoints,
 *   persisted in the usage_quota table
 */

import { NextRequest, NextResponse } from "next/server";
import type Database from "better-sqlite3";
import { logger } from "./logger";
import { getSqlite } from "./db/index";
import type { AppConfig } from "../config/env";
import type { SourceKind } from "./model";

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface RateLimitPolicy {
  perMinute: number;
  perDay: number;
}

export interface RateLimitState {
  windowStart: number;
  countInWindow: number;
  dailyCount: number;
  dailyWindowStart: number;
}

export type RateLimitWindow = "minute" | "day";

export interface AcquireResult {
  allowed: boolean;
  window?: RateLimitWindow;
  retryAfterMs: number;
}

export interface RateLimiterStatus {
  name: string;
  remainingMinute: number;
  remainingDay: number;
  minuteResetsInMs: number;
  dayResetsInMs: number;
}

/**
 * Fixed-window limiter. Check and increment happen in one synchronous
 * step, so concurrent callers on the event loop cannot both take the last slot.
 */
export class RateLimiter {
  private state: RateLimitState;

  constructor(
    readonly name: string,
    private readonly policy: RateLimitPolicy,
    now: number = Date.now()
  ) {
    this.state = { windowStart: now, countInWindow: 0, dailyCount: 0, dailyWindowStart: now };
  }

  private roll(now: number): void {
    if (now - this.state.windowStart >= MINUTE_MS) {
      this.state.windowStart = now;
      this.state.countInWindow = 0;
    }
    if (now - this.state.dailyWindowStart >= DAY_MS) {
      this.state.dailyWindowStart = now;
      this.state.dailyCount = 0;
    }
  }

  tryAcquire(now: number = Date.now()): AcquireResult {
    this.roll(now);

    if (this.state.dailyCount >= this.policy.perDay) {
      const retryAfterMs = this.state.dailyWindowStart + DAY_MS - now;
      logger.warn(`Rate limit reached: ${this.name} daily (${this.state.dailyCount}/${this.policy.perDay})`);
      return { allowed: false, window: "day", retryAfterMs };
    }

    if (this.state.countInWindow >= this.policy.perMinute) {
      const retryAfterMs = this.state.windowStart + MINUTE_MS - now;
      logger.debug(`Rate limit reached: ${this.name} per-minute (${this.state.countInWindow}/${this.policy.perMinute})`);
      return { allowed: false, window: "minute", retryAfterMs };
    }

    this.state.countInWindow += 1;
    this.state.dailyCount += 1;
    return { allowed: true, retryAfterMs: 0 };
  }

  status(now: number = Date.now()): RateLimiterStatus {
    this.roll(now);
    return {
      name: this.name,
      remainingMinute: Math.max(0, this.policy.perMinute - this.state.countInWindow),
      remainingDay: Math.max(0, this.policy.perDay - this.state.dailyCount),
      minuteResetsInMs: this.state.windowStart + MINUTE_MS - now,
      dayResetsInMs: this.state.dailyWindowStart + DAY_MS - now,
    };
  }

  snapshot(): RateLimitState {
    return { ...this.state };
  }
}

export type SourceRateLimiters = Record<SourceKind, RateLimiter>;

/**
 * One limiter per source kind. The ai_generated limiter is the
 * text-generation budget.
 */
export function createSourceRateLimiters(config: AppConfig, now: number = Date.now()): SourceRateLimiters {
  const scrape: RateLimitPolicy = {
    perMinute: config.SCRAPE_REQUESTS_PER_MINUTE,
    perDay: config.SCRAPE_REQUESTS_PER_DAY,
  };

  return {
    ai_generated: new RateLimiter(
      "generation",
      { perMinute: config.AI_REQUESTS_PER_MINUTE, perDay: config.AI_REQUESTS_PER_DAY },
      now
    ),
    web_search: new RateLimiter(
      "web_search",
      { perMinute: config.SEARCH_REQUESTS_PER_MINUTE, perDay: config.SEARCH_REQUESTS_PER_DAY },
      now
    ),
    community_forum: new RateLimiter("community_forum", scrape, now),
    wiki: new RateLimiter("wiki", scrape, now),
    video: new RateLimiter("video", scrape, now),
    discussion_board: new RateLimiter("discussion_board", scrape, now),
  };
}

// ---------------------------------------------------------------------------
// Per-client endpoint limits
// ---------------------------------------------------------------------------

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetAt: number; // Unix timestamp
  error?: string;
}

type QuotaWindow = "hour" | "day";

const RATE_LIMITS: Record<string, { hourly: number; daily: number }> = {
  "/api/guides": {
    hourly: 120,
    daily: 1000,
  },
  "/api/guides/ai/rate": {
    hourly: 30,
    daily: 200,
  },
};

/**
 * Get client IP address from request
 */
function getClientIP(request: NextRequest): string {
  const forwarded = request.headers.get("x-forwarded-for");
  if (forwarded) {
    return forwarded.split(",")[0].trim();
  }

  const realIP = request.headers.get("x-real-ip");
  if (realIP) {
    return realIP;
  }

  return "unknown";
}

function windowFor(window: QuotaWindow, nowMs: number): { key: string; resetAt: number } {
  const windowMs = window === "hour" ? 3600 * 1000 : DAY_MS;
  const windowStart = Math.floor(nowMs / windowMs) * windowMs;
  return { key: `${window}:${windowStart}`, resetAt: Math.floor((windowStart + windowMs) / 1000) };
}

function readUsage(db: Database.Database, key: string): number {
  const row = db.prepare("SELECT used FROM usage_quota WHERE key = ?").get(key);
  if (row && typeof row === "object" && "used" in row && typeof row.used === "number") {
    return row.used;
  }
  return 0;
}

/**
 * Check rate limit for an endpoint
 * Returns whether request is allowed and remaining quota
 */
export function checkRateLimit(
  request: NextRequest,
  endpoint: string,
  db: Database.Database = getSqlite(),
  nowMs: number = Date.now()
): RateLimitResult {
  const limits = RATE_LIMITS[endpoint];
  if (!limits) {
    return { allowed: true, remaining: Infinity, resetAt: Math.floor(nowMs / 1000) + 3600 };
  }

  const clientIP = getClientIP(request);
  const hour = windowFor("hour", nowMs);
  const day = windowFor("day", nowMs);
  const hourlyUsed = readUsage(db, `${endpoint}:${clientIP}:${hour.key}`);
  const dailyUsed = readUsage(db, `${endpoint}:${clientIP}:${day.key}`);

  if (hourlyUsed >= limits.hourly) {
    logger.warn(`Rate limit exceeded: ${endpoint} hourly limit (${hourlyUsed}/${limits.hourly})`, {
      endpoint,
      clientIP,
    });
    return {
      allowed: false,
      remaining: 0,
      resetAt: hour.resetAt,
      error: `Hourly limit exceeded. You've used ${hourlyUsed}/${limits.hourly} requests.`,
    };
  }

  if (dailyUsed >= limits.daily) {
    logger.warn(`Rate limit exceeded: ${endpoint} daily limit (${dailyUsed}/${limits.daily})`, {
      endpoint,
      clientIP,
    });
    return {
      allowed: false,
      remaining: 0,
      resetAt: day.resetAt,
      error: `Daily limit exceeded. You've used ${dailyUsed}/${limits.daily} requests.`,
    };
  }

  return {
    allowed: true,
    remaining: Math.min(limits.hourly - hourlyUsed, limits.daily - dailyUsed),
    resetAt: Math.min(hour.resetAt, day.resetAt),
  };
}

/**
 * Record usage after an accepted request
 */
export function recordUsage(
  request: NextRequest,
  endpoint: string,
  db: Database.Database = getSqlite(),
  nowMs: number = Date.now()
): void {
  const clientIP = getClientIP(request);
  const insert = db.prepare(
    `INSERT INTO usage_quota (key, endpoint, client_ip, window_type, used, reset_at, created_at)
     VALUES (?, ?, ?, ?, 1, ?, ?)
     ON CONFLICT(key) DO UPDATE SET used = used + 1`
  );

  const windows: QuotaWindow[] = ["hour", "day"];
  for (const window of windows) {
    const { key, resetAt } = windowFor(window, nowMs);
    insert.run(`${endpoint}:${clientIP}:${key}`, endpoint, clientIP, window, resetAt, Math.floor(nowMs / 1000));
  }
}

/**
 * Returns NextResponse with 429 if rate limited, null if allowed.
 * An allowed request is counted.
 */
export function enforceRateLimit(
  request: NextRequest,
  endpoint: string,
  db: Database.Database = getSqlite(),
  nowMs: number = Date.now()
): NextResponse | null {
  const result = checkRateLimit(request, endpoint, db, nowMs);

  if (!result.allowed) {
    return NextResponse.json(
      {
        success: false,
        error: result.error ?? "Rate limit exceeded",
        limitExceeded: true,
        resetAt: result.resetAt,
      },
      {
        status: 429,
        headers: {
          "X-RateLimit-Limit": String(RATE_LIMITS[endpoint]?.daily ?? 100),
          "X-RateLimit-Remaining": String(result.remaining),
          "X-RateLimit-Reset": String(result.resetAt),
          "Retry-After": String(Math.max(0, Math.ceil(result.resetAt - nowMs / 1000))),
        },
      }
    );
  }

  recordUsage(request, endpoint, db, nowMs);
  return null;
}
