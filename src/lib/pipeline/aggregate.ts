/**
 * Guide aggregation
 *
 * CacheCheck -> (hit) return
 *            -> (miss) Fanout -> Normalize -> Rank -> CacheWrite -> return
 *
 * Fanout runs every enabled adapter concurrently under one deadline.
 * Adapters still running at the deadline count as timed out and whatever
 * they return afterwards is dropped. Identical lookups arriving while a
 * fanout is in flight share its result.
 */

import type {
  AdapterStatus,
  AggregationCacheEntry,
  AggregationResult,
  CandidateDraft,
  GuideQuery,
  SourceKind,
  SourceReport,
} from "../model";
import type { CacheStore } from "../db/cache";
import { SOURCE_KINDS, achievementKey } from "../model";
import {
  CACHE_TTL_SECONDS,
  DEFAULT_MAX_RESULTS,
  MAX_RESULTS_LIMIT,
  PER_SOURCE_MAX_RESULTS,
  SOURCE_CONFIG,
} from "../../config/sources";
import { normalizeCandidates } from "./normalize";
import { rankCandidates } from "./rank";
import { extractKeywords } from "./query";
import { resultFromError, type AdapterResult, type Clock, type SourceAdapter } from "./sources/types";
import { createLogger } from "../logger";

const log = createLogger("aggregate");

export interface GuideRequest extends GuideQuery {
  sources?: SourceKind[];
  maxResults?: number;
  forceRegenerate?: boolean;
}

export interface GuideAggregatorDeps {
  cache: CacheStore;
  adapters: SourceAdapter[];
  defaultSources: SourceKind[];
  deadlineMs: number;
  clock?: Clock;
}

interface Computed {
  entry: AggregationCacheEntry;
  generationQuotaExceeded: boolean;
}

const KEY_PREFIX = "guides:v1";

/**
 * Statuses that mean a source may have had more to offer
 */
const DEGRADED_STATUSES: ReadonlySet<AdapterStatus> = new Set([
  "rate_limited",
  "quota_exceeded",
  "timeout",
  "transport_error",
]);

/**
 * Stable key: kinds are deduplicated and sorted, achievement ids compared case-insensitively
 */
export function aggregationCacheKey(appId: number, achievementId: string, kinds: SourceKind[]): string {
  const sortedKinds = Array.from(new Set(kinds)).sort();
  return `${KEY_PREFIX}:${appId}:${achievementKey(achievementId)}:${sortedKinds.join(",")}`;
}

export function clampMaxResults(maxResults: number | undefined): number {
  if (maxResults === undefined || !Number.isFinite(maxResults)) {
    return DEFAULT_MAX_RESULTS;
  }
  return Math.max(1, Math.min(MAX_RESULTS_LIMIT, Math.floor(maxResults)));
}

function toResult(entry: AggregationCacheEntry, maxResults: number, fromCache: boolean, quotaExceeded: boolean): AggregationResult {
  return {
    candidates: entry.candidates.slice(0, maxResults),
    fromCache,
    computedAt: entry.computedAt,
    expiresAt: entry.expiresAt,
    sources: entry.sources,
    generationQuotaExceeded: quotaExceeded,
  };
}

export class GuideAggregator {
  private readonly adapters = new Map<SourceKind, SourceAdapter>();
  private readonly inflight = new Map<string, Promise<Computed>>();
  private readonly clock: Clock;

  constructor(private readonly deps: GuideAggregatorDeps) {
    for (const adapter of deps.adapters) {
      this.adapters.set(adapter.kind, adapter);
    }
    this.clock = deps.clock ?? Date.now;
  }

  get enabledSources(): SourceKind[] {
    return SOURCE_KINDS.filter((kind) => this.adapters.has(kind));
  }

  /**
   * Requested kinds that have an adapter, in priority order
   */
  resolveSources(requested?: SourceKind[]): SourceKind[] {
    const wanted = new Set(requested && requested.length > 0 ? requested : this.deps.defaultSources);
    return SOURCE_KINDS.filter((kind) => wanted.has(kind) && this.adapters.has(kind));
  }

  async aggregateGuides(request: GuideRequest): Promise<AggregationResult> {
    const kinds = this.resolveSources(request.sources);
    const maxResults = clampMaxResults(request.maxResults);
    const forceRegenerate = request.forceRegenerate ?? false;
    const key = aggregationCacheKey(request.appId, request.achievementId, kinds);

    if (!forceRegenerate) {
      const cached = this.deps.cache.get<AggregationCacheEntry>(key, this.clock());
      if (cached) {
        log.info(`Cache hit ${key}`, { candidates: cached.value.candidates.length });
        return toResult(cached.value, maxResults, true, false);
      }
      log.info(`Cache miss ${key}`);
    }

    const inflightKey = forceRegenerate ? `${key}#force` : key;
    let pending = this.inflight.get(inflightKey);
    if (pending) {
      log.debug(`Joining in-flight aggregation ${inflightKey}`);
    } else {
      pending = this.compute(key, kinds, request, forceRegenerate).finally(() => {
        this.inflight.delete(inflightKey);
      });
      this.inflight.set(inflightKey, pending);
    }

    const computed = await pending;
    return toResult(computed.entry, maxResults, false, computed.generationQuotaExceeded);
  }

  /**
   * Cached entry without triggering a fanout
   */
  peekCached(request: GuideRequest): AggregationResult | null {
    const kinds = this.resolveSources(request.sources);
    const key = aggregationCacheKey(request.appId, request.achievementId, kinds);
    const cached = this.deps.cache.get<AggregationCacheEntry>(key, this.clock());
    return cached ? toResult(cached.value, clampMaxResults(request.maxResults), true, false) : null;
  }

  /**
   * Drop aggregation entries for an app, or for one of its achievements
   */
  invalidate(appId?: number, achievementId?: string): number {
    let prefix = `${KEY_PREFIX}:`;
    if (appId !== undefined) {
      prefix += `${appId}:`;
      if (achievementId) {
        prefix += `${achievementKey(achievementId)}:`;
      }
    }
    return this.deps.cache.deletePrefix(prefix);
  }

  private async compute(
    key: string,
    kinds: SourceKind[],
    query: GuideQuery,
    forceRegenerate: boolean
  ): Promise<Computed> {
    const started = this.clock();
    const outcomes = await this.fanout(kinds, query, forceRegenerate);

    const drafts: CandidateDraft[] = outcomes.flatMap((outcome) => outcome.candidates);
    const sources = outcomes.map((outcome) => outcome.report);

    const now = this.clock();
    const candidates = rankCandidates(normalizeCandidates(drafts, now), extractKeywords(query), now).slice(
      0,
      MAX_RESULTS_LIMIT
    );

    const degraded = sources.some((report) => DEGRADED_STATUSES.has(report.status));
    const ttlSeconds = degraded ? CACHE_TTL_SECONDS.degradedAggregation : CACHE_TTL_SECONDS.guideAggregation;
    const entry: AggregationCacheEntry = {
      key,
      candidates,
      sources,
      computedAt: now,
      expiresAt: now + ttlSeconds * 1000,
    };

    // Empty results are not cached so the next lookup tries again
    if (candidates.length > 0) {
      this.deps.cache.set(key, entry, ttlSeconds, now);
    }

    log.info(`Aggregated ${candidates.length} guides for ${query.appId}/${query.achievementId}`, {
      sources: sources.map((s) => `${s.kind}:${s.status}:${s.count}`).join(" "),
      durationMs: now - started,
    });

    return {
      entry,
      generationQuotaExceeded: sources.some((report) => report.status === "quota_exceeded"),
    };
  }

  private async fanout(
    kinds: SourceKind[],
    query: GuideQuery,
    forceRegenerate: boolean
  ): Promise<Array<{ candidates: CandidateDraft[]; report: SourceReport }>> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.deps.deadlineMs);
    const deadline = new Promise<"deadline">((resolve) => {
      controller.signal.addEventListener("abort", () => resolve("deadline"), { once: true });
    });

    try {
      return await Promise.all(
        kinds.map(async (kind) => {
          const adapter = this.adapters.get(kind);
          const started = this.clock();

          const call: Promise<AdapterResult> = adapter
            ? adapter
                .fetch(query, { maxResults: PER_SOURCE_MAX_RESULTS, forceRegenerate, signal: controller.signal })
                .catch((error: unknown) => resultFromError(error))
            : Promise.resolve<AdapterResult>({ status: "empty", candidates: [] });

          const outcome = await Promise.race([call, deadline]);
          const result: AdapterResult =
            outcome === "deadline" ? { status: "timeout", candidates: [], error: "Deadline exceeded" } : outcome;

          const report: SourceReport = {
            kind,
            status: result.status,
            count: result.candidates.length,
            durationMs: this.clock() - started,
            error: result.error,
          };
          if (result.status !== "ok" && result.status !== "empty") {
            log.warn(`${SOURCE_CONFIG[kind].label} source ${result.status}`, { error: result.error });
          }

          return { candidates: result.candidates, report };
        })
      );
    } finally {
      clearTimeout(timer);
    }
  }
}
