/**
 * Normalization pipeline
 * Validates adapter drafts, canonicalizes URLs, deduplicates and classifies
 */

import type { CandidateDraft, GuideCandidate, SourceKind } from "../model";
import { HOST_PATTERNS, TRACKING_PARAMS } from "../../config/sources";
import { logger } from "../logger";

export const SNIPPET_MAX_LENGTH = 200;

function isTrackingParam(name: string): boolean {
  const lower = name.toLowerCase();
  return lower.startsWith("utm_") || TRACKING_PARAMS.has(lower);
}

/**
 * Canonical form used for deduplication, or null if the URL is not
 * an absolute http(s) URL
 */
export function canonicalizeUrl(raw: string): string | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return null;
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    return null;
  }
  if (!url.hostname) {
    return null;
  }

  // URL already lowercases scheme and host and drops default ports
  url.hash = "";

  const params = Array.from(url.searchParams.entries())
    .filter(([name]) => !isTrackingParam(name))
    .sort(([a, av], [b, bv]) => (a === b ? (av < bv ? -1 : av > bv ? 1 : 0) : a < b ? -1 : 1));
  url.search = params.length > 0 ? `?${new URLSearchParams(params).toString()}` : "";

  if (url.pathname.length > 1 && url.pathname.endsWith("/")) {
    url.pathname = url.pathname.replace(/\/+$/, "") || "/";
  }

  return url.toString();
}

/**
 * Source kind from the URL host; anything unrecognized is plain web search
 */
export function classifySourceKind(url: string): Exclude<SourceKind, "ai_generated"> {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return "web_search";
  }

  for (const { kind, pattern } of HOST_PATTERNS) {
    if (pattern.test(host)) {
      return kind;
    }
  }
  return "web_search";
}

/**
 * Collapse whitespace and cut at a word boundary
 */
export function sanitizeSnippet(text: string | undefined, maxLength: number = SNIPPET_MAX_LENGTH): string {
  if (!text) return "";

  const collapsed = text.replace(/\s+/g, " ").trim();
  if (collapsed.length <= maxLength) {
    return collapsed;
  }

  const cut = collapsed.slice(0, maxLength);
  const lastSpace = cut.lastIndexOf(" ");
  return `${lastSpace > 0 ? cut.slice(0, lastSpace) : cut}...`;
}

/**
 * Turn the concatenated adapter output into unscored candidates.
 * Drops untitled entries and link entries without a usable URL, keeps the
 * first candidate per canonical URL and at most one generated guide.
 */
export function normalizeCandidates(drafts: CandidateDraft[], fetchedAt: number): GuideCandidate[] {
  const seenUrls = new Set<string>();
  const candidates: GuideCandidate[] = [];
  let hasAiGuide = false;
  let dropped = 0;

  for (const draft of drafts) {
    const title = draft.title.replace(/\s+/g, " ").trim();
    if (!title) {
      dropped++;
      continue;
    }

    const snippet = sanitizeSnippet(draft.snippet) || undefined;

    if (draft.sourceKind === "ai_generated") {
      if (hasAiGuide) {
        dropped++;
        continue;
      }
      hasAiGuide = true;
      const url = draft.url ? canonicalizeUrl(draft.url) : null;
      candidates.push({
        sourceKind: "ai_generated",
        title,
        snippet,
        url: url ?? undefined,
        content: draft.content,
        qualityScore: 0,
        fetchedAt: draft.fetchedAt ?? fetchedAt,
      });
      continue;
    }

    const url = canonicalizeUrl(draft.url);
    if (!url || seenUrls.has(url)) {
      dropped++;
      continue;
    }
    seenUrls.add(url);

    candidates.push({
      sourceKind: draft.sourceKind ?? classifySourceKind(url),
      title,
      snippet,
      url,
      qualityScore: 0,
      fetchedAt: draft.fetchedAt ?? fetchedAt,
    });
  }

  if (dropped > 0) {
    logger.debug(`Normalizer dropped ${dropped} of ${drafts.length} drafts`);
  }

  return candidates;
}
