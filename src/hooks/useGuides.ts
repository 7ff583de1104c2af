'use client';

import { useCallback, useState } from 'react';
import type { GuideCandidate, SourceReport } from '@/src/lib/model';

export interface GuideLookup {
  appId: number;
  achievementId: string;
  gameName: string;
  achievementName: string;
  achievementDescription: string;
  globalPercent?: number;
}

/**
 * "empty" means the lookup worked and found nothing; "unavailable" means
 * it could not run (quota, rate limit or server trouble)
 */
export type GuideState =
  | { status: 'idle' }
  | { status: 'loading' }
  | { status: 'ready'; candidates: GuideCandidate[]; fromCache: boolean; sources: SourceReport[]; quotaExceeded: boolean }
  | { status: 'empty'; quotaExceeded: boolean }
  | { status: 'unavailable'; message: string };

interface GuidesResponse {
  success: boolean;
  error?: string;
  candidates?: GuideCandidate[];
  fromCache?: boolean;
  sources?: SourceReport[];
  generationQuotaExceeded?: boolean;
}

export function useGuides() {
  const [state, setState] = useState<GuideState>({ status: 'idle' });

  const load = useCallback(async (lookup: GuideLookup, forceRegenerate = false) => {
    setState({ status: 'loading' });

    try {
      const response = await fetch('/api/guides', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ ...lookup, forceRegenerate }),
      });
      const data: GuidesResponse = await response.json();

      if (!response.ok || !data.success) {
        const message =
          response.status === 429
            ? 'Too many guide searches. Try again in a little while.'
            : data.error ?? 'Guide search is temporarily unavailable.';
        setState({ status: 'unavailable', message });
        return;
      }

      const candidates = data.candidates ?? [];
      const quotaExceeded = data.generationQuotaExceeded ?? false;
      if (candidates.length === 0) {
        setState({ status: 'empty', quotaExceeded });
        return;
      }

      setState({
        status: 'ready',
        candidates,
        fromCache: data.fromCache ?? false,
        sources: data.sources ?? [],
        quotaExceeded,
      });
    } catch (err) {
      console.error('Guide lookup failed:', err);
      setState({ status: 'unavailable', message: 'Guide search is temporarily unavailable.' });
    }
  }, []);

  const reset = useCallback(() => setState({ status: 'idle' }), []);

  return { state, load, reset };
}
