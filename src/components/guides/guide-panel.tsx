'use client';

import { useEffect } from 'react';
import { AlertCircle, Loader2, RefreshCw, Search } from 'lucide-react';
import GuideCard from './guide-card';
import { useGuides, type GuideLookup } from '@/src/hooks/useGuides';

interface GuidePanelProps {
  lookup: GuideLookup;
}

export default function GuidePanel({ lookup }: GuidePanelProps) {
  const { state, load } = useGuides();

  useEffect(() => {
    void load(lookup);
  }, [lookup, load]);

  return (
    <section className="space-y-4">
      <div className="flex items-center justify-between">
        <h2 className="text-xl font-bold">{lookup.achievementName}</h2>
        <button
          onClick={() => void load(lookup, true)}
          disabled={state.status === 'loading'}
          className="flex items-center gap-1 text-sm text-muted hover:text-black disabled:opacity-50"
          title="Search again and write a new AI guide"
        >
          <RefreshCw className="w-4 h-4" />
          Regenerate
        </button>
      </div>

      {state.status === 'loading' && (
        <div className="flex items-center gap-2 text-muted py-8 justify-center">
          <Loader2 className="w-5 h-5 animate-spin" />
          Searching for guides...
        </div>
      )}

      {state.status === 'unavailable' && (
        <div className="flex items-start gap-2 rounded-md border border-amber-200 bg-amber-50 p-3 text-sm text-amber-800">
          <AlertCircle className="w-4 h-4 mt-0.5" />
          {state.message}
        </div>
      )}

      {state.status === 'empty' && (
        <div className="flex items-start gap-2 rounded-md border border-surface-border p-3 text-sm text-muted">
          <Search className="w-4 h-4 mt-0.5" />
          {state.quotaExceeded
            ? 'No guides found, and the daily AI guide quota is used up. Try again tomorrow.'
            : 'No guides found yet. Try regenerating to write one.'}
        </div>
      )}

      {state.status === 'ready' && (
        <>
          {state.quotaExceeded && (
            <p className="text-xs text-amber-700">AI guide quota reached for today; showing web results only.</p>
          )}
          <div className="space-y-3">
            {state.candidates.map((candidate) => (
              <GuideCard
                key={candidate.url ?? `ai-${lookup.achievementId}`}
                candidate={candidate}
                appId={lookup.appId}
                achievementId={lookup.achievementId}
              />
            ))}
          </div>
          <p className="text-xs text-muted">
            {state.fromCache ? 'Cached results' : 'Fresh results'} from{' '}
            {state.sources.filter((s) => s.count > 0).map((s) => s.kind).join(', ') || 'cache'}
          </p>
        </>
      )}
    </section>
  );
}
