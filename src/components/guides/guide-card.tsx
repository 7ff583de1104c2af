'use client';

import { useState } from 'react';
import { ExternalLink, Sparkles, Star } from 'lucide-react';
import type { AiGuideCandidate, GuideCandidate } from '@/src/lib/model';
import { SOURCE_CONFIG } from '@/src/config/sources';

interface GuideCardProps {
  candidate: GuideCandidate;
  appId: number;
  achievementId: string;
}

function AiGuideBody({ candidate, appId, achievementId }: { candidate: AiGuideCandidate; appId: number; achievementId: string }) {
  const { content } = candidate;
  const [rated, setRated] = useState<number | null>(null);

  const rate = async (rating: number) => {
    try {
      const response = await fetch('/api/guides/ai/rate', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ appId, achievementId, rating }),
      });
      if (response.ok) setRated(rating);
    } catch (err) {
      console.error('Rating failed:', err);
    }
  };

  return (
    <div className="space-y-3 text-sm">
      <p>{content.summary}</p>
      <div className="flex gap-4 text-muted">
        <span>Difficulty: {content.difficulty}/10</span>
        <span>Time: {content.estimatedTime}</span>
      </div>

      {content.strategies.length > 0 && (
        <div>
          <h4 className="font-semibold mb-1">Strategies</h4>
          <ol className="list-decimal pl-5 space-y-1">
            {content.strategies.map((strategy, i) => (
              <li key={i}>{strategy}</li>
            ))}
          </ol>
        </div>
      )}

      {content.tips.length > 0 && (
        <div>
          <h4 className="font-semibold mb-1">Tips</h4>
          <ul className="list-disc pl-5 space-y-1">
            {content.tips.map((tip, i) => (
              <li key={i}>{tip}</li>
            ))}
          </ul>
        </div>
      )}

      <div className="flex items-center gap-1 text-muted">
        <span className="mr-1">{rated ? 'Thanks!' : 'Helpful?'}</span>
        {[1, 2, 3, 4, 5].map((value) => (
          <button key={value} onClick={() => rate(value)} aria-label={`Rate ${value}`} disabled={rated !== null}>
            <Star className={`w-4 h-4 ${rated !== null && value <= rated ? 'fill-yellow-400 text-yellow-400' : ''}`} />
          </button>
        ))}
      </div>
    </div>
  );
}

export default function GuideCard({ candidate, appId, achievementId }: GuideCardProps) {
  const label = SOURCE_CONFIG[candidate.sourceKind].label;

  return (
    <article className="border border-surface-border rounded-lg p-4">
      <div className="flex items-start justify-between gap-3 mb-2">
        {candidate.sourceKind === 'ai_generated' ? (
          <h3 className="font-semibold flex items-center gap-2">
            <Sparkles className="w-4 h-4" />
            {candidate.title}
          </h3>
        ) : (
          <a
            href={candidate.url}
            target="_blank"
            rel="noopener noreferrer"
            className="font-semibold hover:underline flex items-center gap-2"
          >
            {candidate.title}
            <ExternalLink className="w-4 h-4 flex-shrink-0" />
          </a>
        )}
        <span className="text-xs px-2 py-0.5 rounded bg-gray-100 text-muted whitespace-nowrap">{label}</span>
      </div>

      {candidate.sourceKind === 'ai_generated' ? (
        <AiGuideBody candidate={candidate} appId={appId} achievementId={achievementId} />
      ) : (
        candidate.snippet && <p className="text-sm text-muted">{candidate.snippet}</p>
      )}
    </article>
  );
}
