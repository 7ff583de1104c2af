'use client';

import { Lock, Unlock } from 'lucide-react';
import type { Achievement } from '@/src/lib/model';

interface AchievementListProps {
  achievements: Achievement[];
  selected: string | null;
  onSelect: (achievement: Achievement) => void;
}

export default function AchievementList({ achievements, selected, onSelect }: AchievementListProps) {
  if (achievements.length === 0) {
    return <div className="text-center py-12 text-muted">This game has no achievements.</div>;
  }

  return (
    <ul className="divide-y divide-surface-border border border-surface-border rounded-lg">
      {achievements.map((achievement) => {
        const isSelected = achievement.apiName === selected;
        return (
          <li key={achievement.apiName}>
            <button
              onClick={() => onSelect(achievement)}
              className={`w-full flex items-center gap-3 p-3 text-left transition-colors ${
                isSelected ? 'bg-gray-100' : 'hover:bg-surface-muted'
              }`}
            >
              {achievement.icon ? (
                // eslint-disable-next-line @next/next/no-img-element
                <img
                  src={achievement.achieved ? achievement.icon : achievement.iconGray}
                  alt=""
                  className="w-10 h-10 rounded"
                />
              ) : (
                <div className="w-10 h-10 rounded bg-gray-100" />
              )}
              <div className="flex-1 min-w-0">
                <div className="font-medium truncate">{achievement.name}</div>
                <div className="text-sm text-muted truncate">
                  {achievement.description || (achievement.hidden ? 'Hidden achievement' : '')}
                </div>
              </div>
              <div className="text-right text-xs text-muted flex-shrink-0">
                {achievement.achieved ? (
                  <Unlock className="w-4 h-4 inline text-green-600" />
                ) : (
                  <Lock className="w-4 h-4 inline" />
                )}
                <div>{achievement.globalPercent.toFixed(1)}%</div>
              </div>
            </button>
          </li>
        );
      })}
    </ul>
  );
}
