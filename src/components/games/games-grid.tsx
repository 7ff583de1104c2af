'use client';

import Link from 'next/link';
import { Clock } from 'lucide-react';
import type { Game } from '@/src/lib/model';

interface GamesGridProps {
  games: Game[];
  filter: string;
}

function formatPlaytime(minutes: number): string {
  if (minutes < 60) return `${minutes} min`;
  return `${(minutes / 60).toFixed(1)} h`;
}

export default function GamesGrid({ games, filter }: GamesGridProps) {
  const needle = filter.trim().toLowerCase();
  const visible = needle ? games.filter((game) => game.name.toLowerCase().includes(needle)) : games;

  if (visible.length === 0) {
    return <div className="text-center py-12 text-muted">No games match.</div>;
  }

  return (
    <div className="grid grid-cols-1 sm:grid-cols-2 lg:grid-cols-3 gap-4">
      {visible.map((game) => (
        <Link
          key={game.appId}
          href={`/games/${game.appId}?name=${encodeURIComponent(game.name)}`}
          className="block border border-surface-border rounded-lg overflow-hidden hover:shadow-md transition-shadow"
        >
          {/* eslint-disable-next-line @next/next/no-img-element */}
          <img src={game.images.header} alt="" className="w-full aspect-[460/215] object-cover bg-gray-100" />
          <div className="p-3">
            <h3 className="font-semibold truncate">{game.name}</h3>
            <p className="text-sm text-muted flex items-center gap-1 mt-1">
              <Clock className="w-4 h-4" />
              {formatPlaytime(game.playtimeForever)}
            </p>
          </div>
        </Link>
      ))}
    </div>
  );
}
