'use client';

import { useEffect, useState } from 'react';
import { Loader2, LogOut, RefreshCw } from 'lucide-react';
import GamesGrid from '@/src/components/games/games-grid';
import type { Game } from '@/src/lib/model';

export const dynamic = 'force-dynamic';

interface GamesResponse {
  success: boolean;
  games?: Game[];
  fromCache?: boolean;
  error?: string;
}

export default function Dashboard() {
  const [games, setGames] = useState<Game[]>([]);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);
  const [filter, setFilter] = useState('');
  const [refreshKey, setRefreshKey] = useState(0);

  useEffect(() => {
    const fetchGames = async () => {
      setLoading(true);
      setError(null);
      try {
        const response = await fetch(`/api/games${refreshKey > 0 ? '?refresh=1' : ''}`);
        const data: GamesResponse = await response.json();
        if (!response.ok || !data.success) {
          throw new Error(data.error ?? `Failed to load games (${response.status})`);
        }
        setGames(data.games ?? []);
      } catch (err) {
        setError(err instanceof Error ? err.message : 'Unknown error');
      } finally {
        setLoading(false);
      }
    };

    void fetchGames();
  }, [refreshKey]);

  const handleLogout = async () => {
    try {
      await fetch('/api/auth/logout', { method: 'POST' });
      window.location.href = '/';
    } catch (err) {
      console.error('Logout error:', err);
    }
  };

  return (
    <div className="min-h-screen bg-white text-black">
      <header className="border-b border-surface-border sticky top-0 z-10 bg-surface">
        <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-4 flex items-center justify-between gap-4">
          <h1 className="text-2xl font-bold">Your Library</h1>
          <div className="flex items-center gap-3">
            <input
              value={filter}
              onChange={(e) => setFilter(e.target.value)}
              placeholder="Filter games"
              className="border border-surface-border rounded-md px-3 py-1.5 text-sm"
            />
            <button
              onClick={() => setRefreshKey((k) => k + 1)}
              className="p-1.5 rounded-md hover:bg-gray-100"
              title="Refresh from Steam"
            >
              <RefreshCw className="w-5 h-5" />
            </button>
            <button onClick={handleLogout} className="p-1.5 rounded-md hover:bg-gray-100" title="Sign out">
              <LogOut className="w-5 h-5" />
            </button>
          </div>
        </div>
      </header>

      <main className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-6">
        {loading ? (
          <div className="flex justify-center py-12 text-muted">
            <Loader2 className="w-6 h-6 animate-spin" />
          </div>
        ) : error ? (
          <div className="text-center py-12 text-red-600">{error}</div>
        ) : (
          <GamesGrid games={games} filter={filter} />
        )}
      </main>
    </div>
  );
}
