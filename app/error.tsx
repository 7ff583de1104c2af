'use client';

import { useEffect } from 'react';
import { AlertTriangle } from 'lucide-react';

export default function Error({
  error,
  reset,
}: {
  error: Error & { digest?: string };
  reset: () => void;
}) {
  useEffect(() => {
    console.error('Page failed to render:', error);
  }, [error]);

  return (
    <div className="min-h-screen bg-white text-black flex items-center justify-center px-4">
      <div className="max-w-md text-center">
        <AlertTriangle className="w-10 h-10 mx-auto mb-4 text-amber-500" />
        <h1 className="text-2xl font-bold mb-2">Something went wrong</h1>
        <p className="text-muted mb-8">{error.message || 'The page could not be loaded.'}</p>
        <div className="flex justify-center gap-3">
          <button
            onClick={reset}
            className="px-4 py-2 bg-black hover:bg-gray-800 rounded-md text-white"
          >
            Try again
          </button>
          <a href="/dashboard" className="px-4 py-2 border border-surface-border rounded-md hover:bg-surface-muted">
            Back to library
          </a>
        </div>
      </div>
    </div>
  );
}
