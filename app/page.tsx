import Link from 'next/link';
import { Trophy } from 'lucide-react';

export default async function Home({
  searchParams,
}: {
  searchParams: Promise<{ error?: string }>;
}) {
  const { error } = await searchParams;

  return (
    <div className="min-h-screen bg-white text-black flex items-center justify-center px-4">
      <div className="max-w-md text-center">
        <Trophy className="w-12 h-12 mx-auto mb-4" />
        <h1 className="text-3xl font-bold mb-2">Achievement Guide Hub</h1>
        <p className="text-muted mb-8">
          Sign in with Steam to see your locked achievements and find guides for them.
        </p>

        {error && (
          <p className="mb-6 rounded-md border border-red-200 bg-red-50 px-4 py-2 text-sm text-red-700">{error}</p>
        )}

        <div className="flex flex-col gap-3 items-center">
          {/* Route handler redirect, so a plain anchor rather than client navigation */}
          <a
            href="/api/auth/login"
            className="px-6 py-3 bg-black hover:bg-gray-800 rounded-md text-white font-medium"
          >
            Sign in through Steam
          </a>
          <Link href="/dashboard" className="text-sm text-muted hover:text-black">
            Already signed in? Go to your library
          </Link>
        </div>
      </div>
    </div>
  );
}
