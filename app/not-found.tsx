import Link from 'next/link';
import { Trophy } from 'lucide-react';

export default function NotFound() {
  return (
    <div className="min-h-screen bg-white text-black flex items-center justify-center px-4">
      <div className="text-center">
        <Trophy className="w-10 h-10 mx-auto mb-4 text-muted" />
        <h1 className="text-2xl font-bold mb-2">Nothing here</h1>
        <p className="text-muted mb-8">That game or page doesn&apos;t exist.</p>
        <Link href="/dashboard" className="text-black underline hover:text-gray-700">
          Go to your library
        </Link>
      </div>
    </div>
  );
}
