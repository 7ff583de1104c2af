import type { Metadata } from 'next';
import './globals.css';

export const metadata: Metadata = {
  title: 'Achievement Guide Hub',
  description: 'Track your Steam achievements and find guides for the ones still locked',
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en">
      <body className="bg-white text-black antialiased">{children}</body>
    </html>
  );
}
