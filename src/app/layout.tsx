import './globals.css';
import Link from 'next/link';
import type { Metadata } from 'next';
import { env } from '@/config/env';
import { parseProviderList } from '@/config/translation';

export const metadata: Metadata = {
  title: 'Subtitle Translator',
  description: 'Sentence-aware, resumable SRT translation jobs'
};

function providerChain(): string {
  try {
    return parseProviderList(env.subtitleProviders)
      .map((provider) => `${provider.kind}:${provider.model}`)
      .join(' → ');
  } catch (error) {
    return error instanceof Error ? error.message : 'invalid SUBTITLE_PROVIDERS';
  }
}

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en">
      <body>
        <header className="container app-header">
          <div className="card app-header-card">
            <strong>Subtitle Translator</strong>
            <span className="small app-provider-chain" title="SUBTITLE_PROVIDERS">
              {providerChain()}
            </span>
            <nav className="app-nav">
              <Link href="/dashboard/jobs">Jobs</Link>
            </nav>
          </div>
        </header>
        {children}
      </body>
    </html>
  );
}
