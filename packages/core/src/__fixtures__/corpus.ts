import { CorpusSnapshot } from '../corpus/snapshot.js';
import { parseCorpusDocument } from '../corpus/loader.js';
import type { CorpusDocumentInput } from '../corpus/types.js';

/**
 * Small hand-written corpus shared by the core tests.
 *
 * Latest order: agent-payments, openclaw-stars (same instant, id breaks the
 * tie), eu-agent-act, moltbook-growth, regulators-weigh-in.
 */
export function sampleCorpus(): CorpusDocumentInput {
  return {
    articles: [
      {
        id: 'moltbook-growth',
        headline: 'Moltbook passes 1.5M registered agents',
        summary: 'The agent social network reports another record month.',
        section: 'platforms',
        tags: ['Moltbook', 'social'],
        confidence: 'Self-Reported',
        sources: [],
        publishedAt: '2026-02-01T09:00:00Z',
      },
      {
        id: 'openclaw-stars',
        headline: 'OpenClaw crosses 100k GitHub stars',
        summary: 'The open agent framework keeps climbing.',
        section: 'infrastructure',
        tags: ['OpenClaw', 'open source'],
        confidence: 'verified',
        sources: [{ label: 'GitHub', url: 'https://github.com/example/openclaw' }],
        publishedAt: '2026-02-03T12:00:00Z',
        author: 'Desk Staff',
      },
      {
        id: 'eu-agent-act',
        headline: 'EU drafts liability rules for autonomous agents',
        summary: 'Brussels circulates a draft on agent accountability.',
        section: 'regulations',
        tags: ['EU', 'liability'],
        confidence: 'reported',
        sources: [{ label: 'Example Wire', url: 'https://news.example.com/eu-agents' }],
        publishedAt: '2026-02-02T08:30:00Z',
      },
      {
        id: 'agent-payments',
        headline: 'Agent payments volume doubles',
        summary: 'Stablecoin rails carry most agent-to-agent commerce.',
        section: 'commerce',
        tags: ['payments', 'stablecoins'],
        confidence: 'estimated',
        sources: [{ label: 'Example Research', url: 'https://research.example.com/payments' }],
        publishedAt: '2026-02-03T12:00:00Z',
      },
      {
        id: 'regulators-weigh-in',
        headline: 'State regulators weigh agent licensing',
        summary: 'Two states propose registration for commercial agents.',
        body: 'Full text of the licensing story.',
        section: 'regulations',
        tags: ['licensing'],
        confidence: 'forecast',
        sources: [{ label: 'Example Gazette', url: 'https://gazette.example.com/licensing' }],
        publishedAt: '2026-01-28T10:00:00Z',
      },
    ],
    statistics: [
      {
        key: 'openclaw_github_stars',
        label: 'OpenClaw GitHub stars',
        category: 'Open Source',
        value: 100412,
        unit: 'stars',
        confidence: 'verified',
        updatedAt: '2026-02-03T00:00:00Z',
        source: { label: 'GitHub API', url: 'https://api.github.com/repos/example/openclaw' },
      },
      {
        key: 'moltbook_agent_count',
        label: 'Moltbook registered agents',
        category: 'Platforms',
        value: 1500000,
        unit: 'agents',
        confidence: 'self-reported',
        updatedAt: '2026-02-01T00:00:00Z',
        source: { label: 'Moltbook', url: 'https://moltbook.example.com/stats' },
      },
      {
        key: 'agent_funding_2026',
        label: 'Agent startup funding, 2026 YTD',
        category: 'Funding',
        value: '$2.1B',
        confidence: 'estimated',
        updatedAt: '2026-02-02T00:00:00Z',
        source: { label: 'Example Research', url: 'https://research.example.com/funding' },
      },
    ],
    wire: [
      {
        id: 'w-moltbook-outage',
        timestamp: '2026-02-02T18:00:00Z',
        text: 'Moltbook outage resolved after four hours',
        sources: [{ label: 'Moltbook status', url: 'https://status.moltbook.example.com' }],
        category: 'Platforms',
      },
      {
        id: 'w-openclaw-v2',
        timestamp: '2026-02-03T14:00:00Z',
        text: 'OpenClaw ships v2.0',
        sources: [{ label: 'GitHub', url: 'https://github.com/example/openclaw/releases' }],
      },
      {
        id: 'w-eu-hearing',
        timestamp: '2026-02-03T09:15:00Z',
        text: 'EU committee schedules agent hearing',
        sources: [{ label: 'Example Wire', url: 'https://news.example.com/eu-hearing' }],
        category: 'Regulations',
      },
    ],
  };
}

export function sampleSnapshot(version = 1): CorpusSnapshot {
  return new CorpusSnapshot(parseCorpusDocument(sampleCorpus()), version, '2026-02-04T00:00:00.000Z');
}
