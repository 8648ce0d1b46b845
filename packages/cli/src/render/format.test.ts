import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { getEditorialStandards, type ArticleSummary, type Statistic, type WireItem } from '@newsdesk/core';
import {
  formatArticle,
  formatArticleList,
  formatSignature,
  formatStandards,
  formatStatistics,
  formatWireFeed,
} from './format.js';

const article: ArticleSummary = {
  id: 'openclaw-stars',
  headline: 'OpenClaw crosses 100k GitHub stars',
  summary: 'The open agent framework keeps climbing.',
  section: 'infrastructure',
  tags: ['openclaw'],
  confidence: 'verified',
  sources: [{ label: 'GitHub', url: 'https://github.com/example/openclaw' }],
  publishedAt: '2026-02-03T12:00:00.000Z',
  author: 'Desk Staff',
};

beforeAll(() => {
  chalk.level = 0;
});

describe('formatArticle', () => {
  it('renders headline, metadata, summary and sources', () => {
    expect(formatArticle(article)).toBe([
      '# OpenClaw crosses 100k GitHub stars',
      'Section: infrastructure | Date: 2026-02-03',
      'By: Desk Staff',
      'Confidence: Verified',
      '',
      'The open agent framework keeps climbing.',
      '',
      'Sources:',
      '  - GitHub https://github.com/example/openclaw',
    ].join('\n'));
  });

  it('omits the byline and sources when absent', () => {
    const bare: ArticleSummary = { ...article, author: undefined, sources: [], confidence: 'self-reported' };
    expect(formatArticle(bare)).toBe([
      '# OpenClaw crosses 100k GitHub stars',
      'Section: infrastructure | Date: 2026-02-03',
      'Confidence: Self-Reported',
      '',
      'The open agent framework keeps climbing.',
    ].join('\n'));
  });
});

describe('formatArticleList', () => {
  it('numbers articles under a title', () => {
    const text = formatArticleList('Latest Articles', [article]);
    expect(text.startsWith('Latest Articles - 1 found\n\n---\n## [1] # OpenClaw crosses 100k GitHub stars\n')).toBe(true);
  });

  it('says so when there are no articles', () => {
    expect(formatArticleList('Search Results', [])).toBe('Search Results\nNo articles found.');
  });
});

describe('formatStatistics', () => {
  it('groups statistics by category in first-seen order', () => {
    const stats: Statistic[] = [
      {
        key: 'agent_funding_2026',
        label: 'Agent startup funding',
        category: 'Funding',
        value: '$2.1B',
        confidence: 'estimated',
        updatedAt: '2026-02-02T00:00:00.000Z',
        source: { label: 'Example Research', url: 'https://research.example.com/funding' },
      },
      {
        key: 'openclaw_github_stars',
        label: 'OpenClaw GitHub stars',
        value: 100412,
        unit: 'stars',
        confidence: 'verified',
        updatedAt: '2026-02-03T00:00:00.000Z',
        source: { label: 'GitHub API', url: 'https://api.github.com/repos/example/openclaw' },
      },
    ];
    expect(formatStatistics(stats)).toBe([
      '# Agent Economy Data Terminal',
      '',
      '## Funding',
      '  Agent startup funding: $2.1B [Estimated] (Source: Example Research, updated 2026-02-02)',
      '',
      '## General',
      '  OpenClaw GitHub stars: 100412 stars [Verified] (Source: GitHub API, updated 2026-02-03)',
    ].join('\n'));
  });
});

describe('formatWireFeed', () => {
  it('renders time, text, sources and category', () => {
    const items: WireItem[] = [
      {
        id: 'w1',
        timestamp: '2026-02-03T14:00:00.000Z',
        text: 'OpenClaw ships v2.0',
        sources: [{ label: 'GitHub', url: 'https://github.com/example/openclaw/releases' }],
      },
      {
        id: 'w2',
        timestamp: '2026-02-03T09:15:00.000Z',
        text: 'EU committee schedules agent hearing',
        sources: [],
        category: 'Regulations',
      },
    ];
    expect(formatWireFeed(items)).toBe([
      '# Wire Feed',
      '',
      '2026-02-03T14:00:00.000Z - OpenClaw ships v2.0',
      '  Source: GitHub | Category: General',
      '2026-02-03T09:15:00.000Z - EU committee schedules agent hearing',
      '  Source: Unattributed | Category: Regulations',
    ].join('\n'));
  });

  it('reports an empty feed', () => {
    expect(formatWireFeed([])).toBe('# Wire Feed\n\nNo new items.');
  });
});

describe('formatStandards', () => {
  it('lists rules, confidence levels and tiers', () => {
    const lines = formatStandards(getEditorialStandards()).split('\n');
    expect(lines.slice(0, 4)).toEqual([
      '# Editorial Standards',
      '',
      '## Verification Rules',
      '1. No unsourced numbers. Every statistic carries a citation.',
    ]);
    expect(lines).toContain('- Tier 1 (Automated): Public APIs, repository metrics, market and on-chain data. Checked daily.');
    expect(lines.filter(l => l.startsWith('- ') && !l.startsWith('- Tier'))).toHaveLength(5);
  });
});

describe('formatSignature', () => {
  it('names the key of a signed envelope', () => {
    expect(formatSignature({
      body: '{}',
      signature: 'c2ln',
      keyId: '0123456789abcdef',
      algorithm: 'ed25519',
      verification: 'signed',
    })).toBe('Signed (ed25519, key 0123456789abcdef)');
  });

  it('flags an unsigned envelope', () => {
    expect(formatSignature({
      body: '{}',
      signature: null,
      keyId: null,
      algorithm: 'ed25519',
      verification: 'unavailable',
    })).toBe('Unsigned: no signing key available');
  });
});
