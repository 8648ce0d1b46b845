import { SECTIONS, normalizeTimestamp } from '../corpus/schema.js';
import { compareByLatest, normalizeText, type CorpusSnapshot, type SearchFields } from '../corpus/snapshot.js';
import type { Article, ArticleSummary, Section, Statistic, WireItem } from '../corpus/types.js';
import { InvalidArgumentError } from '../errors.js';
import { getEditorialStandards, type EditorialStandards } from './standards.js';

// ---------------------------------------------------------------------------
// Limits
// ---------------------------------------------------------------------------

export interface QueryLimits {
  /** Default page size for article queries. */
  defaultLimit: number;
  /** Default page size for the wire feed. */
  wireDefaultLimit: number;
  /** Larger requested limits are clamped to this. */
  maxLimit: number;
}

export const DEFAULT_QUERY_LIMITS: QueryLimits = {
  defaultLimit: 20,
  wireDefaultLimit: 50,
  maxLimit: 100,
};

/**
 * Limits must be positive integers. Anything above `max` is clamped rather
 * than rejected.
 */
export function resolveLimit(limit: number | undefined, fallback: number, max: number): number {
  if (limit === undefined) {
    return Math.min(fallback, max);
  }
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidArgumentError(`limit must be a positive integer, got ${limit}`, 'limit');
  }
  return Math.min(limit, max);
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

export function parseSection(value: string): Section {
  const normalized = value.trim().toLowerCase();
  const section = SECTIONS.find(s => s === normalized);
  if (!section) {
    throw new InvalidArgumentError(
      `Unknown section "${value}". Available sections: ${SECTIONS.join(', ')}`,
      'section',
    );
  }
  return section;
}

/** Lowercased, NFC-normalized, whitespace-separated, de-duplicated. */
export function tokenizeQuery(query: string): string[] {
  const tokens = normalizeText(query.trim()).split(/\s+/).filter(t => t.length > 0);
  return [...new Set(tokens)];
}

/** Number of distinct query tokens found as substrings in headline, summary or tags. */
export function countMatchingTokens(tokens: readonly string[], fields: SearchFields): number {
  let count = 0;
  for (const token of tokens) {
    if (
      fields.headline.includes(token)
      || fields.summary.includes(token)
      || fields.tags.some(tag => tag.includes(token))
    ) {
      count++;
    }
  }
  return count;
}

function parseSince(since: string): string {
  const normalized = normalizeTimestamp(since);
  if (normalized === undefined) {
    throw new InvalidArgumentError(`since must be an ISO-8601 timestamp, got "${since}"`, 'since');
  }
  return normalized;
}

export function toArticleSummary(article: Article): ArticleSummary {
  const { body: _body, ...summary } = article;
  return summary;
}

// ---------------------------------------------------------------------------
// Queries: pure functions of (snapshot, arguments)
// ---------------------------------------------------------------------------

export interface LatestArticlesOptions {
  limit?: number;
}

export interface SearchArticlesOptions {
  query: string;
  limit?: number;
}

export interface SectionArticlesOptions {
  section: string;
  limit?: number;
}

export interface WireFeedOptions {
  since?: string;
  limit?: number;
}

export function getLatestArticles(
  snapshot: CorpusSnapshot,
  options: LatestArticlesOptions = {},
  limits: QueryLimits = DEFAULT_QUERY_LIMITS,
): Article[] {
  const limit = resolveLimit(options.limit, limits.defaultLimit, limits.maxLimit);
  return snapshot.allArticles().slice(0, limit);
}

/**
 * An article matches when any query token occurs in its headline, summary or
 * tags. More matching tokens rank higher; ties go newest first, then by id.
 */
export function searchArticles(
  snapshot: CorpusSnapshot,
  options: SearchArticlesOptions,
  limits: QueryLimits = DEFAULT_QUERY_LIMITS,
): Article[] {
  const tokens = tokenizeQuery(options.query);
  if (tokens.length === 0) {
    throw new InvalidArgumentError('Search query must not be empty', 'query');
  }
  const limit = resolveLimit(options.limit, limits.defaultLimit, limits.maxLimit);

  const scores = new Map<string, number>();
  const matches = snapshot.articlesMatching((article, fields) => {
    const score = countMatchingTokens(tokens, fields);
    if (score > 0) scores.set(article.id, score);
    return score > 0;
  });

  matches.sort((a, b) => {
    const byScore = (scores.get(b.id) ?? 0) - (scores.get(a.id) ?? 0);
    return byScore !== 0 ? byScore : compareByLatest(a, b);
  });
  return matches.slice(0, limit);
}

export function getSectionArticles(
  snapshot: CorpusSnapshot,
  options: SectionArticlesOptions,
  limits: QueryLimits = DEFAULT_QUERY_LIMITS,
): Article[] {
  const section = parseSection(options.section);
  const limit = resolveLimit(options.limit, limits.defaultLimit, limits.maxLimit);
  return snapshot.articlesBySection(section).slice(0, limit);
}

/** Every statistic, ordered by key. */
export function getAgentEconomyStats(snapshot: CorpusSnapshot): Statistic[] {
  return [...snapshot.allStatistics().values()].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
}

export function getWireFeed(
  snapshot: CorpusSnapshot,
  options: WireFeedOptions = {},
  limits: QueryLimits = DEFAULT_QUERY_LIMITS,
): WireItem[] {
  const since = options.since !== undefined ? parseSince(options.since) : undefined;
  const limit = resolveLimit(options.limit, limits.wireDefaultLimit, limits.maxLimit);
  return snapshot.wireItems(since).slice(0, limit);
}

// ---------------------------------------------------------------------------
// QueryEngine: pins one snapshot per call
// ---------------------------------------------------------------------------

export interface SnapshotSource {
  snapshot(): CorpusSnapshot;
}

export interface PinnedResult<T> {
  /** Version of the snapshot the result was computed from. */
  snapshotVersion: number;
  data: T;
}

/**
 * Runs the queries against whatever snapshot the source holds at call time.
 * Each call reads the source exactly once, so a concurrent swap cannot mix
 * two corpus versions into one result.
 */
export class QueryEngine {
  readonly limits: QueryLimits;

  constructor(
    private readonly source: SnapshotSource,
    limits: Partial<QueryLimits> = {},
  ) {
    this.limits = { ...DEFAULT_QUERY_LIMITS, ...limits };
  }

  getLatestArticles(options: LatestArticlesOptions = {}): PinnedResult<Article[]> {
    return this.pinned(snapshot => getLatestArticles(snapshot, options, this.limits));
  }

  searchArticles(options: SearchArticlesOptions): PinnedResult<Article[]> {
    return this.pinned(snapshot => searchArticles(snapshot, options, this.limits));
  }

  getSectionArticles(options: SectionArticlesOptions): PinnedResult<Article[]> {
    return this.pinned(snapshot => getSectionArticles(snapshot, options, this.limits));
  }

  getAgentEconomyStats(): PinnedResult<Statistic[]> {
    return this.pinned(snapshot => getAgentEconomyStats(snapshot));
  }

  getWireFeed(options: WireFeedOptions = {}): PinnedResult<WireItem[]> {
    return this.pinned(snapshot => getWireFeed(snapshot, options, this.limits));
  }

  getEditorialStandards(): EditorialStandards {
    return getEditorialStandards();
  }

  private pinned<T>(run: (snapshot: CorpusSnapshot) => T): PinnedResult<T> {
    const snapshot = this.source.snapshot();
    return { snapshotVersion: snapshot.version, data: run(snapshot) };
  }
}
