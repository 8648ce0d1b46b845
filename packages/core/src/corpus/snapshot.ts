import { SECTIONS } from './schema.js';
import type { Article, CorpusData, Section, Statistic, WireItem } from './types.js';

/** Lowercased, NFC-normalized copies of the searchable article fields. */
export interface SearchFields {
  readonly headline: string;
  readonly summary: string;
  readonly tags: readonly string[];
}

export type ArticlePredicate = (article: Article, fields: SearchFields) => boolean;

export function normalizeText(text: string): string {
  return text.normalize('NFC').toLowerCase();
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Newest first; equal timestamps fall back to id ascending. */
export function compareByLatest(a: Article, b: Article): number {
  if (a.publishedAt !== b.publishedAt) {
    return a.publishedAt < b.publishedAt ? 1 : -1;
  }
  return compareIds(a.id, b.id);
}

export function compareWireItems(a: WireItem, b: WireItem): number {
  if (a.timestamp !== b.timestamp) {
    return a.timestamp < b.timestamp ? 1 : -1;
  }
  return compareIds(a.id, b.id);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * An immutable view of the corpus at one version.
 *
 * Built once from validated data and never mutated afterwards; the store
 * replaces whole snapshots instead. All reads are against the indexes built
 * in the constructor and never throw: no match is an empty array.
 */
export class CorpusSnapshot {
  readonly version: number;
  readonly createdAt: string;

  private readonly articlesById = new Map<string, Article>();
  private readonly latest: readonly Article[];
  private readonly sectionIndex = new Map<Section, readonly string[]>();
  private readonly searchIndex = new Map<string, SearchFields>();
  private readonly statistics = new Map<string, Statistic>();
  private readonly wire: readonly WireItem[];

  constructor(data: CorpusData, version: number, createdAt: string = new Date().toISOString()) {
    this.version = version;
    this.createdAt = createdAt;

    this.latest = deepFreeze(structuredClone([...data.articles]).sort(compareByLatest));

    const bySection = new Map<Section, string[]>(SECTIONS.map((s): [Section, string[]] => [s, []]));
    for (const article of this.latest) {
      this.articlesById.set(article.id, article);
      bySection.get(article.section)?.push(article.id);
      this.searchIndex.set(article.id, Object.freeze({
        headline: normalizeText(article.headline),
        summary: normalizeText(article.summary),
        tags: Object.freeze(article.tags.map(normalizeText)),
      }));
    }
    for (const [section, ids] of bySection) {
      this.sectionIndex.set(section, Object.freeze(ids));
    }

    for (const stat of deepFreeze(structuredClone([...data.statistics]))) {
      this.statistics.set(stat.key, stat);
    }

    this.wire = deepFreeze(structuredClone([...data.wire]).sort(compareWireItems));
  }

  get articleCount(): number {
    return this.latest.length;
  }

  get statisticCount(): number {
    return this.statistics.size;
  }

  get wireCount(): number {
    return this.wire.length;
  }

  /** Every article, newest first. */
  allArticles(): readonly Article[] {
    return this.latest;
  }

  getArticle(id: string): Article | undefined {
    return this.articlesById.get(id);
  }

  /** Articles of one section, newest first. */
  articlesBySection(section: Section): Article[] {
    const ids = this.sectionIndex.get(section) ?? [];
    const result: Article[] = [];
    for (const id of ids) {
      const article = this.articlesById.get(id);
      if (article) result.push(article);
    }
    return result;
  }

  /** Articles accepted by the predicate, newest first. */
  articlesMatching(predicate: ArticlePredicate): Article[] {
    return this.latest.filter(article => {
      const fields = this.searchIndex.get(article.id);
      return fields !== undefined && predicate(article, fields);
    });
  }

  searchFields(id: string): SearchFields | undefined {
    return this.searchIndex.get(id);
  }

  allStatistics(): ReadonlyMap<string, Statistic> {
    return this.statistics;
  }

  /**
   * Wire items newest first. With `since` (normalized ISO-8601), only items
   * strictly newer than it.
   */
  wireItems(since?: string): readonly WireItem[] {
    if (since === undefined) return this.wire;
    return this.wire.filter(item => item.timestamp > since);
  }

  /** Plain copy of the data, suitable for building the next snapshot. */
  toData(): CorpusData {
    return {
      articles: this.latest,
      statistics: [...this.statistics.values()],
      wire: this.wire,
    };
  }
}
