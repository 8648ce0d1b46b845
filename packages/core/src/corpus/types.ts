import type { z } from 'zod';
import type { ConfidenceLevel } from '../confidence/taxonomy.js';
import type { CorpusDocumentSchema, SECTIONS } from './schema.js';

export type Section = typeof SECTIONS[number];

export interface SourceAttribution {
  readonly label: string;
  readonly url: string;
}

export interface Article {
  readonly id: string;
  readonly headline: string;
  readonly summary: string;
  readonly body?: string;
  readonly section: Section;
  readonly tags: readonly string[];
  readonly confidence: ConfidenceLevel;
  /** Ordered; empty only for self-reported pieces. */
  readonly sources: readonly SourceAttribution[];
  /** ISO-8601, UTC. */
  readonly publishedAt: string;
  readonly author?: string;
}

/** What the article tools return: everything but the body. */
export type ArticleSummary = Omit<Article, 'body'>;

export interface Statistic {
  readonly key: string;
  readonly label: string;
  readonly category?: string;
  readonly value: number | string;
  readonly unit?: string;
  readonly confidence: ConfidenceLevel;
  readonly updatedAt: string;
  readonly source: SourceAttribution;
}

export interface WireItem {
  readonly id: string;
  readonly timestamp: string;
  readonly text: string;
  readonly sources: readonly SourceAttribution[];
  readonly category?: string;
}

/** Raw document as accepted by the loader and the store (before validation). */
export type CorpusDocumentInput = z.input<typeof CorpusDocumentSchema>;

export interface CorpusData {
  articles: readonly Article[];
  statistics: readonly Statistic[];
  wire: readonly WireItem[];
}
