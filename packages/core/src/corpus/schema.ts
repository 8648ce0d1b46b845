import { z } from 'zod';
import { parseConfidenceLevel, type ConfidenceLevel } from '../confidence/taxonomy.js';

export const SECTIONS = [
  'platforms',
  'commerce',
  'infrastructure',
  'regulations',
  'labor',
  'opinion',
] as const;

export const SectionSchema = z.enum(SECTIONS);

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(Z|[+-]\d{2}:\d{2})?)?$/;

/**
 * Parses an ISO-8601 date or date-time into `toISOString()` form. A date-time
 * without an offset is read as UTC, never as host-local time. Returns
 * undefined for anything else.
 */
export function normalizeTimestamp(value: string): string | undefined {
  const text = value.trim();
  const match = ISO_TIMESTAMP.exec(text);
  if (!match) return undefined;
  const missingOffset = text.includes('T') && match[1] === undefined;
  const ms = Date.parse(missingOffset ? `${text}Z` : text);
  return Number.isNaN(ms) ? undefined : new Date(ms).toISOString();
}

/**
 * ISO-8601 timestamps, normalized so that lexical order of stored timestamps
 * is chronological order.
 */
export const TimestampSchema = z.string().transform((value, ctx) => {
  const normalized = normalizeTimestamp(value);
  if (normalized === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid timestamp: "${value}"`,
    });
    return z.NEVER;
  }
  return normalized;
});

export const ConfidenceSchema = z.string().transform((value, ctx): ConfidenceLevel => {
  const level = parseConfidenceLevel(value);
  if (!level) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unknown confidence level: "${value}"`,
    });
    return z.NEVER;
  }
  return level;
});

export const SourceAttributionSchema = z.object({
  label: z.string().min(1),
  url: z.string().url(),
}).strict();

export const ArticleSchema = z.object({
  id: z.string().min(1),
  headline: z.string().min(1),
  summary: z.string(),
  body: z.string().optional(),
  section: SectionSchema,
  tags: z.array(z.string().min(1)).default([]),
  confidence: ConfidenceSchema,
  sources: z.array(SourceAttributionSchema).default([]),
  publishedAt: TimestampSchema,
  author: z.string().optional(),
}).strict().superRefine((article, ctx) => {
  if (article.sources.length === 0 && article.confidence !== 'self-reported') {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Article "${article.id}" needs at least one source unless it is self-reported`,
      path: ['sources'],
    });
  }
});

export const StatisticSchema = z.object({
  key: z.string().regex(/^[a-z0-9][a-z0-9_.-]*$/, 'Statistic keys are lowercase snake_case'),
  label: z.string().min(1),
  category: z.string().optional(),
  value: z.union([z.number().finite(), z.string().min(1)]),
  unit: z.string().optional(),
  confidence: ConfidenceSchema,
  updatedAt: TimestampSchema,
  source: SourceAttributionSchema,
}).strict();

export const WireItemSchema = z.object({
  id: z.string().min(1),
  timestamp: TimestampSchema,
  text: z.string().min(1),
  sources: z.array(SourceAttributionSchema).default([]),
  category: z.string().optional(),
}).strict();

function requireUnique<T>(
  items: T[],
  keyOf: (item: T) => string,
  field: string,
  label: string,
  ctx: z.RefinementCtx,
): void {
  const seen = new Set<string>();
  items.forEach((item, index) => {
    const key = keyOf(item);
    if (seen.has(key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate ${label} "${key}"`,
        path: [field, index],
      });
    }
    seen.add(key);
  });
}

export const CorpusDocumentSchema = z.object({
  articles: z.array(ArticleSchema).default([]),
  statistics: z.array(StatisticSchema).default([]),
  wire: z.array(WireItemSchema).default([]),
}).strict().superRefine((doc, ctx) => {
  requireUnique(doc.articles, a => a.id, 'articles', 'article id', ctx);
  requireUnique(doc.statistics, s => s.key, 'statistics', 'statistic key', ctx);
  requireUnique(doc.wire, w => w.id, 'wire', 'wire item id', ctx);
});
