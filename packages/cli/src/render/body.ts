import { z } from 'zod';
import {
  ArticleSchema,
  ConfidenceSchema,
  StatisticSchema,
  WireItemSchema,
} from '@newsdesk/core';
import {
  formatArticleList,
  formatStandards,
  formatStatistics,
  formatWireFeed,
} from './format.js';

const ToolBodySchema = z.object({
  tool: z.string(),
  snapshotVersion: z.number().int().nullable(),
  count: z.number().int().optional(),
  data: z.unknown(),
});

const EditorialStandardsSchema = z.object({
  confidenceLevels: z.array(z.object({
    level: ConfidenceSchema,
    label: z.string(),
    definition: z.string(),
  })),
  verificationRules: z.array(z.string()),
  verificationTiers: z.array(z.object({
    tier: z.number(),
    name: z.string(),
    description: z.string(),
  })),
  correctionsPolicy: z.string(),
  independence: z.string(),
  integrity: z.object({
    algorithm: z.literal('ed25519'),
    canonicalization: z.string(),
    verification: z.string(),
  }),
});

const ARTICLE_TITLES: Record<string, string> = {
  get_latest_articles: 'Latest Articles',
  search_articles: 'Search Results',
  get_section_articles: 'Section Articles',
};

/**
 * Renders a decoded tool body for a terminal. Bodies are re-validated
 * because they may come from a file or another server.
 */
export function renderToolBody(raw: unknown): string {
  const body = ToolBodySchema.parse(raw);
  const title = ARTICLE_TITLES[body.tool];
  if (title) {
    return formatArticleList(title, z.array(ArticleSchema).parse(body.data));
  }
  switch (body.tool) {
    case 'get_agent_economy_stats':
      return formatStatistics(z.array(StatisticSchema).parse(body.data));
    case 'get_wire_feed':
      return formatWireFeed(z.array(WireItemSchema).parse(body.data));
    case 'get_editorial_standards':
      return formatStandards(EditorialStandardsSchema.parse(body.data));
    default:
      return JSON.stringify(body.data, null, 2);
  }
}
