import { z } from 'zod';
import { SECTIONS, toArticleSummary } from '@newsdesk/core';
import type { ToolDefinition } from '../types.js';
import { defineQueryTool } from '../run.js';

const LimitParam = z.number().int().min(1).optional()
  .describe('Maximum number of articles to return (default 20, values above 100 are capped)');

const LatestArticlesParams = z.object({
  limit: LimitParam,
});

const SearchArticlesParams = z.object({
  query: z.string().min(1).describe('Search terms, matched case-insensitively against headlines, summaries and tags (e.g., "openclaw" or "agent payments")'),
  limit: LimitParam,
});

const SectionArticlesParams = z.object({
  section: z.string().min(1).describe(`Section name: ${SECTIONS.join(', ')}`),
  limit: LimitParam,
});

export const getLatestArticlesTool = defineQueryTool({
  name: 'get_latest_articles',
  description: 'Get the latest articles across all sections, newest first. Each article carries its headline, summary, section, tags, confidence level and sources.',
  parameters: LatestArticlesParams,
  run(args, { engine }) {
    const { snapshotVersion, data } = engine.getLatestArticles({ limit: args.limit });
    return { snapshotVersion, count: data.length, data: data.map(toArticleSummary) };
  },
});

export const searchArticlesTool = defineQueryTool({
  name: 'search_articles',
  description: 'Search articles by keyword. Articles matching more of the search terms rank first; ties go to the most recent.',
  parameters: SearchArticlesParams,
  run(args, { engine }) {
    const { snapshotVersion, data } = engine.searchArticles({ query: args.query, limit: args.limit });
    return { snapshotVersion, count: data.length, data: data.map(toArticleSummary) };
  },
});

export const getSectionArticlesTool = defineQueryTool({
  name: 'get_section_articles',
  description: `Get the latest articles from one section. Sections: ${SECTIONS.join(', ')}.`,
  parameters: SectionArticlesParams,
  run(args, { engine }) {
    const { snapshotVersion, data } = engine.getSectionArticles({ section: args.section, limit: args.limit });
    return { snapshotVersion, count: data.length, data: data.map(toArticleSummary) };
  },
});

export const articleTools: ToolDefinition[] = [
  getLatestArticlesTool,
  searchArticlesTool,
  getSectionArticlesTool,
];
