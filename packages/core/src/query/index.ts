export {
  type QueryLimits,
  type LatestArticlesOptions,
  type SearchArticlesOptions,
  type SectionArticlesOptions,
  type WireFeedOptions,
  type SnapshotSource,
  type PinnedResult,
  DEFAULT_QUERY_LIMITS,
  QueryEngine,
  resolveLimit,
  parseSection,
  tokenizeQuery,
  countMatchingTokens,
  toArticleSummary,
  getLatestArticles,
  searchArticles,
  getSectionArticles,
  getAgentEconomyStats,
  getWireFeed,
} from './engine.js';

export {
  type EditorialStandards,
  type ConfidenceDefinition,
  type VerificationTier,
  getEditorialStandards,
} from './standards.js';
