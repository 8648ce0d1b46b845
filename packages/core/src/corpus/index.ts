// Types
export {
  type Section,
  type SourceAttribution,
  type Article,
  type ArticleSummary,
  type Statistic,
  type WireItem,
  type CorpusData,
  type CorpusDocumentInput,
} from './types.js';

// Schemas
export {
  SECTIONS,
  SectionSchema,
  TimestampSchema,
  normalizeTimestamp,
  ConfidenceSchema,
  SourceAttributionSchema,
  ArticleSchema,
  StatisticSchema,
  WireItemSchema,
  CorpusDocumentSchema,
} from './schema.js';

// Snapshot
export {
  CorpusSnapshot,
  compareByLatest,
  compareWireItems,
  normalizeText,
  type SearchFields,
  type ArticlePredicate,
} from './snapshot.js';

// Store
export {
  CorpusStore,
  type CorpusStoreEvents,
  type SnapshotSwapEvent,
  type RefreshRejectedEvent,
} from './store.js';

// Loader
export { loadCorpusFile, parseCorpusDocument } from './loader.js';
