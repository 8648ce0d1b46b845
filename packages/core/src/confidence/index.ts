export {
  CONFIDENCE_LEVELS,
  CONFIDENCE_LABELS,
  CONFIDENCE_DEFINITIONS,
  type ConfidenceLevel,
  isConfidenceLevel,
  parseConfidenceLevel,
  confidenceRank,
  compareConfidence,
  confidenceLabel,
} from './taxonomy.js';
