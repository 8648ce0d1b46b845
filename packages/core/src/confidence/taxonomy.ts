/**
 * Editorial confidence taxonomy.
 *
 * Every article and statistic carries exactly one level. The order below is
 * the display order; it is used for sorting tie-breaks, never for filtering.
 */

export const CONFIDENCE_LEVELS = [
  'verified',
  'reported',
  'forecast',
  'estimated',
  'self-reported',
] as const;

export type ConfidenceLevel = typeof CONFIDENCE_LEVELS[number];

export const CONFIDENCE_LABELS: Record<ConfidenceLevel, string> = {
  'verified': 'Verified',
  'reported': 'Reported',
  'forecast': 'Forecast',
  'estimated': 'Estimated',
  'self-reported': 'Self-Reported',
};

export const CONFIDENCE_DEFINITIONS: Record<ConfidenceLevel, string> = {
  'verified': 'Confirmed against a primary source: company announcement, regulatory filing, public API or peer-reviewed paper.',
  'reported': 'Published by a credible outlet but not independently verified by our desk.',
  'forecast': 'Forward-looking projection by an analyst, company or research firm. Not a measurement.',
  'estimated': 'Industry estimate or figure aggregated from several sources; methodology may differ between them.',
  'self-reported': 'Claimed by the subject itself with no independent check. Treat as an upper bound.',
};

const RANK: Record<ConfidenceLevel, number> = {
  'verified': 0,
  'reported': 1,
  'forecast': 2,
  'estimated': 3,
  'self-reported': 4,
};

// Older feeds label primary-source facts CONFIRMED.
const ALIASES = new Map<string, ConfidenceLevel>([
  ['confirmed', 'verified'],
  ['self reported', 'self-reported'],
  ['selfreported', 'self-reported'],
]);

export function isConfidenceLevel(value: unknown): value is ConfidenceLevel {
  return typeof value === 'string' && CONFIDENCE_LEVELS.some(level => level === value);
}

/**
 * Accepts the canonical ids, the display labels in any case, and the legacy
 * aliases. Returns undefined for anything else.
 */
export function parseConfidenceLevel(value: string): ConfidenceLevel | undefined {
  const normalized = value.trim().toLowerCase();
  if (isConfidenceLevel(normalized)) return normalized;
  return ALIASES.get(normalized);
}

export function confidenceRank(level: ConfidenceLevel): number {
  return RANK[level];
}

export function compareConfidence(a: ConfidenceLevel, b: ConfidenceLevel): number {
  return RANK[a] - RANK[b];
}

export function confidenceLabel(level: ConfidenceLevel): string {
  return CONFIDENCE_LABELS[level];
}
