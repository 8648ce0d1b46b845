import {
  CONFIDENCE_LEVELS,
  CONFIDENCE_DEFINITIONS,
  CONFIDENCE_LABELS,
  type ConfidenceLevel,
} from '../confidence/taxonomy.js';

export interface ConfidenceDefinition {
  level: ConfidenceLevel;
  label: string;
  definition: string;
}

export interface VerificationTier {
  tier: number;
  name: string;
  description: string;
}

export interface EditorialStandards {
  confidenceLevels: ConfidenceDefinition[];
  verificationRules: string[];
  verificationTiers: VerificationTier[];
  correctionsPolicy: string;
  independence: string;
  integrity: {
    algorithm: 'ed25519';
    canonicalization: string;
    verification: string;
  };
}

const VERIFICATION_RULES = [
  'No unsourced numbers. Every statistic carries a citation.',
  'Self-reported figures are labeled Self-Reported.',
  'Disputed claims show both sides.',
  'Estimates are labeled Estimated; projections are labeled Forecast.',
  'No pay-for-play. Sponsored content is marked SPONSORED.',
  'When uncertain, we round down.',
  'Every article links its sources.',
];

const VERIFICATION_TIERS: VerificationTier[] = [
  { tier: 1, name: 'Automated', description: 'Public APIs, repository metrics, market and on-chain data. Checked daily.' },
  { tier: 2, name: 'Semi-automated', description: 'News monitoring and earnings calls. Checked weekly.' },
  { tier: 3, name: 'Editorial', description: 'Interviews, investigations and analysis. Verified before publication.' },
];

const STANDARDS: EditorialStandards = {
  confidenceLevels: CONFIDENCE_LEVELS.map(level => ({
    level,
    label: CONFIDENCE_LABELS[level],
    definition: CONFIDENCE_DEFINITIONS[level],
  })),
  verificationRules: VERIFICATION_RULES,
  verificationTiers: VERIFICATION_TIERS,
  correctionsPolicy: 'Errors are corrected publicly within 24 hours. Major corrections are noted inline on the original article.',
  independence: 'The desk is editorially independent and accepts no payment in exchange for coverage. Sponsored content is clearly labeled.',
  integrity: {
    algorithm: 'ed25519',
    canonicalization: 'JSON with object keys sorted by UTF-16 code unit, no insignificant whitespace, strings in Unicode NFC, encoded as UTF-8.',
    verification: 'Verify the signature over the UTF-8 bytes of `body` with the public key named by `keyId`.',
  },
};

/** The methodology document. Static: it does not depend on the corpus. */
export function getEditorialStandards(): EditorialStandards {
  return structuredClone(STANDARDS);
}
