import { describe, it, expect } from 'vitest';
import {
  CONFIDENCE_LEVELS,
  CONFIDENCE_DEFINITIONS,
  isConfidenceLevel,
  parseConfidenceLevel,
  compareConfidence,
  confidenceLabel,
  confidenceRank,
} from './taxonomy.js';

describe('confidence taxonomy', () => {
  it('lists levels in display order', () => {
    expect(CONFIDENCE_LEVELS).toEqual(['verified', 'reported', 'forecast', 'estimated', 'self-reported']);
  });

  it('defines every level', () => {
    for (const level of CONFIDENCE_LEVELS) {
      expect(CONFIDENCE_DEFINITIONS[level].length).toBeGreaterThan(0);
    }
  });

  it('ranks levels by position', () => {
    expect(confidenceRank('verified')).toBe(0);
    expect(confidenceRank('self-reported')).toBe(4);
    expect(compareConfidence('reported', 'estimated')).toBeLessThan(0);
    expect(compareConfidence('forecast', 'forecast')).toBe(0);
  });

  it('sorts a mixed list into taxonomy order', () => {
    const sorted = (['estimated', 'verified', 'self-reported', 'reported'] as const)
      .slice()
      .sort(compareConfidence);
    expect(sorted).toEqual(['verified', 'reported', 'estimated', 'self-reported']);
  });

  it('uses display labels', () => {
    expect(confidenceLabel('self-reported')).toBe('Self-Reported');
    expect(confidenceLabel('verified')).toBe('Verified');
  });

  describe('isConfidenceLevel', () => {
    it('accepts canonical ids only', () => {
      expect(isConfidenceLevel('reported')).toBe(true);
      expect(isConfidenceLevel('Reported')).toBe(false);
      expect(isConfidenceLevel('rumour')).toBe(false);
      expect(isConfidenceLevel(3)).toBe(false);
    });
  });

  describe('parseConfidenceLevel', () => {
    it('accepts display labels in any case', () => {
      expect(parseConfidenceLevel('Self-Reported')).toBe('self-reported');
      expect(parseConfidenceLevel('  FORECAST ')).toBe('forecast');
    });

    it('maps legacy CONFIRMED to verified', () => {
      expect(parseConfidenceLevel('CONFIRMED')).toBe('verified');
    });

    it('returns undefined for unknown labels', () => {
      expect(parseConfidenceLevel('probably')).toBeUndefined();
    });

    it.each(['__proto__', 'constructor', 'toString', 'hasOwnProperty'])('does not resolve %s through the object prototype', (label) => {
      expect(parseConfidenceLevel(label)).toBeUndefined();
    });
  });
});
