import { describe, it, expect } from 'vitest';
import {
  scoreConfidence,
  confidenceBonus,
  clampConfidence,
} from '../../src/lib/scorer/index.js';
import { displayLabelFor, unknownMatch } from '../../src/lib/matcher/index.js';
import { getDefaultRegistry } from '../../src/lib/registry/index.js';
import { profileColumn } from '../../src/lib/profiler/index.js';
import { checkIdentifierEligibility } from '../../src/lib/eligibility/index.js';
import type {
  ConceptMatch,
  IdentifierEligibility,
} from '../../src/types/data-model.js';
import { accountNumbers } from '../helpers/columns.js';

const registry = getDefaultRegistry();

function matchFor(conceptKey: string, matchScore: number): ConceptMatch {
  const definition = registry.get(conceptKey);
  if (!definition) throw new Error(`missing concept ${conceptKey}`);
  return {
    conceptKey,
    displayLabel: displayLabelFor(definition),
    domain: definition.domain,
    matchScore,
    definition,
  };
}

function eligibility(overrides: Partial<IdentifierEligibility> = {}): IdentifierEligibility {
  return {
    isEligible: false,
    reason: 'test',
    uniquenessPct: 0,
    hasFixedLength: false,
    hasStrictPattern: false,
    isDescriptive: false,
    isContact: false,
    ...overrides,
  };
}

// 20% nulls, 80% uniqueness, ragged lengths, no digit pattern: earns no bonus
const plainProfile = profileColumn('misc', ['a b', 'cc dd ee', 'f', 'gggg hhhhhh iiii', null]);

describe('Confidence Scorer', () => {
  it('should clamp to [0, 100]', () => {
    expect(clampConfidence(131)).toBe(100);
    expect(clampConfidence(-3)).toBe(0);
    expect(clampConfidence(42)).toBe(42);
  });

  it('should give unknown exactly zero', () => {
    expect(scoreConfidence(unknownMatch(), plainProfile, eligibility({ isEligible: true }))).toBe(0);
  });

  it('should add every bonus for a unique digit-only identifier', () => {
    const profile = profileColumn('account_number', accountNumbers());
    const elig = checkIdentifierEligibility('account_number', profile);
    const match = matchFor('account_number', 105);

    // no nulls 5 + uniqueness 8 + digits 3 + eligible identifier 10
    expect(confidenceBonus(match, profile, elig)).toBe(26);
    expect(scoreConfidence(match, profile, elig)).toBe(100);
  });

  it('should give fixed length precedence over near-fixed length', () => {
    const fixed = profileColumn('code', ['AB12', 'AB12', 'CD34']);
    const near = profileColumn('code', ['abc', 'abc', 'abcd', 'abcde']);
    const match = matchFor('customer_name', 40);

    // no nulls 5 + fixed 5
    expect(confidenceBonus(match, fixed, eligibility())).toBe(10);
    // no nulls 5 + near-fixed 3
    expect(confidenceBonus(match, near, eligibility())).toBe(8);
  });

  it('should grant +5 for uniqueness above 99 but not above 99.5', () => {
    const values = [...Array.from({ length: 199 }, (_, i) => `v${i} x`), 'v0 x'];
    const profile = profileColumn('misc', values);
    expect(profile.uniquenessPercentage).toBe(99.5);
    // no nulls 5 + uniqueness 5 + near-fixed 3
    expect(confidenceBonus(matchFor('customer_name', 40), profile, eligibility())).toBe(13);
  });

  it('should force identifier concepts to zero on contact or descriptive columns', () => {
    const match = matchFor('customer_id', 90);
    expect(scoreConfidence(match, plainProfile, eligibility({ isContact: true }))).toBe(0);
    expect(scoreConfidence(match, plainProfile, eligibility({ isDescriptive: true }))).toBe(0);
  });

  it('should damp borderline confidence on eligible columns', () => {
    // 40 + eligible identifier 10 = 50, below 60 → × 0.8
    expect(
      scoreConfidence(matchFor('account_number', 40), plainProfile, eligibility({ isEligible: true })),
    ).toBe(40);
    expect(
      scoreConfidence(matchFor('customer_name', 40), plainProfile, eligibility({ isEligible: true })),
    ).toBe(32);
  });

  it('should not damp ineligible columns', () => {
    expect(scoreConfidence(matchFor('customer_name', 40), plainProfile, eligibility())).toBe(40);
  });

  it('should keep one decimal place', () => {
    expect(scoreConfidence(matchFor('customer_name', 31.56), plainProfile, eligibility())).toBe(31.6);
  });
});
