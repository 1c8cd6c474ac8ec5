import { describe, it, expect } from 'vitest';
import {
  scoreName,
  scoreType,
  scoreUniqueness,
  scoreLength,
  scoreCardinality,
  scoreNullability,
  scoreIdentifierConsistency,
  applyIdentifierGate,
  scoreConcept,
  rankConcepts,
  matchConcept,
  displayLabelFor,
  UNKNOWN_DISPLAY_LABEL,
} from '../../src/lib/matcher/index.js';
import { createConceptRegistry, getDefaultRegistry } from '../../src/lib/registry/index.js';
import { profileColumn } from '../../src/lib/profiler/index.js';
import { checkIdentifierEligibility } from '../../src/lib/eligibility/index.js';
import type { IdentifierEligibility } from '../../src/types/data-model.js';
import { makeArtifact, makeDefinition } from '../helpers/registry.js';
import { accountNumbers, emails, holderNames, nulls } from '../helpers/columns.js';

const registry = getDefaultRegistry();

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

describe('Concept Matcher', () => {
  describe('signals', () => {
    it('should score names by exact match, then containment', () => {
      expect(scoreName('account_number', ['account_number', 'acct_no'])).toBe(50);
      expect(scoreName('cust_account_number_x', ['account_number'])).toBe(40);
      expect(scoreName('acct', ['acct_no'])).toBe(40);
      expect(scoreName('balance', ['loan_amount'])).toBe(0);
    });

    it('should stop at the first pattern that matches', () => {
      expect(scoreName('name', ['customer_name', 'name'])).toBe(40);
      expect(scoreName('phone', ['phone_number', 'mobile_number', 'phone'])).toBe(40);
      expect(scoreName('dob', ['date_of_birth', 'dob'])).toBe(50);
    });

    it('should score types with numeric and decimal compatible', () => {
      expect(scoreType('numeric', ['numeric'])).toBe(20);
      expect(scoreType('decimal', ['numeric'])).toBe(15);
      expect(scoreType('text', ['numeric'])).toBe(0);
      expect(scoreType('numeric', ['text'])).toBe(0);
    });

    it.each([
      ['very_high', 99.7, 25],
      ['very_high', 99.2, 20],
      ['very_high', 98, 0],
      ['high', 95, 15],
      ['high', 94.9, 0],
      ['medium', 60, 0],
      ['medium', 96, 0],
      ['low', 49.9, 15],
      ['low', 50, 0],
      ['very_low', 19.99, 15],
      ['very_low', 20, 0],
    ] as const)('should score %s uniqueness at %d%% as %d', (cls, pct, points) => {
      expect(scoreUniqueness(cls, pct)).toBe(points);
    });

    it('should score exact length expectations', () => {
      const profile = profileColumn('code', Array.from({ length: 5 }, (_, i) => `ABCDE1234${i}`));
      expect(scoreLength({ exact: 10 }, profile)).toBe(15);
      expect(scoreLength({ exact: 12 }, profile)).toBe(10);
      expect(scoreLength({ exact: 13 }, profile)).toBe(0);
      expect(scoreLength(undefined, profile)).toBe(0);
    });

    it('should score length ranges on average, then full span', () => {
      const profile = profileColumn('label', ['abc def', 'abcd efgh']);
      expect(scoreLength({ min: 3, max: 100 }, profile)).toBe(15);
      expect(scoreLength({ min: 8, max: 20 }, profile)).toBe(10);
      expect(scoreLength({ min: 10, max: 20 }, profile)).toBe(0);
    });

    it('should not score length for columns without length facts', () => {
      const profile = profileColumn('account_number', accountNumbers());
      expect(scoreLength({ min: 10, max: 18 }, profile)).toBe(0);
    });

    it('should score cardinality within and near the maximum', () => {
      expect(scoreCardinality({ max: 10 }, 10)).toBe(10);
      expect(scoreCardinality({ max: 10 }, 15)).toBe(5);
      expect(scoreCardinality({ max: 10 }, 16)).toBe(0);
      expect(scoreCardinality(undefined, 1)).toBe(0);
    });

    it('should score nullability', () => {
      const complete = profileColumn('a', ['x', 'y']);
      const fewNulls = profileColumn('a', [...Array.from({ length: 49 }, () => 'x'), null]);
      const manyNulls = profileColumn('a', ['x', null]);

      expect(scoreNullability(true, manyNulls)).toBe(5);
      expect(scoreNullability(true, complete)).toBe(0);
      expect(scoreNullability(false, complete)).toBe(10);
      expect(scoreNullability(false, fewNulls)).toBe(3);
      expect(scoreNullability(false, manyNulls)).toBe(0);
    });

    it('should reward fixed-shape columns for identifier concepts only', () => {
      const profile = profileColumn('code', ['R001', 'R002']);
      expect(scoreIdentifierConsistency(makeDefinition({ isIdentifier: true }), profile)).toBe(5);
      expect(scoreIdentifierConsistency(makeDefinition(), profile)).toBe(0);
    });
  });

  describe('applyIdentifierGate', () => {
    const identifier = makeDefinition({ isIdentifier: true });

    it('should damp identifier concepts on ineligible columns', () => {
      expect(applyIdentifierGate(100, identifier, eligibility(), 0.3)).toBe(30);
    });

    it('should zero identifier concepts on contact or descriptive columns', () => {
      expect(applyIdentifierGate(100, identifier, eligibility({ isContact: true }), 0.3)).toBe(0);
      expect(applyIdentifierGate(100, identifier, eligibility({ isDescriptive: true }), 0.3)).toBe(0);
    });

    it('should leave eligible columns and other concepts alone', () => {
      expect(applyIdentifierGate(100, identifier, eligibility({ isEligible: true }), 0.3)).toBe(100);
      expect(applyIdentifierGate(100, makeDefinition(), eligibility({ isContact: true }), 0.3)).toBe(100);
    });
  });

  describe('matchConcept', () => {
    it('should match unique ten-digit numbers named account_number', () => {
      const profile = profileColumn('account_number', accountNumbers());
      const elig = checkIdentifierEligibility('account_number', profile);
      const match = matchConcept(profile, elig, registry);

      expect(match.conceptKey).toBe('account_number');
      expect(match.domain).toBe('Account');
      expect(match.displayLabel).toBe('Account - Account Number');
      expect(match.matchScore).toBe(105);
      expect(match.definition).toBe(registry.get('account_number'));
    });

    it('should keep raw scores unclamped and explain them', () => {
      const profile = profileColumn('account_number', accountNumbers());
      const elig = checkIdentifierEligibility('account_number', profile);
      const definition = registry.get('account_number');
      expect(definition).toBeDefined();
      if (!definition) return;

      expect(scoreConcept(definition, profile, elig)).toEqual({
        conceptKey: 'account_number',
        signals: {
          name: 50,
          type: 20,
          uniqueness: 25,
          length: 0,
          cardinality: 0,
          nullability: 10,
          identifierConsistency: 0,
        },
        rawScore: 105,
        score: 105,
      });
    });

    it('should match names to customer_name', () => {
      const profile = profileColumn('customer_name', holderNames());
      const elig = checkIdentifierEligibility('customer_name', profile);
      const match = matchConcept(profile, elig, registry);

      expect(match.conceptKey).toBe('customer_name');
      expect(match.matchScore).toBe(110);
    });

    it('should zero every identifier concept for a contact column', () => {
      const profile = profileColumn('email', emails());
      const elig = checkIdentifierEligibility('email', profile);
      const ranked = rankConcepts(profile, elig, registry);

      for (const entry of ranked) {
        if (registry.get(entry.conceptKey)?.isIdentifier) {
          expect(entry.score).toBe(0);
        }
      }
      expect(matchConcept(profile, elig, registry).conceptKey).toBe('email_address');
    });

    it('should score a short name by the first overlapping pattern', () => {
      const profile = profileColumn('email', emails());
      const elig = checkIdentifierEligibility('email', profile);
      const definition = registry.get('email_address');
      expect(definition).toBeDefined();
      if (!definition) return;

      expect(scoreConcept(definition, profile, elig).signals.name).toBe(40);
    });

    it('should return unknown for columns without present values', () => {
      const profile = profileColumn('account_type', nulls());
      const elig = checkIdentifierEligibility('account_type', profile);
      const match = matchConcept(profile, elig, registry);

      expect(match).toEqual({
        conceptKey: 'unknown',
        displayLabel: UNKNOWN_DISPLAY_LABEL,
        domain: 'General',
        matchScore: 0,
        definition: null,
      });
    });

    it('should return unknown below the minimum score', () => {
      const profile = profileColumn('account_number', accountNumbers());
      const elig = checkIdentifierEligibility('account_number', profile);
      expect(matchConcept(profile, elig, registry, { minMatchScore: 106 }).conceptKey).toBe('unknown');
      expect(matchConcept(profile, elig, registry, { minMatchScore: 105 }).conceptKey).toBe(
        'account_number',
      );
    });

    it('should keep registry order on ties', () => {
      const tied = createConceptRegistry(
        makeArtifact([
          makeDefinition({ conceptKey: 'first_code', namePatterns: ['ref_code'] }),
          makeDefinition({ conceptKey: 'second_code', namePatterns: ['ref_code'] }),
        ]),
      );
      const profile = profileColumn('ref_code', ['R001', 'R002']);
      const elig = checkIdentifierEligibility('ref_code', profile);

      expect(matchConcept(profile, elig, tied).conceptKey).toBe('first_code');
    });

    it('should apply a configurable eligibility penalty', () => {
      const identifiers = createConceptRegistry(
        makeArtifact([
          makeDefinition({ conceptKey: 'ref_code', namePatterns: ['ref_code'], isIdentifier: true }),
        ]),
      );
      // Half the values repeat: ineligible on uniqueness but not contact or descriptive
      const profile = profileColumn('ref_code', ['R001', 'R001', 'R002', 'R002']);
      const elig = checkIdentifierEligibility('ref_code', profile);
      expect(elig.isEligible).toBe(false);

      // name 50 + type 20 + nullability 10 + consistency 5 = 85
      expect(matchConcept(profile, elig, identifiers, { eligibilityPenalty: 0.5 }).matchScore).toBe(42.5);
      expect(matchConcept(profile, elig, identifiers).matchScore).toBe(25.5);
    });
  });

  it('should build display labels from domain and key', () => {
    const definition = registry.get('emi_amount');
    expect(definition && displayLabelFor(definition)).toBe('Loan - Emi Amount');
  });
});
