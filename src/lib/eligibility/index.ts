/**
 * Eligibility module - decides whether a column may structurally act as a unique identifier
 */

import type {
  ColumnProfile,
  IdentifierEligibility,
} from "../../types/data-model.js";
import { normalizeColumnName } from "../../utils/column-names.js";

export const DESCRIPTIVE_KEYWORDS: readonly string[] = [
  "name",
  "city",
  "description",
  "remarks",
  "note",
  "comment",
  "address",
  "street",
];

export const CONTACT_KEYWORDS: readonly string[] = [
  "phone",
  "mobile",
  "email",
  "contact",
];

export const DEFAULT_UNIQUENESS_THRESHOLD = 95;

/**
 * Facts every eligibility check reads
 */
export interface EligibilityFacts {
  normalizedName: string;
  profile: ColumnProfile;
  isDescriptive: boolean;
  isContact: boolean;
  hasFixedLength: boolean;
  hasStrictPattern: boolean;
  uniquenessThreshold: number;
}

/**
 * One row of the eligibility table: the column passes when `passes` holds
 */
export interface EligibilityCheck {
  id: string;
  passes: (facts: EligibilityFacts) => boolean;
  reason: (facts: EligibilityFacts) => string;
}

export function containsKeyword(
  normalizedName: string,
  keywords: readonly string[],
): boolean {
  return keywords.some((keyword) => normalizedName.includes(keyword));
}

/**
 * Ordered checks; the first failure decides the reported reason
 */
export const ELIGIBILITY_CHECKS: readonly EligibilityCheck[] = [
  {
    id: "not-descriptive",
    passes: (f) => !f.isDescriptive,
    reason: () => "descriptive name",
  },
  {
    id: "not-contact",
    passes: (f) => !f.isContact,
    reason: () => "contact field, never primary key",
  },
  {
    id: "uniqueness",
    passes: (f) => f.profile.uniquenessPercentage >= f.uniquenessThreshold,
    reason: (f) =>
      `uniqueness ${f.profile.uniquenessPercentage}% below ${f.uniquenessThreshold}%`,
  },
  {
    id: "strict-shape",
    passes: (f) => f.hasFixedLength || f.hasStrictPattern,
    reason: () => "no fixed length or strict pattern",
  },
];

export const ELIGIBLE_REASON = "meets all identifier criteria";

/**
 * Check identifier eligibility of a profiled column
 *
 * @example
 * checkIdentifierEligibility("email", profile).reason
 * // "contact field, never primary key"
 */
export function checkIdentifierEligibility(
  columnName: string,
  profile: ColumnProfile,
  uniquenessThreshold: number = DEFAULT_UNIQUENESS_THRESHOLD,
): IdentifierEligibility {
  const normalizedName = normalizeColumnName(columnName);
  const { patterns } = profile;

  const facts: EligibilityFacts = {
    normalizedName,
    profile,
    isDescriptive: containsKeyword(normalizedName, DESCRIPTIVE_KEYWORDS),
    isContact: containsKeyword(normalizedName, CONTACT_KEYWORDS),
    hasFixedLength: Boolean(patterns.fixedLength || patterns.nearFixedLength),
    hasStrictPattern: Boolean(patterns.onlyDigits || patterns.alphanumeric),
    uniquenessThreshold,
  };

  const failed = ELIGIBILITY_CHECKS.find((check) => !check.passes(facts));

  return {
    isEligible: failed === undefined,
    reason: failed ? failed.reason(facts) : ELIGIBLE_REASON,
    uniquenessPct: profile.uniquenessPercentage,
    hasFixedLength: facts.hasFixedLength,
    hasStrictPattern: facts.hasStrictPattern,
    isDescriptive: facts.isDescriptive,
    isContact: facts.isContact,
  };
}
