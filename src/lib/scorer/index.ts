/**
 * Scorer module - turns a raw match score into a 0-100 confidence
 */

import {
  UNKNOWN_CONCEPT,
  type ColumnProfile,
  type ConceptMatch,
  type IdentifierEligibility,
} from "../../types/data-model.js";
import { round1 } from "../../utils/rounding.js";

export const CONFIDENCE_BONUSES = {
  noNulls: 5,
  uniquenessAbove995: 8,
  uniquenessAbove99: 5,
  fixedLength: 5,
  nearFixedLength: 3,
  digitsOnly: 3,
  eligibleIdentifier: 10,
} as const;

/** Eligible columns scoring below this are damped */
export const BORDERLINE_CONFIDENCE = 60;
export const BORDERLINE_DAMPING = 0.8;

export function clampConfidence(value: number): number {
  return Math.min(100, Math.max(0, value));
}

/**
 * Sum of profile-driven bonuses added on top of the match score
 */
export function confidenceBonus(
  match: ConceptMatch,
  profile: ColumnProfile,
  eligibility: IdentifierEligibility,
): number {
  const { patterns } = profile;
  const isIdentifierConcept = match.definition?.isIdentifier ?? false;
  let bonus = 0;

  if (profile.nullPercentage === 0) bonus += CONFIDENCE_BONUSES.noNulls;

  if (profile.uniquenessPercentage > 99.5) {
    bonus += CONFIDENCE_BONUSES.uniquenessAbove995;
  } else if (profile.uniquenessPercentage > 99) {
    bonus += CONFIDENCE_BONUSES.uniquenessAbove99;
  }

  if (patterns.fixedLength) {
    bonus += CONFIDENCE_BONUSES.fixedLength;
  } else if (patterns.nearFixedLength) {
    bonus += CONFIDENCE_BONUSES.nearFixedLength;
  }

  if (
    patterns.onlyDigits &&
    (profile.dataType === "numeric" || profile.dataType === "alphanumeric")
  ) {
    bonus += CONFIDENCE_BONUSES.digitsOnly;
  }

  if (eligibility.isEligible && isIdentifierConcept) {
    bonus += CONFIDENCE_BONUSES.eligibleIdentifier;
  }

  return bonus;
}

/**
 * Final confidence of a match, in [0, 100] with one decimal
 */
export function scoreConfidence(
  match: ConceptMatch,
  profile: ColumnProfile,
  eligibility: IdentifierEligibility,
): number {
  if (match.conceptKey === UNKNOWN_CONCEPT || !match.definition) {
    return 0;
  }

  if (
    match.definition.isIdentifier &&
    (eligibility.isContact || eligibility.isDescriptive)
  ) {
    return 0;
  }

  let confidence = match.matchScore + confidenceBonus(match, profile, eligibility);

  if (confidence < BORDERLINE_CONFIDENCE && eligibility.isEligible) {
    confidence *= BORDERLINE_DAMPING;
  }

  return round1(clampConfidence(confidence));
}
