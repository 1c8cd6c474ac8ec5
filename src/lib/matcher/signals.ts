/**
 * Weighted signals scored for every (column, concept) pair
 */

import type {
  ColumnProfile,
  ConceptDefinition,
  DataPatternExpectation,
  DataType,
  IdentifierEligibility,
  UniquenessClass,
} from "../../types/data-model.js";

export const SIGNAL_WEIGHTS = {
  nameExact: 50,
  nameContains: 40,
  typeExact: 20,
  typeCompatible: 15,
  uniquenessVeryHighTop: 25,
  uniquenessVeryHigh: 20,
  uniquenessHigh: 15,
  uniquenessLow: 15,
  uniquenessVeryLow: 15,
  lengthExact: 15,
  lengthNear: 10,
  lengthRangeAverage: 10,
  lengthRangeFull: 5,
  cardinalityWithin: 10,
  cardinalityNear: 5,
  nullableWithNulls: 5,
  mandatoryNoNulls: 10,
  mandatoryFewNulls: 3,
  identifierConsistency: 5,
} as const;

export type SignalName =
  | "name"
  | "type"
  | "uniqueness"
  | "length"
  | "cardinality"
  | "nullability"
  | "identifierConsistency";

export type SignalBreakdown = Record<SignalName, number>;

/**
 * Patterns are tried in order; the first one equal to or overlapping the name decides
 */
export function scoreName(
  normalizedName: string,
  namePatterns: readonly string[],
): number {
  for (const pattern of namePatterns) {
    if (pattern === normalizedName) return SIGNAL_WEIGHTS.nameExact;
    if (normalizedName.includes(pattern) || pattern.includes(normalizedName)) {
      return SIGNAL_WEIGHTS.nameContains;
    }
  }
  return 0;
}

function isNumericFamily(type: DataType): boolean {
  return type === "numeric" || type === "decimal";
}

export function scoreType(dataType: DataType, expected: readonly DataType[]): number {
  if (expected.includes(dataType)) return SIGNAL_WEIGHTS.typeExact;
  if (isNumericFamily(dataType) && expected.some(isNumericFamily)) {
    return SIGNAL_WEIGHTS.typeCompatible;
  }
  return 0;
}

export function scoreUniqueness(
  uniqueness: UniquenessClass,
  percentage: number,
): number {
  switch (uniqueness) {
    case "very_high":
      if (percentage >= 99.5) return SIGNAL_WEIGHTS.uniquenessVeryHighTop;
      if (percentage >= 99) return SIGNAL_WEIGHTS.uniquenessVeryHigh;
      return 0;
    case "high":
      return percentage >= 95 ? SIGNAL_WEIGHTS.uniquenessHigh : 0;
    case "medium":
      return 0;
    case "low":
      return percentage < 50 ? SIGNAL_WEIGHTS.uniquenessLow : 0;
    case "very_low":
      return percentage < 20 ? SIGNAL_WEIGHTS.uniquenessVeryLow : 0;
  }
}

export function scoreLength(
  expected: DataPatternExpectation["length"],
  profile: ColumnProfile,
): number {
  if (!expected) return 0;
  const { patterns } = profile;

  if ("exact" in expected) {
    if (patterns.fixedLength && patterns.fixedLengthValue === expected.exact) {
      return SIGNAL_WEIGHTS.lengthExact;
    }
    const observed = patterns.fixedLengthValue ?? patterns.typicalLength;
    if (observed !== undefined && Math.abs(observed - expected.exact) <= 2) {
      return SIGNAL_WEIGHTS.lengthNear;
    }
    return 0;
  }

  const { avgLength, minLength, maxLength } = patterns;
  if (avgLength === undefined || avgLength < expected.min || avgLength > expected.max) {
    return 0;
  }

  let score: number = SIGNAL_WEIGHTS.lengthRangeAverage;
  if (
    minLength !== undefined &&
    maxLength !== undefined &&
    minLength >= expected.min &&
    maxLength <= expected.max
  ) {
    score += SIGNAL_WEIGHTS.lengthRangeFull;
  }
  return score;
}

export function scoreCardinality(
  expected: DataPatternExpectation["cardinality"],
  distinctCount: number,
): number {
  if (!expected) return 0;
  if (distinctCount <= expected.max) return SIGNAL_WEIGHTS.cardinalityWithin;
  if (distinctCount <= expected.max * 1.5) return SIGNAL_WEIGHTS.cardinalityNear;
  return 0;
}

export function scoreNullability(nullable: boolean, profile: ColumnProfile): number {
  if (nullable) {
    return profile.nullCount > 0 ? SIGNAL_WEIGHTS.nullableWithNulls : 0;
  }
  if (profile.nullPercentage === 0) return SIGNAL_WEIGHTS.mandatoryNoNulls;
  if (profile.nullPercentage < 5) return SIGNAL_WEIGHTS.mandatoryFewNulls;
  return 0;
}

export function scoreIdentifierConsistency(
  definition: ConceptDefinition,
  profile: ColumnProfile,
): number {
  const shaped = Boolean(profile.patterns.fixedLength || profile.patterns.nearFixedLength);
  return shaped && definition.isIdentifier ? SIGNAL_WEIGHTS.identifierConsistency : 0;
}

/**
 * Score every signal of one definition, before the identifier gate
 */
export function scoreSignals(
  definition: ConceptDefinition,
  profile: ColumnProfile,
): SignalBreakdown {
  const expected = definition.dataPatterns;
  return {
    name: scoreName(profile.normalizedName, definition.namePatterns),
    type: scoreType(profile.dataType, expected.type),
    uniqueness: scoreUniqueness(expected.uniqueness, profile.uniquenessPercentage),
    length: scoreLength(expected.length, profile),
    cardinality: scoreCardinality(expected.cardinality, profile.uniqueCount),
    nullability: scoreNullability(expected.nullable, profile),
    identifierConsistency: scoreIdentifierConsistency(definition, profile),
  };
}

export function sumSignals(breakdown: SignalBreakdown): number {
  return Object.values(breakdown).reduce((total, points) => total + points, 0);
}

/**
 * Identifier gate: damp identifier concepts on ineligible columns,
 * and zero them outright on contact or descriptive columns
 */
export function applyIdentifierGate(
  rawScore: number,
  definition: ConceptDefinition,
  eligibility: IdentifierEligibility,
  penalty: number,
): number {
  if (!definition.isIdentifier || eligibility.isEligible) return rawScore;
  if (eligibility.isContact || eligibility.isDescriptive) return 0;
  return rawScore * penalty;
}
