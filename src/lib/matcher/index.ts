/**
 * Matcher module - scores every registry concept against a profiled column and picks the best
 */

import {
  UNKNOWN_CONCEPT,
  type ColumnProfile,
  type ConceptDefinition,
  type ConceptMatch,
  type IdentifierEligibility,
} from "../../types/data-model.js";
import type { ConceptRegistry } from "../registry/index.js";
import {
  applyIdentifierGate,
  scoreSignals,
  sumSignals,
  type SignalBreakdown,
} from "./signals.js";
import { titleCase } from "../../utils/column-names.js";
import { logger } from "../../utils/logger.js";

export * from "./signals.js";

export interface MatcherOptions {
  /** Best score below which the column is unknown */
  minMatchScore: number;
  /** Multiplier for identifier concepts on ineligible columns */
  eligibilityPenalty: number;
}

export const DEFAULT_MATCHER_OPTIONS: MatcherOptions = {
  minMatchScore: 25,
  eligibilityPenalty: 0.3,
};

/**
 * Score of one concept for one column
 */
export interface ConceptScore {
  conceptKey: string;
  signals: SignalBreakdown;
  rawScore: number;
  /** Score after the identifier gate */
  score: number;
}

export const UNKNOWN_DISPLAY_LABEL = "Unknown Banking Concept";

export function displayLabelFor(definition: ConceptDefinition): string {
  return `${definition.domain} - ${titleCase(definition.conceptKey)}`;
}

export function unknownMatch(): ConceptMatch {
  return {
    conceptKey: UNKNOWN_CONCEPT,
    displayLabel: UNKNOWN_DISPLAY_LABEL,
    domain: "General",
    matchScore: 0,
    definition: null,
  };
}

export function scoreConcept(
  definition: ConceptDefinition,
  profile: ColumnProfile,
  eligibility: IdentifierEligibility,
  penalty: number = DEFAULT_MATCHER_OPTIONS.eligibilityPenalty,
): ConceptScore {
  const signals = scoreSignals(definition, profile);
  const rawScore = sumSignals(signals);
  return {
    conceptKey: definition.conceptKey,
    signals,
    rawScore,
    score: applyIdentifierGate(rawScore, definition, eligibility, penalty),
  };
}

/**
 * Scores of every registry concept, in registry order
 */
export function rankConcepts(
  profile: ColumnProfile,
  eligibility: IdentifierEligibility,
  registry: ConceptRegistry,
  penalty: number = DEFAULT_MATCHER_OPTIONS.eligibilityPenalty,
): ConceptScore[] {
  return registry.definitions.map((definition) =>
    scoreConcept(definition, profile, eligibility, penalty),
  );
}

/**
 * Pick the best concept for a column. Ties keep registry order;
 * a best score under `minMatchScore` yields "unknown" with score 0.
 * A column with no present values is always "unknown".
 */
export function matchConcept(
  profile: ColumnProfile,
  eligibility: IdentifierEligibility,
  registry: ConceptRegistry,
  options: Partial<MatcherOptions> = {},
): ConceptMatch {
  const opts: MatcherOptions = { ...DEFAULT_MATCHER_OPTIONS, ...options };

  if (profile.nonNullCount - profile.emptyCount === 0) {
    return unknownMatch();
  }

  let best: { definition: ConceptDefinition; score: number } | undefined;
  for (const definition of registry.definitions) {
    const { score } = scoreConcept(
      definition,
      profile,
      eligibility,
      opts.eligibilityPenalty,
    );
    if (!best || score > best.score) {
      best = { definition, score };
    }
  }

  if (!best || best.score < opts.minMatchScore) {
    logger.debug("No concept reached the minimum score", {
      column: profile.columnName,
      bestScore: best?.score ?? 0,
      minMatchScore: opts.minMatchScore,
    });
    return unknownMatch();
  }

  return {
    conceptKey: best.definition.conceptKey,
    displayLabel: displayLabelFor(best.definition),
    domain: best.definition.domain,
    matchScore: best.score,
    definition: best.definition,
  };
}
