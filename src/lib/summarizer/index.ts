/**
 * Summarizer module - dataset-level statistics over per-column results
 */

import {
  UNKNOWN_CONCEPT,
  type ColumnAnalysisResult,
  type DatasetSummary,
} from "../../types/data-model.js";
import { round1 } from "../../utils/rounding.js";

/**
 * Summarize column results in a single pass
 */
export function summarizeDataset(
  results: readonly ColumnAnalysisResult[],
): DatasetSummary {
  let identifiedColumns = 0;
  let identifierCount = 0;
  let confidenceSum = 0;
  let confidenceCount = 0;
  const domainDistribution: Record<string, number> = {};

  for (const result of results) {
    if (result.conceptKey !== UNKNOWN_CONCEPT) {
      identifiedColumns++;
      domainDistribution[result.domain] = (domainDistribution[result.domain] ?? 0) + 1;
    }
    if (result.confidence > 0) {
      confidenceSum += result.confidence;
      confidenceCount++;
    }
    if (result.match.definition?.isIdentifier && result.eligibility.isEligible) {
      identifierCount++;
    }
  }

  const totalColumns = results.length;

  return {
    totalColumns,
    identifiedColumns,
    unidentifiedColumns: totalColumns - identifiedColumns,
    identificationRate:
      totalColumns === 0 ? 0 : round1((identifiedColumns / totalColumns) * 100),
    averageConfidence:
      confidenceCount === 0 ? 0 : round1(confidenceSum / confidenceCount),
    domainDistribution,
    identifierCount,
  };
}
