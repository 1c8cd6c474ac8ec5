/**
 * Numeric range statistics extraction
 * Analyzes numeric and decimal columns and calculates min/max/mean/median
 */

import type { CellValue } from "../../types/data-model.js";
import type { NumericSummary } from "./types.js";
import {
  calculateFrequencies,
  calculateDistributionStats,
} from "../../utils/frequency-map.js";
import { parseNumeric } from "../../utils/value-patterns.js";
import { round2 } from "../../utils/rounding.js";

/**
 * Parse every cell that is numeric; unparseable cells are skipped
 */
export function extractNumericValues(values: readonly CellValue[]): number[] {
  const numbers: number[] = [];
  for (const value of values) {
    const parsed = parseNumeric(value);
    if (parsed !== null) numbers.push(parsed);
  }
  return numbers;
}

/**
 * Integer-only samples are "numeric", any fractional value makes the column "decimal"
 */
export function detectNumericType(values: readonly number[]): "numeric" | "decimal" {
  return values.every((v) => Number.isInteger(v)) ? "numeric" : "decimal";
}

/**
 * Summarize numeric values
 *
 * @returns null when no value parses as a number
 */
export function calculateNumericStats(
  values: readonly CellValue[],
): NumericSummary | null {
  const numbers = extractNumericValues(values);
  if (numbers.length === 0) {
    return null;
  }

  const stats = calculateDistributionStats(calculateFrequencies(numbers));

  let sum = 0;
  let hasNegative = false;
  let hasZero = false;
  let hasPositive = false;

  for (const n of numbers) {
    sum += n;
    if (n < 0) hasNegative = true;
    else if (n === 0) hasZero = true;
    else hasPositive = true;
  }

  return {
    minValue: stats.min,
    maxValue: stats.max,
    meanValue: round2(sum / numbers.length),
    medianValue: stats.median,
    hasNegative,
    hasZero,
    hasPositive,
    valuesAnalyzed: numbers.length,
  };
}
