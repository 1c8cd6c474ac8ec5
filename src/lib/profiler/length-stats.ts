/**
 * Value length statistics for text-like columns
 */

import type { LengthStats } from "./types.js";
import { calculateFrequencies, modeOf } from "../../utils/frequency-map.js";
import { round2 } from "../../utils/rounding.js";

/** Length standard deviation under which a column counts as near-fixed length */
export const NEAR_FIXED_STDDEV = 1.0;

function populationStdDev(lengths: readonly number[], mean: number): number {
  if (lengths.length === 0) return 0;
  let sumSquaredDiff = 0;
  for (const length of lengths) {
    sumSquaredDiff += Math.pow(length - mean, 2);
  }
  return Math.sqrt(sumSquaredDiff / lengths.length);
}

/**
 * Calculate length statistics.
 * min/max/avg/stddev cover every present value; the fixed and near-fixed
 * checks look at the pattern sample only.
 *
 * @returns null when there are no values
 */
export function calculateLengthStats(
  allValues: readonly string[],
  sample: readonly string[],
): LengthStats | null {
  if (allValues.length === 0 || sample.length === 0) {
    return null;
  }

  const lengths = allValues.map((v) => v.length);
  let min = Infinity;
  let max = -Infinity;
  let sum = 0;
  for (const length of lengths) {
    if (length < min) min = length;
    if (length > max) max = length;
    sum += length;
  }
  const mean = sum / lengths.length;

  const sampleLengths = sample.map((v) => v.length);
  const sampleDistribution = calculateFrequencies(sampleLengths);
  const distinctSampleLengths = Object.keys(sampleDistribution).length;

  const sampleMean =
    sampleLengths.reduce((acc, length) => acc + length, 0) / sampleLengths.length;
  const sampleStdDev = populationStdDev(sampleLengths, sampleMean);

  const fixedLength = distinctSampleLengths === 1;
  const nearFixedLength = !fixedLength && sampleStdDev < NEAR_FIXED_STDDEV;
  const typical = modeOf(sampleDistribution);

  return {
    minLength: min,
    maxLength: max,
    avgLength: round2(mean),
    lengthStdDev: round2(populationStdDev(lengths, mean)),
    fixedLength,
    ...(fixedLength && sampleLengths[0] !== undefined
      ? { fixedLengthValue: sampleLengths[0] }
      : {}),
    nearFixedLength,
    ...(nearFixedLength && typical !== undefined
      ? { typicalLength: Number(typical) }
      : {}),
  };
}
