/**
 * Frequency distribution utilities for value lengths and numeric ranges
 */

/**
 * Mapping of stringified value → occurrence count
 */
export type FrequencyDistribution = Record<string, number>;

/**
 * Summary of a numeric frequency distribution
 */
export interface DistributionStats {
  min: number;
  max: number;
  median: number;
  total: number;
  unique: number;
}

/**
 * Calculate frequency distribution from an array of values
 *
 * @example
 * calculateFrequencies([1, 2, 2, 3, 3, 3])
 * // Returns: { "1": 1, "2": 2, "3": 3 }
 */
export function calculateFrequencies(
  values: readonly (number | string)[],
): FrequencyDistribution {
  const distribution: FrequencyDistribution = {};

  for (const value of values) {
    updateFrequencies(distribution, value);
  }

  return distribution;
}

/**
 * Update a frequency distribution with a new value
 */
export function updateFrequencies(
  distribution: FrequencyDistribution,
  value: number | string,
): void {
  const key = String(value);
  distribution[key] = (distribution[key] || 0) + 1;
}

function sortedNumericEntries(
  distribution: FrequencyDistribution,
): { value: number; count: number }[] {
  const entries: { value: number; count: number }[] = [];

  for (const key in distribution) {
    const count = distribution[key];
    if (count !== undefined) {
      entries.push({ value: Number(key), count });
    }
  }

  return entries.sort((a, b) => a.value - b.value);
}

/**
 * Calculate min, max, median, total and unique count of a numeric distribution.
 * The median is the lower median: the first value whose cumulative count reaches half the total.
 *
 * @throws Error when the distribution is empty
 */
export function calculateDistributionStats(
  distribution: FrequencyDistribution,
): DistributionStats {
  const sortedEntries = sortedNumericEntries(distribution);

  const first = sortedEntries[0];
  const last = sortedEntries[sortedEntries.length - 1];

  if (!first || !last) {
    throw new Error("Cannot calculate stats for empty distribution");
  }

  let total = 0;
  for (const entry of sortedEntries) {
    total += entry.count;
  }

  let median = first.value;
  const medianTarget = total * 0.5;
  let cumulative = 0;

  for (const entry of sortedEntries) {
    cumulative += entry.count;
    if (cumulative >= medianTarget) {
      median = entry.value;
      break;
    }
  }

  return {
    min: first.value,
    max: last.value,
    median,
    total,
    unique: sortedEntries.length,
  };
}

/**
 * Most frequent key of a distribution; ties keep the first key in enumeration order (ascending for integer keys)
 */
export function modeOf(distribution: FrequencyDistribution): string | undefined {
  let best: string | undefined;
  let bestCount = 0;

  for (const key in distribution) {
    const count = distribution[key] ?? 0;
    if (count > bestCount) {
      best = key;
      bestCount = count;
    }
  }

  return best;
}
