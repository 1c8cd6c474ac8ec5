/**
 * Fixed-precision rounding for reported percentages, averages and scores
 */

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function round1(value: number): number {
  return roundTo(value, 1);
}

export function round2(value: number): number {
  return roundTo(value, 2);
}
