/**
 * Value pattern detection utilities for column profiling
 */

import type { CellValue } from "../types/data-model.js";

/**
 * Compiled regex pattern for a recognised date layout
 */
interface DatePattern {
  format: string;
  regex: RegExp;
  /** Map capture groups to [year, first, second]; first/second are day and month (NaN when absent) */
  parts: (match: RegExpMatchArray) => [number, number, number];
  dayFirstAmbiguous: boolean;
}

const MONTHS = [
  "jan", "feb", "mar", "apr", "may", "jun",
  "jul", "aug", "sep", "oct", "nov", "dec",
];

const TIME_SUFFIX = String.raw`(?:[T ]\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?`;

function toInt(value: string | undefined): number {
  return value === undefined ? NaN : parseInt(value, 10);
}

/**
 * Built-in date layouts, tried in order
 */
export const DATE_PATTERNS: DatePattern[] = [
  {
    format: "YYYY-MM-DD",
    regex: new RegExp(`^(\\d{4})-(\\d{1,2})-(\\d{1,2})${TIME_SUFFIX}$`),
    parts: (m) => [toInt(m[1]), toInt(m[3]), toInt(m[2])],
    dayFirstAmbiguous: false,
  },
  {
    format: "YYYY/MM/DD",
    regex: new RegExp(`^(\\d{4})/(\\d{1,2})/(\\d{1,2})${TIME_SUFFIX}$`),
    parts: (m) => [toInt(m[1]), toInt(m[3]), toInt(m[2])],
    dayFirstAmbiguous: false,
  },
  {
    format: "DD/MM/YYYY or MM/DD/YYYY",
    regex: new RegExp(`^(\\d{1,2})/(\\d{1,2})/(\\d{4})${TIME_SUFFIX}$`),
    parts: (m) => [toInt(m[3]), toInt(m[1]), toInt(m[2])],
    dayFirstAmbiguous: true,
  },
  {
    format: "DD-MM-YYYY",
    regex: new RegExp(`^(\\d{1,2})-(\\d{1,2})-(\\d{4})${TIME_SUFFIX}$`),
    parts: (m) => [toInt(m[3]), toInt(m[1]), toInt(m[2])],
    dayFirstAmbiguous: true,
  },
  {
    format: "DD.MM.YYYY",
    regex: /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/,
    parts: (m) => [toInt(m[3]), toInt(m[1]), toInt(m[2])],
    dayFirstAmbiguous: true,
  },
  {
    format: "DD-Mon-YYYY",
    regex: /^(\d{1,2})[ -]([A-Za-z]{3})[a-z]*[ -](\d{4})$/,
    parts: (m) => [
      toInt(m[3]),
      toInt(m[1]),
      MONTHS.indexOf((m[2] ?? "").toLowerCase()) + 1,
    ],
    dayFirstAmbiguous: false,
  },
];

function isDay(n: number): boolean {
  return n >= 1 && n <= 31;
}

function isMonth(n: number): boolean {
  return n >= 1 && n <= 12;
}

/**
 * Detect the date layout of a single value
 *
 * @returns The layout label, or null when the value is not a recognised date
 *
 * @example
 * detectDateFormat("2024-03-15") // "YYYY-MM-DD"
 * detectDateFormat("1234567890") // null
 */
export function detectDateFormat(value: CellValue): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();

  for (const pattern of DATE_PATTERNS) {
    const match = trimmed.match(pattern.regex);
    if (!match) continue;

    const [year, first, second] = pattern.parts(match);
    if (Number.isNaN(year) || year < 1000) continue;

    const valid = pattern.dayFirstAmbiguous
      ? (isDay(first) && isMonth(second)) || (isMonth(first) && isDay(second))
      : isDay(first) && isMonth(second);

    if (valid) return pattern.format;
  }

  return null;
}

const NUMERIC_STRING = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse a cell as a finite number, or null when it is not numeric
 */
export function parseNumeric(value: CellValue): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") return null;

  const trimmed = value.trim();
  if (!NUMERIC_STRING.test(trimmed)) return null;

  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export const DIGITS_ONLY = /^\d+$/;
export const ALPHANUMERIC = /^[A-Za-z0-9]+$/;

/**
 * Fraction of values whose string form matches a pattern
 */
export function matchRatio(values: readonly string[], regex: RegExp): number {
  if (values.length === 0) return 0;
  let matchCount = 0;
  for (const value of values) {
    if (regex.test(value)) matchCount++;
  }
  return matchCount / values.length;
}

/**
 * Fraction of values accepted by a predicate
 */
export function predicateRatio<T>(
  values: readonly T[],
  predicate: (value: T) => boolean,
): number {
  if (values.length === 0) return 0;
  return values.filter(predicate).length / values.length;
}
