/**
 * Data type detection over a column's pattern sample
 */

import type { CellValue } from "../../types/data-model.js";
import type { TypeDetection } from "./types.js";
import {
  ALPHANUMERIC,
  detectDateFormat,
  matchRatio,
  predicateRatio,
} from "../../utils/value-patterns.js";
import { detectNumericType, extractNumericValues } from "./numeric-stats.js";

/**
 * Classify a sample by trying, in order: date → numeric → alphanumeric → text.
 * A type holds when at least `threshold` of the sample supports it.
 *
 * @example
 * detectDataType(["2024-01-05", "2024-02-11"], 0.9)
 * // { dataType: "date", dateFormat: "YYYY-MM-DD", support: 1 }
 */
export function detectDataType(
  sample: readonly Exclude<CellValue, null | undefined>[],
  threshold: number,
): TypeDetection {
  if (sample.length === 0) {
    return { dataType: "text", support: 0 };
  }

  const dateSupport = predicateRatio(sample, (v) => detectDateFormat(v) !== null);
  if (dateSupport >= threshold) {
    const firstFormat = sample
      .map((v) => detectDateFormat(v))
      .find((format): format is string => format !== null);
    return {
      dataType: "date",
      support: dateSupport,
      ...(firstFormat ? { dateFormat: firstFormat } : {}),
    };
  }

  const numbers = extractNumericValues(sample);
  const numericSupport = numbers.length / sample.length;
  if (numericSupport >= threshold) {
    return { dataType: detectNumericType(numbers), support: numericSupport };
  }

  const alphanumericSupport = matchRatio(
    sample.map((v) => String(v).trim()),
    ALPHANUMERIC,
  );
  if (alphanumericSupport >= threshold) {
    return { dataType: "alphanumeric", support: alphanumericSupport };
  }

  return { dataType: "text", support: 1 };
}
