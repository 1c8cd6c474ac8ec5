/**
 * Profiler module - extracts structural and statistical facts from one column
 */

import type {
  CellValue,
  ColumnPatterns,
  ColumnProfile,
} from "../../types/data-model.js";
import type { PartitionedCells, ProfilerOptions } from "./types.js";
import { calculateLengthStats } from "./length-stats.js";
import { calculateNumericStats } from "./numeric-stats.js";
import { detectDataType } from "./type-detection.js";
import {
  ALPHANUMERIC,
  DIGITS_ONLY,
  matchRatio,
} from "../../utils/value-patterns.js";
import { extractKeywords, normalizeColumnName } from "../../utils/column-names.js";
import { logger } from "../../utils/logger.js";
import { round2 } from "../../utils/rounding.js";

export * from "./types.js";
export * from "./length-stats.js";
export * from "./numeric-stats.js";
export * from "./type-detection.js";

/**
 * Default profiler options
 */
export const DEFAULT_PROFILER_OPTIONS: ProfilerOptions = {
  sampleSize: 100,
  patternThreshold: 0.9,
  lowCardinalityThreshold: 20,
  maxDistinctExamples: 10,
};

function percentOf(count: number, total: number): number {
  return total === 0 ? 0 : round2((count / total) * 100);
}

/**
 * Null means null, undefined or NaN; empty means a string that is blank after trimming
 */
export function partitionCells(values: readonly CellValue[]): PartitionedCells {
  let nullCount = 0;
  let emptyCount = 0;
  const present: PartitionedCells["present"] = [];

  for (const value of values) {
    if (value === null || value === undefined || Number.isNaN(value)) {
      nullCount++;
    } else if (typeof value === "string" && value.trim() === "") {
      emptyCount++;
    } else {
      present.push(value);
    }
  }

  return { nullCount, emptyCount, present };
}

function distinctPresentValues(
  present: PartitionedCells["present"],
): Map<string, string | number> {
  const distinct = new Map<string, string | number>();
  for (const value of present) {
    const key = typeof value === "string" ? value.trim() : String(value);
    if (!distinct.has(key)) distinct.set(key, value);
  }
  return distinct;
}

/**
 * Profile a single column
 *
 * @param name - Column name as it appears in the dataset
 * @param values - Cells in row order
 * @param rowCount - Dataset row count; missing trailing cells count as nulls
 */
export function profileColumn(
  name: string,
  values: readonly CellValue[],
  rowCount: number = values.length,
  options: Partial<ProfilerOptions> = {},
): ColumnProfile {
  const opts: ProfilerOptions = { ...DEFAULT_PROFILER_OPTIONS, ...options };
  const totalRecords = Math.max(rowCount, values.length);

  const { nullCount: presentNulls, emptyCount, present } = partitionCells(values);
  const nullCount = presentNulls + (totalRecords - values.length);
  const distinct = distinctPresentValues(present);
  const uniquenessPercentage = percentOf(distinct.size, totalRecords);

  const sample = present.slice(0, opts.sampleSize);
  const detection = detectDataType(sample, opts.patternThreshold);
  const patterns: ColumnPatterns = {};

  if (present.length > 0) {
    const sampleStrings = sample.map((v) => String(v).trim());

    const onlyDigitsRatio = round2(matchRatio(sampleStrings, DIGITS_ONLY));
    const alphanumericRatio = round2(matchRatio(sampleStrings, ALPHANUMERIC));
    patterns.onlyDigitsRatio = onlyDigitsRatio;
    patterns.onlyDigits = onlyDigitsRatio >= opts.patternThreshold;
    patterns.alphanumericRatio = alphanumericRatio;
    patterns.alphanumeric = alphanumericRatio >= opts.patternThreshold;

    if (detection.dataType === "text" || detection.dataType === "alphanumeric") {
      const lengths = calculateLengthStats(
        present.map((v) => String(v).trim()),
        sampleStrings,
      );
      if (lengths) Object.assign(patterns, lengths);
    }

    patterns.lowCardinality = uniquenessPercentage < opts.lowCardinalityThreshold;
    if (patterns.lowCardinality) {
      patterns.distinctValues = [...distinct.values()].slice(
        0,
        opts.maxDistinctExamples,
      );
    }

    if (detection.dateFormat) {
      patterns.dateFormat = detection.dateFormat;
    }

    if (detection.dataType === "numeric" || detection.dataType === "decimal") {
      const numeric = calculateNumericStats(present);
      if (numeric) {
        patterns.minValue = numeric.minValue;
        patterns.maxValue = numeric.maxValue;
        patterns.meanValue = numeric.meanValue;
        patterns.medianValue = numeric.medianValue;
        patterns.hasNegative = numeric.hasNegative;
        patterns.hasZero = numeric.hasZero;
        patterns.hasPositive = numeric.hasPositive;
      }
    }
  }

  logger.debug("Column profiled", {
    column: name,
    dataType: detection.dataType,
    present: present.length,
    uniquenessPercentage,
  });

  return Object.freeze({
    columnName: name,
    normalizedName: normalizeColumnName(name),
    keywords: Object.freeze(extractKeywords(name)),
    dataType: detection.dataType,
    totalRecords,
    nonNullCount: totalRecords - nullCount,
    nullCount,
    nullPercentage: percentOf(nullCount, totalRecords),
    emptyCount,
    emptyPercentage: percentOf(emptyCount, totalRecords),
    uniqueCount: distinct.size,
    uniquenessPercentage,
    patterns: Object.freeze(patterns),
  });
}
