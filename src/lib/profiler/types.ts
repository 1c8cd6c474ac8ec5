/**
 * Profiler module types
 */

import type { CellValue, DataType } from "../../types/data-model.js";

/**
 * Options for the column profiler
 */
export interface ProfilerOptions {
  /** Leading present values inspected for type and pattern detection */
  sampleSize: number;
  /** Fraction of the sample that must agree for a type or character class to hold */
  patternThreshold: number;
  /** Uniqueness percentage below which a column counts as low-cardinality */
  lowCardinalityThreshold: number;
  /** Example values kept for low-cardinality columns */
  maxDistinctExamples: number;
}

/**
 * PartitionedCells - A column's cells split by presence
 */
export interface PartitionedCells {
  nullCount: number;
  emptyCount: number;
  /** Non-null, non-blank values in column order */
  present: Exclude<CellValue, null | undefined>[];
}

export interface TypeDetection {
  dataType: DataType;
  dateFormat?: string;
  /** Share of the sample supporting the chosen type */
  support: number;
}

export interface LengthStats {
  minLength: number;
  maxLength: number;
  avgLength: number;
  lengthStdDev: number;
  fixedLength: boolean;
  fixedLengthValue?: number;
  nearFixedLength: boolean;
  typicalLength?: number;
}

export interface NumericSummary {
  minValue: number;
  maxValue: number;
  meanValue: number;
  medianValue: number;
  hasNegative: boolean;
  hasZero: boolean;
  hasPositive: boolean;
  valuesAnalyzed: number;
}
