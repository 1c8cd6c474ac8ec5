/**
 * Analyzer module - runs the per-column pipeline and the dataset summary
 *
 * profile → eligibility → match → confidence → business rules, then summarize.
 * Every call builds its own context; nothing is shared between calls except the
 * read-only registry and description lookup.
 */

import type {
  CellValue,
  ColumnAnalysisResult,
  ColumnDescription,
  DatasetAnalysis,
} from "../../types/data-model.js";
import type { AnalysisConfig } from "../../types/config.js";
import { ConceptRegistry, getDefaultRegistry } from "../registry/index.js";
import { type DescriptionLookup, lookupWithTimeout } from "../descriptions/index.js";
import { profileColumn } from "../profiler/index.js";
import { checkIdentifierEligibility } from "../eligibility/index.js";
import { matchConcept } from "../matcher/index.js";
import { scoreConfidence } from "../scorer/index.js";
import { deriveBusinessRules } from "../rules/index.js";
import { summarizeDataset } from "../summarizer/index.js";
import { loadAnalysisConfig } from "../../utils/config-loader.js";
import { EmptyDatasetError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Columns to analyze, in output order
 */
export type ColumnInput = ReadonlyMap<string, readonly CellValue[]>;

export interface AnalyzeOptions {
  /** Defaults to the bundled registry */
  registry?: ConceptRegistry;
  descriptions?: DescriptionLookup;
  config?: Partial<AnalysisConfig>;
}

/**
 * AnalysisContext - state scoped to a single analyzeDataset call
 */
export interface AnalysisContext {
  readonly registry: ConceptRegistry;
  readonly config: AnalysisConfig;
  readonly rowCount: number;
}

export function createAnalysisContext(
  columns: ColumnInput,
  options: AnalyzeOptions = {},
): AnalysisContext {
  let rowCount = 0;
  for (const values of columns.values()) {
    rowCount = Math.max(rowCount, values.length);
  }

  return {
    registry: options.registry ?? getDefaultRegistry(),
    config: loadAnalysisConfig(options.config),
    rowCount,
  };
}

/**
 * Analyze one column; the description, when given, enriches the business meaning
 */
export function analyzeColumn(
  columnName: string,
  values: readonly CellValue[],
  context: AnalysisContext,
  description?: ColumnDescription,
): ColumnAnalysisResult {
  const { config, registry } = context;

  const profile = profileColumn(columnName, values, context.rowCount, {
    sampleSize: config.sampleSize,
  });
  const eligibility = checkIdentifierEligibility(
    columnName,
    profile,
    config.identifierUniquenessThreshold,
  );
  const match = matchConcept(profile, eligibility, registry, {
    minMatchScore: config.minMatchScore,
    eligibilityPenalty: config.eligibilityPenalty,
  });
  const confidence = scoreConfidence(match, profile, eligibility);
  const explanation = deriveBusinessRules(
    match,
    profile,
    eligibility,
    registry,
    description,
  );

  return {
    columnName,
    profile,
    eligibility,
    match,
    conceptKey: match.conceptKey,
    displayLabel: match.displayLabel,
    domain: match.domain,
    confidence,
    ...explanation,
    ...(description ? { description } : {}),
  };
}

/**
 * Analyze every column of a dataset and summarize the results
 *
 * @throws EmptyDatasetError when there are no columns or no rows
 */
export async function analyzeDataset(
  columns: ColumnInput,
  options: AnalyzeOptions = {},
): Promise<DatasetAnalysis> {
  if (columns.size === 0) {
    throw new EmptyDatasetError("Dataset has no columns", { columns: 0 });
  }

  const context = createAnalysisContext(columns, options);
  if (context.rowCount === 0) {
    throw new EmptyDatasetError("Dataset has no rows", {
      columns: columns.size,
      rows: 0,
    });
  }

  logger.info("Analyzing dataset", {
    columns: columns.size,
    rows: context.rowCount,
    registryVersion: context.registry.version,
  });

  const lookup = options.descriptions;
  const entries = [...columns.entries()];
  const descriptions = await Promise.all(
    entries.map(([columnName]) =>
      lookup
        ? lookupWithTimeout(lookup, columnName, context.config.lookupTimeoutMs)
        : Promise.resolve(undefined),
    ),
  );

  const columnsAnalysis = entries.map(([columnName, values], index) =>
    analyzeColumn(columnName, values, context, descriptions[index]),
  );
  const summary = summarizeDataset(columnsAnalysis);

  logger.info("Dataset analysis complete", {
    identifiedColumns: summary.identifiedColumns,
    identificationRate: summary.identificationRate,
  });

  return { columnsAnalysis, summary };
}

/**
 * DatasetAnalyzer - binds a registry, description lookup and configuration
 * for repeated analyses; each call still runs with its own context
 */
export class DatasetAnalyzer {
  constructor(private readonly options: AnalyzeOptions = {}) {}

  analyze(columns: ColumnInput): Promise<DatasetAnalysis> {
    return analyzeDataset(columns, this.options);
  }
}
