/**
 * Configuration types for ConceptLens
 */

/**
 * AnalysisConfig - Tunable thresholds of the column analysis pipeline
 */
export interface AnalysisConfig {
  /** Best concept score below which a column is reported as unknown */
  minMatchScore: number;
  /** Multiplier applied to identifier concepts when the column is not identifier-eligible */
  eligibilityPenalty: number;
  /** Number of leading non-null values inspected for pattern detection */
  sampleSize: number;
  /** Minimum uniqueness percentage for identifier eligibility */
  identifierUniquenessThreshold: number;
  /** Upper bound on a single description lookup, in milliseconds */
  lookupTimeoutMs: number;
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  minMatchScore: 25,
  eligibilityPenalty: 0.3,
  sampleSize: 100,
  identifierUniquenessThreshold: 95,
  lookupTimeoutMs: 250,
};

/**
 * RegistryConfig - Where the concept registry artifact is read from
 */
export interface RegistryConfig {
  path?: string;
}

/**
 * DescriptionsConfig - Optional external column description catalogue
 */
export interface DescriptionsConfig {
  path?: string;
}

export interface OutputConfig {
  dir?: string;
}

/**
 * ConceptLensConfig - Full configuration file layout (JSON or YAML)
 */
export interface ConceptLensConfig {
  analysis?: Partial<AnalysisConfig>;
  registry?: RegistryConfig;
  descriptions?: DescriptionsConfig;
  output?: OutputConfig;
}
