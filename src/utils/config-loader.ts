/**
 * Configuration loader for the analysis pipeline thresholds
 */

import {
  type AnalysisConfig,
  DEFAULT_ANALYSIS_CONFIG,
} from "../types/config.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

/**
 * Merge analysis settings with precedence: CLI > config file > defaults
 *
 * @example
 * const config = loadAnalysisConfig({ minMatchScore: 30 }, { minMatchScore: 20, sampleSize: 50 });
 * // Returns: minMatchScore 30 (CLI takes precedence), sampleSize 50, other fields defaulted
 */
export function loadAnalysisConfig(
  cliOptions: Partial<AnalysisConfig> = {},
  configFile: Partial<AnalysisConfig> = {},
): AnalysisConfig {
  const config: AnalysisConfig = {
    minMatchScore:
      cliOptions.minMatchScore ??
      configFile.minMatchScore ??
      DEFAULT_ANALYSIS_CONFIG.minMatchScore,

    eligibilityPenalty:
      cliOptions.eligibilityPenalty ??
      configFile.eligibilityPenalty ??
      DEFAULT_ANALYSIS_CONFIG.eligibilityPenalty,

    sampleSize:
      cliOptions.sampleSize ??
      configFile.sampleSize ??
      DEFAULT_ANALYSIS_CONFIG.sampleSize,

    identifierUniquenessThreshold:
      cliOptions.identifierUniquenessThreshold ??
      configFile.identifierUniquenessThreshold ??
      DEFAULT_ANALYSIS_CONFIG.identifierUniquenessThreshold,

    lookupTimeoutMs:
      cliOptions.lookupTimeoutMs ??
      configFile.lookupTimeoutMs ??
      DEFAULT_ANALYSIS_CONFIG.lookupTimeoutMs,
  };

  validateAnalysisConfig(config);

  logger.debug("Analysis config loaded", { ...config });

  return config;
}

/**
 * Validate analysis configuration
 *
 * @throws ConfigError if configuration is invalid
 */
export function validateAnalysisConfig(config: AnalysisConfig): void {
  const finite = (value: number) => Number.isFinite(value);

  if (!finite(config.minMatchScore) || config.minMatchScore < 0) {
    throw new ConfigError(
      `minMatchScore must be a number >= 0, got ${config.minMatchScore}`,
      { field: "minMatchScore" },
    );
  }

  if (
    !finite(config.eligibilityPenalty) ||
    config.eligibilityPenalty < 0 ||
    config.eligibilityPenalty > 1
  ) {
    throw new ConfigError(
      `eligibilityPenalty must be between 0.0 and 1.0, got ${config.eligibilityPenalty}`,
      { field: "eligibilityPenalty" },
    );
  }

  if (!Number.isInteger(config.sampleSize) || config.sampleSize < 1) {
    throw new ConfigError(
      `sampleSize must be an integer >= 1, got ${config.sampleSize}`,
      { field: "sampleSize" },
    );
  }

  if (
    !finite(config.identifierUniquenessThreshold) ||
    config.identifierUniquenessThreshold < 0 ||
    config.identifierUniquenessThreshold > 100
  ) {
    throw new ConfigError(
      `identifierUniquenessThreshold must be between 0 and 100, got ${config.identifierUniquenessThreshold}`,
      { field: "identifierUniquenessThreshold" },
    );
  }

  if (!finite(config.lookupTimeoutMs) || config.lookupTimeoutMs < 0) {
    throw new ConfigError(
      `lookupTimeoutMs must be >= 0, got ${config.lookupTimeoutMs}`,
      { field: "lookupTimeoutMs" },
    );
  }
}
