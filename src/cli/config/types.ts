/**
 * CLI configuration types
 */

import type { LogLevel } from "../../utils/logger.js";

/**
 * Flags accepted by `conceptlens analyze`
 */
export interface AnalyzeCommandOptions {
  config?: string;
  registry?: string;
  descriptions?: string;
  outputDir?: string;
  minMatchScore?: number;
  sampleSize?: number;
  lookupTimeout?: number;
  logLevel?: LogLevel;
}

/**
 * Flags accepted by `conceptlens concepts`
 */
export interface ConceptsCommandOptions {
  registry?: string;
  domain?: string;
}
