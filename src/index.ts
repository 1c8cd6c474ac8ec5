/**
 * ConceptLens: banking concept classification for the columns of tabular datasets
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/registry/index.js";
export * from "./lib/descriptions/index.js";
export * from "./lib/profiler/index.js";
export * from "./lib/eligibility/index.js";
export * from "./lib/matcher/index.js";
export * from "./lib/scorer/index.js";
export * from "./lib/rules/index.js";
export * from "./lib/summarizer/index.js";
export * from "./lib/analyzer/index.js";
export * from "./lib/loader/index.js";
export * from "./lib/reporter/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export { loadAnalysisConfig, validateAnalysisConfig } from "./utils/config-loader.js";
