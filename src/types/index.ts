// Core re-exports for the ConceptLens type system
// This file provides a single import point for the shared data model and configuration types

export * from "./data-model.js";
export * from "./config.js";
