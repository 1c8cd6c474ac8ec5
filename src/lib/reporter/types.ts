/**
 * Reporter module types
 */

import type { AnalysisConfig } from "../../types/config.js";

export interface ArtifactRecord {
  path: string;
  hash: string;
  size?: number;
}

/**
 * RunManifest - audit record of one analysis run
 */
export interface RunManifest {
  version: string;
  tool: {
    name: string;
    version: string;
  };
  run: {
    id: string;
    timestamp: string;
    phase: "analysis";
  };
  registry?: {
    version: string;
    path?: string;
    hash?: string;
  };
  config?: AnalysisConfig;
  artifacts: {
    input?: ArtifactRecord;
    report?: ArtifactRecord;
  };
}

export interface ReporterResult {
  manifestPath: string;
  reportPath: string;
  manifest: RunManifest;
}
