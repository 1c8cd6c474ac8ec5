/**
 * Reporter module - analysis reports and run manifests for auditability
 */

import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import type { DatasetAnalysis } from "../../types/data-model.js";
import type { AnalysisConfig } from "../../types/config.js";
import type { ConceptRegistry } from "../registry/index.js";
import type { ReporterResult, RunManifest } from "./types.js";
import { FileIOError } from "../../utils/errors.js";
import { packageVersion } from "../../utils/paths.js";
import { logger } from "../../utils/logger.js";

export type { ArtifactRecord, ReporterResult, RunManifest } from "./types.js";

export const REPORT_FILE = "analysis-report.json";
export const MANIFEST_FILE = "run-manifest.json";

/**
 * Calculate SHA-256 hash of a file
 */
export async function calculateFileHash(filePath: string): Promise<string> {
  try {
    const fileBuffer = await fs.readFile(filePath);
    return crypto.createHash("sha256").update(fileBuffer).digest("hex");
  } catch (error) {
    throw new FileIOError(`Failed to hash file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }
}

/**
 * RunReporter writes the analysis report and a manifest with artifact hashes
 */
export class RunReporter {
  private _manifest: RunManifest;

  constructor(version: string = packageVersion()) {
    this._manifest = {
      version: "1",
      tool: {
        name: "conceptlens",
        version,
      },
      run: {
        id: crypto.randomBytes(8).toString("hex"),
        timestamp: new Date().toISOString(),
        phase: "analysis",
      },
      artifacts: {},
    };
  }

  /**
   * Record the dataset file the run analyzed
   */
  async recordInput(inputPath: string): Promise<void> {
    const hash = await calculateFileHash(inputPath);
    const { size } = await fs.stat(inputPath);
    this._manifest.artifacts.input = { path: inputPath, hash, size };
    logger.debug("Input artifact recorded", { path: inputPath, hash, size });
  }

  /**
   * Record the registry version, and the artifact hash when it came from a file
   */
  async recordRegistry(registry: ConceptRegistry): Promise<void> {
    const registryPath = registry.source.path;
    this._manifest.registry = {
      version: registry.version,
      ...(registryPath
        ? { path: registryPath, hash: await calculateFileHash(registryPath) }
        : {}),
    };
  }

  recordConfig(config: AnalysisConfig): void {
    this._manifest.config = { ...config };
  }

  getManifest(): RunManifest {
    return structuredClone(this._manifest);
  }

  /**
   * Write the report and the manifest into `outputDir`
   */
  async save(outputDir: string, analysis: DatasetAnalysis): Promise<ReporterResult> {
    const reportPath = path.join(outputDir, REPORT_FILE);
    const manifestPath = path.join(outputDir, MANIFEST_FILE);

    try {
      await fs.mkdir(outputDir, { recursive: true });
      await fs.writeFile(reportPath, JSON.stringify(analysis, null, 2), "utf-8");
    } catch (error) {
      throw new FileIOError(`Failed to write report: ${reportPath}`, { reportPath }, {
        cause: error,
      });
    }

    const hash = await calculateFileHash(reportPath);
    const { size } = await fs.stat(reportPath);
    this._manifest.artifacts.report = { path: reportPath, hash, size };

    try {
      await fs.writeFile(manifestPath, JSON.stringify(this._manifest, null, 2), "utf-8");
    } catch (error) {
      throw new FileIOError(`Failed to write manifest: ${manifestPath}`, { manifestPath }, {
        cause: error,
      });
    }

    logger.info("Run manifest saved", { path: manifestPath });
    return { reportPath, manifestPath, manifest: this.getManifest() };
  }
}
