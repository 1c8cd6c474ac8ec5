/**
 * Analyze command - classify every column of a dataset file
 */

import { Command } from "commander";
import { resolve } from "node:path";
import type { AnalyzeCommandOptions } from "../config/types.js";
import type { ConceptLensConfig } from "../../types/config.js";
import { parseConfigFile } from "../config/parser.js";
import { parseIntOption, parseNumberOption, parseLogLevel, exitCodeFor } from "../options.js";
import { loadDataset } from "../../lib/loader/index.js";
import {
  ConceptRegistry,
  getDefaultRegistry,
  loadConceptRegistry,
} from "../../lib/registry/index.js";
import {
  CachedDescriptionLookup,
  type DescriptionLookup,
  loadDescriptionCatalog,
} from "../../lib/descriptions/index.js";
import { analyzeDataset } from "../../lib/analyzer/index.js";
import { RunReporter } from "../../lib/reporter/index.js";
import { loadAnalysisConfig } from "../../utils/config-loader.js";
import { existsSync } from "node:fs";
import { paths } from "../../utils/paths.js";
import { logger } from "../../utils/logger.js";
import { toConceptLensError } from "../../utils/errors.js";

function resolveRegistry(
  options: AnalyzeCommandOptions,
  configFile: ConceptLensConfig,
): ConceptRegistry {
  const registryPath = options.registry ?? configFile.registry?.path;
  return registryPath ? loadConceptRegistry(resolve(registryPath)) : getDefaultRegistry();
}

/**
 * An explicit catalogue must load; the bundled one is used only when present
 */
function resolveDescriptions(
  options: AnalyzeCommandOptions,
  configFile: ConceptLensConfig,
): DescriptionLookup | undefined {
  const descriptionsPath = options.descriptions ?? configFile.descriptions?.path;
  if (descriptionsPath) {
    return new CachedDescriptionLookup(loadDescriptionCatalog(resolve(descriptionsPath)));
  }
  if (existsSync(paths.defaultDescriptions)) {
    return new CachedDescriptionLookup(loadDescriptionCatalog(paths.defaultDescriptions));
  }
  return undefined;
}

/**
 * Execute analyze command
 */
async function executeAnalyze(
  input: string,
  options: AnalyzeCommandOptions,
): Promise<void> {
  const startTime = Date.now();

  try {
    if (options.logLevel) {
      logger.setLevel(options.logLevel);
    }

    const configFile: ConceptLensConfig = options.config
      ? parseConfigFile(options.config)
      : {};

    const config = loadAnalysisConfig(
      {
        minMatchScore: options.minMatchScore,
        sampleSize: options.sampleSize,
        lookupTimeoutMs: options.lookupTimeout,
      },
      configFile.analysis,
    );

    const inputPath = resolve(input);
    const registry = resolveRegistry(options, configFile);
    const descriptions = resolveDescriptions(options, configFile);
    const columns = loadDataset(inputPath);

    logger.info("Starting analysis phase", {
      input: inputPath,
      registryVersion: registry.version,
    });

    const analysis = await analyzeDataset(columns, { registry, descriptions, config });

    const outputDir = options.outputDir ?? configFile.output?.dir;
    let artifacts: { report: string; manifest: string } | undefined;
    if (outputDir) {
      const reporter = new RunReporter();
      await reporter.recordInput(inputPath);
      await reporter.recordRegistry(registry);
      reporter.recordConfig(config);
      const saved = await reporter.save(resolve(outputDir), analysis);
      artifacts = { report: saved.reportPath, manifest: saved.manifestPath };
    }

    const result = {
      status: "success",
      phase: "analysis",
      summary: { ...analysis.summary, durationMs: Date.now() - startTime },
      columns: analysis.columnsAnalysis.map((column) => ({
        columnName: column.columnName,
        conceptKey: column.conceptKey,
        displayLabel: column.displayLabel,
        domain: column.domain,
        confidence: column.confidence,
        dataType: column.profile.dataType,
        identifierEligible: column.eligibility.isEligible,
        eligibilityReason: column.eligibility.reason,
        businessMeaning: column.businessMeaning,
        rules: column.rulesDisplay,
        workflowRole: column.workflowRole,
      })),
      ...(artifacts ? { artifacts } : {}),
    };

    console.log(JSON.stringify(result, null, 2));
  } catch (error) {
    const lensError = toConceptLensError(error);
    console.error(JSON.stringify(lensError.toResponse("analysis"), null, 2));
    process.exitCode = exitCodeFor(lensError);
  }
}

/**
 * Create analyze command
 */
export function createAnalyzeCommand(): Command {
  const command = new Command("analyze");

  command
    .description(
      "Profile every column of a dataset (.json, .ndjson, .jsonl) and classify it against the banking concept registry",
    )
    .argument("<input>", "Dataset file")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option("--registry <path>", "Concept registry file (JSON/YAML)")
    .option(
      "--descriptions <path>",
      "Column description catalogue (.yaml, .yml, .json or .md)",
    )
    .option("--output-dir <path>", "Directory for the report and run manifest")
    .option(
      "--min-match-score <number>",
      "Best concept score below which a column is unknown (default: 25)",
      parseNumberOption,
    )
    .option(
      "--sample-size <count>",
      "Values inspected for pattern detection (default: 100)",
      parseIntOption,
    )
    .option(
      "--lookup-timeout <ms>",
      "Upper bound on a description lookup (default: 250)",
      parseIntOption,
    )
    .option(
      "--log-level <level>",
      "Logging verbosity: error, warn, info, debug",
      parseLogLevel,
    )
    .action(executeAnalyze);

  return command;
}
