/**
 * Configuration file parser - supports JSON and YAML
 */

import { dirname, isAbsolute, resolve } from "node:path";
import Ajv from "ajv";
import type { ConceptLensConfig } from "../../types/config.js";
import { configFileSchema } from "./schema.js";
import { readStructuredFile } from "../../utils/structured-file.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const ajv = new Ajv({ allErrors: true });
const validateConfig = ajv.compile<ConceptLensConfig>(configFileSchema);

/**
 * Relative paths inside a config file are resolved against the file's directory
 */
function resolveFrom(baseDir: string, path: string | undefined): string | undefined {
  if (path === undefined) return undefined;
  return isAbsolute(path) ? path : resolve(baseDir, path);
}

/**
 * Parse configuration file (JSON or YAML)
 *
 * @throws ConfigError when the file does not match the configuration layout
 */
export function parseConfigFile(filePath: string): ConceptLensConfig {
  logger.info("Parsing configuration file", { filePath });

  const raw = readStructuredFile(filePath) ?? {};

  if (!validateConfig(raw)) {
    const problems = (validateConfig.errors ?? []).map(
      (error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`,
    );
    throw new ConfigError(`Invalid config file: ${filePath}`, { filePath, problems });
  }

  const baseDir = dirname(resolve(filePath));
  const config: ConceptLensConfig = {
    ...raw,
    ...(raw.registry ? { registry: { path: resolveFrom(baseDir, raw.registry.path) } } : {}),
    ...(raw.descriptions
      ? { descriptions: { path: resolveFrom(baseDir, raw.descriptions.path) } }
      : {}),
    ...(raw.output ? { output: { dir: resolveFrom(baseDir, raw.output.dir) } } : {}),
  };

  logger.info("Configuration file parsed successfully", {
    hasAnalysisConfig: !!config.analysis,
    hasRegistryConfig: !!config.registry,
    hasDescriptionsConfig: !!config.descriptions,
    hasOutputConfig: !!config.output,
  });

  return config;
}
