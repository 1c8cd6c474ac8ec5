#!/usr/bin/env node

/**
 * ConceptLens CLI - banking concept classification for tabular datasets
 */

import { Command } from "commander";
import { createAnalyzeCommand } from "./commands/analyze.js";
import { createConceptsCommand } from "./commands/concepts.js";
import { packageVersion } from "../utils/paths.js";
import { logger } from "../utils/logger.js";
import { toConceptLensError } from "../utils/errors.js";

const pkg = {
  name: "conceptlens",
  description:
    "Classify the columns of a tabular dataset against a catalogue of banking concepts",
};

/**
 * Main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(packageVersion());

  program.addCommand(createAnalyzeCommand());
  program.addCommand(createConceptsCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const lensError = toConceptLensError(error);
  logger.error("Unexpected error", { error: lensError.message });
  console.error(JSON.stringify(lensError.toResponse("cli"), null, 2));
  process.exit(1);
});
