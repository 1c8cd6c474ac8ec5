/**
 * Concepts command - list the concept registry
 */

import { Command } from "commander";
import { resolve } from "node:path";
import type { ConceptsCommandOptions } from "../config/types.js";
import type { ConceptDomain } from "../../types/data-model.js";
import { getDefaultRegistry, loadConceptRegistry } from "../../lib/registry/index.js";
import { displayLabelFor } from "../../lib/matcher/index.js";
import { exitCodeFor } from "../options.js";
import { ConfigError, toConceptLensError } from "../../utils/errors.js";

const DOMAINS: readonly ConceptDomain[] = ["Customer", "Account", "Loan", "Transaction"];

function parseDomain(value: string): ConceptDomain {
  const domain = DOMAINS.find((d) => d.toLowerCase() === value.toLowerCase());
  if (!domain) {
    throw new ConfigError(`Unknown domain "${value}". Use one of: ${DOMAINS.join(", ")}`, {
      domain: value,
    });
  }
  return domain;
}

function executeConcepts(options: ConceptsCommandOptions): void {
  try {
    const registry = options.registry
      ? loadConceptRegistry(resolve(options.registry))
      : getDefaultRegistry();

    const definitions = options.domain
      ? registry.byDomain(parseDomain(options.domain))
      : registry.definitions;

    const result = {
      status: "success",
      phase: "concepts",
      registryVersion: registry.version,
      concepts: definitions.map((def) => ({
        conceptKey: def.conceptKey,
        displayLabel: displayLabelFor(def),
        domain: def.domain,
        isIdentifier: def.isIdentifier,
        namePatterns: def.namePatterns,
        expectedTypes: def.dataPatterns.type,
        workflowRole: registry.workflowRoleFor(def.conceptKey),
      })),
    };

    console.log(JSON.stringify(result, null, 2));
  } catch (error) {
    const lensError = toConceptLensError(error);
    console.error(JSON.stringify(lensError.toResponse("concepts"), null, 2));
    process.exitCode = exitCodeFor(lensError);
  }
}

/**
 * Create concepts command
 */
export function createConceptsCommand(): Command {
  const command = new Command("concepts");

  command
    .description("List the banking concepts known to the registry")
    .option("--registry <path>", "Concept registry file (JSON/YAML)")
    .option("--domain <domain>", "Only list one domain: Customer, Account, Loan, Transaction")
    .action(executeConcepts);

  return command;
}
