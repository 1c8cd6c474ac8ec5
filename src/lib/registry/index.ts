/**
 * Registry module - immutable catalogue of banking concept definitions
 */

import Ajv from "ajv";
import type {
  ConceptDefinition,
  ConceptDomain,
} from "../../types/data-model.js";
import type { DomainRoles, RegistryArtifact, RegistrySource } from "./types.js";
import { registryArtifactSchema } from "./schema.js";
import { RegistryError } from "../../utils/errors.js";
import { readStructuredFile } from "../../utils/structured-file.js";
import { paths } from "../../utils/paths.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";
export { registryArtifactSchema } from "./schema.js";

const ajv = new Ajv({
  allErrors: true, // Collect all validation errors
});

const validateArtifact = ajv.compile<RegistryArtifact>(registryArtifactSchema);

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * ConceptRegistry - read-only view over a validated registry artifact.
 * Definitions keep their file order; that order breaks ties during matching.
 */
export class ConceptRegistry {
  readonly version: string;
  readonly definitions: readonly ConceptDefinition[];
  readonly source: RegistrySource;
  private readonly byKey: ReadonlyMap<string, ConceptDefinition>;
  private readonly domainRoles: Readonly<DomainRoles>;

  constructor(artifact: RegistryArtifact, path?: string) {
    const frozen = deepFreeze(structuredClone(artifact));
    this.version = frozen.version;
    this.definitions = frozen.concepts;
    this.domainRoles = frozen.domainRoles;
    this.byKey = new Map(frozen.concepts.map((def) => [def.conceptKey, def]));
    this.source = { path, version: frozen.version };
    Object.freeze(this);
  }

  get size(): number {
    return this.definitions.length;
  }

  get(conceptKey: string): ConceptDefinition | undefined {
    return this.byKey.get(conceptKey);
  }

  has(conceptKey: string): boolean {
    return this.byKey.has(conceptKey);
  }

  byDomain(domain: ConceptDomain): ConceptDefinition[] {
    return this.definitions.filter((def) => def.domain === domain);
  }

  /**
   * Workflow role of a concept: its own role text, else its domain's generic role
   */
  workflowRoleFor(conceptKey: string): string {
    const def = this.byKey.get(conceptKey);
    if (!def) return this.domainRoles.General;
    return def.workflowRole ?? this.domainRoles[def.domain];
  }

  domainRole(domain: ConceptDomain | "General"): string {
    return this.domainRoles[domain];
  }
}

/**
 * Validate a parsed artifact and build a registry from it
 *
 * @throws RegistryError when the artifact does not match the schema or repeats a concept key
 */
export function createConceptRegistry(
  artifact: unknown,
  path?: string,
): ConceptRegistry {
  if (!validateArtifact(artifact)) {
    const problems = (validateArtifact.errors ?? []).map(
      (error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`,
    );
    throw new RegistryError("Concept registry does not match the registry schema", {
      path,
      problems,
    });
  }

  const seen = new Set<string>();
  for (const def of artifact.concepts) {
    if (seen.has(def.conceptKey)) {
      throw new RegistryError(`Duplicate concept key: ${def.conceptKey}`, {
        path,
        conceptKey: def.conceptKey,
      });
    }
    seen.add(def.conceptKey);

    const length = def.dataPatterns.length;
    if (length && "min" in length && length.min > length.max) {
      throw new RegistryError(
        `Length range of ${def.conceptKey} has min greater than max`,
        { path, conceptKey: def.conceptKey, length },
      );
    }
  }

  return new ConceptRegistry(artifact, path);
}

/**
 * Load a registry artifact (.yaml, .yml or .json) from disk
 */
export function loadConceptRegistry(
  path: string = paths.defaultRegistry,
): ConceptRegistry {
  const artifact = readStructuredFile(path);
  const registry = createConceptRegistry(artifact, path);

  logger.debug("Concept registry loaded", {
    path,
    version: registry.version,
    concepts: registry.size,
  });

  return registry;
}

let defaultRegistry: ConceptRegistry | undefined;

/**
 * Bundled registry, loaded once per process
 */
export function getDefaultRegistry(): ConceptRegistry {
  if (!defaultRegistry) {
    defaultRegistry = loadConceptRegistry(paths.defaultRegistry);
  }
  return defaultRegistry;
}
