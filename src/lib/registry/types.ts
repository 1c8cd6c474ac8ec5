/**
 * Registry module types
 */

import type {
  ConceptDefinition,
  ConceptDomain,
} from "../../types/data-model.js";

/**
 * Workflow role text per domain; "General" covers unidentified columns
 */
export type DomainRoles = Record<ConceptDomain | "General", string>;

/**
 * RegistryArtifact - On-disk layout of a versioned concept registry file
 */
export interface RegistryArtifact {
  version: string;
  domainRoles: DomainRoles;
  concepts: ConceptDefinition[];
}

export interface RegistrySource {
  /** File the registry was read from, absent for in-memory registries */
  path?: string;
  version: string;
}
