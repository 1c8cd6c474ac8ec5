/**
 * Rules module - derives the business rule set and explanations for a matched column
 */

import {
  UNKNOWN_CONCEPT,
  type BusinessRuleExplanation,
  type ColumnDescription,
  type ColumnProfile,
  type ConceptMatch,
  type DerivedRules,
  type IdentifierEligibility,
} from "../../types/data-model.js";
import type { ConceptRegistry } from "../registry/index.js";

export const MAX_DISPLAYED_ALLOWED_VALUES = 5;
export const STANDARD_RULES_LINE = "Standard banking rules apply.";
export const UNKNOWN_RULES_LINE =
  "Business rules require domain expert review for this column.";

/**
 * One "✓ …" line per active rule
 */
export function formatRulesDisplay(rules: DerivedRules): string[] {
  const lines: string[] = [];
  if (rules.unique) lines.push("✓ Must be UNIQUE");
  if (rules.mandatory) lines.push("✓ MANDATORY (cannot be null)");
  if (rules.primaryKey) lines.push("✓ PRIMARY KEY");
  if (rules.foreignKey) lines.push("✓ FOREIGN KEY");
  if (rules.format) lines.push(`✓ Format: ${rules.format}`);
  if (rules.allowedValues && rules.allowedValues.length > 0) {
    lines.push(
      `✓ Allowed values: ${rules.allowedValues
        .slice(0, MAX_DISPLAYED_ALLOWED_VALUES)
        .join(", ")}`,
    );
  }
  return lines.length > 0 ? lines : [STANDARD_RULES_LINE];
}

function unknownExplanation(
  profile: ColumnProfile,
  registry: ConceptRegistry,
  description?: ColumnDescription,
): BusinessRuleExplanation {
  return {
    businessMeaning:
      description?.description ??
      `Column "${profile.columnName}" holds data used in banking operations; its exact business meaning requires domain expert review.`,
    rules: {
      unique: null,
      mandatory: null,
      primaryKey: false,
      foreignKey: false,
      format: `Based on data type: ${profile.dataType}`,
      allowedValues: null,
    },
    rulesDisplay: [UNKNOWN_RULES_LINE],
    whyRuleExists:
      "The purpose of this column could not be identified; manual review is recommended.",
    violationImpact: "Impact cannot be determined until the column is identified.",
    workflowRole: registry.domainRole("General"),
  };
}

/**
 * Derive rules and explanation text for a column.
 * The primary-key flag is dropped whenever the column is not identifier-eligible.
 */
export function deriveBusinessRules(
  match: ConceptMatch,
  profile: ColumnProfile,
  eligibility: IdentifierEligibility,
  registry: ConceptRegistry,
  description?: ColumnDescription,
): BusinessRuleExplanation {
  const definition = match.definition;
  if (match.conceptKey === UNKNOWN_CONCEPT || !definition) {
    return unknownExplanation(profile, registry, description);
  }

  const template = definition.businessRules;
  const rules: DerivedRules = {
    unique: template.unique,
    mandatory: template.mandatory,
    primaryKey: template.primaryKey && eligibility.isEligible,
    foreignKey: template.foreignKey,
    format: template.format,
    allowedValues: template.allowedValues,
  };

  const detail = description?.description ?? template.reason;

  return {
    businessMeaning: `This column represents ${match.displayLabel} in the banking system. ${detail}`,
    rules,
    rulesDisplay: formatRulesDisplay(rules),
    whyRuleExists: template.reason,
    violationImpact: template.violationImpact,
    workflowRole: registry.workflowRoleFor(definition.conceptKey),
  };
}
