import { describe, it, expect } from 'vitest';
import {
  deriveBusinessRules,
  formatRulesDisplay,
  STANDARD_RULES_LINE,
  UNKNOWN_RULES_LINE,
} from '../../src/lib/rules/index.js';
import { displayLabelFor, unknownMatch } from '../../src/lib/matcher/index.js';
import { getDefaultRegistry } from '../../src/lib/registry/index.js';
import { profileColumn } from '../../src/lib/profiler/index.js';
import type {
  ConceptDefinition,
  ConceptMatch,
  IdentifierEligibility,
} from '../../src/types/data-model.js';

const registry = getDefaultRegistry();

function definitionOf(conceptKey: string): ConceptDefinition {
  const definition = registry.get(conceptKey);
  if (!definition) throw new Error(`missing concept ${conceptKey}`);
  return definition;
}

function matchFor(conceptKey: string): ConceptMatch {
  const definition = definitionOf(conceptKey);
  return {
    conceptKey,
    displayLabel: displayLabelFor(definition),
    domain: definition.domain,
    matchScore: 80,
    definition,
  };
}

function eligibility(isEligible: boolean): IdentifierEligibility {
  return {
    isEligible,
    reason: 'test',
    uniquenessPct: 100,
    hasFixedLength: false,
    hasStrictPattern: true,
    isDescriptive: false,
    isContact: false,
  };
}

const profile = profileColumn('some_column', ['Savings', 'Current Account']);

describe('Business Rule Deriver', () => {
  it('should carry the template rules for an eligible identifier', () => {
    const definition = definitionOf('account_number');
    const result = deriveBusinessRules(matchFor('account_number'), profile, eligibility(true), registry);

    expect(result.rules).toEqual({
      unique: true,
      mandatory: true,
      primaryKey: true,
      foreignKey: false,
      format: definition.businessRules.format,
      allowedValues: null,
    });
    expect(result.rulesDisplay).toEqual([
      '✓ Must be UNIQUE',
      '✓ MANDATORY (cannot be null)',
      '✓ PRIMARY KEY',
      `✓ Format: ${definition.businessRules.format}`,
    ]);
    expect(result.businessMeaning).toBe(
      `This column represents Account - Account Number in the banking system. ${definition.businessRules.reason}`,
    );
    expect(result.whyRuleExists).toBe(definition.businessRules.reason);
    expect(result.violationImpact).toBe(definition.businessRules.violationImpact);
    expect(result.workflowRole).toBe(definition.workflowRole);
  });

  it('should drop the primary key on ineligible columns', () => {
    const result = deriveBusinessRules(matchFor('account_number'), profile, eligibility(false), registry);
    expect(result.rules.primaryKey).toBe(false);
    expect(result.rulesDisplay).not.toContain('✓ PRIMARY KEY');
  });

  it('should list allowed values and fall back to the domain role', () => {
    const result = deriveBusinessRules(matchFor('account_type'), profile, eligibility(false), registry);
    expect(result.rulesDisplay).toContain(
      '✓ Allowed values: Savings, Current, Salary, Fixed Deposit, Recurring Deposit',
    );
    expect(result.workflowRole).toBe(registry.domainRole('Account'));
  });

  it('should mark foreign keys', () => {
    const result = deriveBusinessRules(matchFor('branch_code'), profile, eligibility(false), registry);
    expect(result.rules.foreignKey).toBe(true);
    expect(result.rulesDisplay).toContain('✓ FOREIGN KEY');
  });

  it('should prefer an external description in the business meaning', () => {
    const result = deriveBusinessRules(matchFor('account_type'), profile, eligibility(false), registry, {
      description: 'Product category of the account.',
      section: 'Accounts',
    });
    expect(result.businessMeaning).toBe(
      'This column represents Account - Account Type in the banking system. Product category of the account.',
    );
  });

  describe('unknown concept', () => {
    it('should ask for domain expert review', () => {
      const result = deriveBusinessRules(unknownMatch(), profile, eligibility(true), registry);

      expect(result.businessMeaning).toBe(
        'Column "some_column" holds data used in banking operations; its exact business meaning requires domain expert review.',
      );
      expect(result.rules).toEqual({
        unique: null,
        mandatory: null,
        primaryKey: false,
        foreignKey: false,
        format: 'Based on data type: text',
        allowedValues: null,
      });
      expect(result.rulesDisplay).toEqual([UNKNOWN_RULES_LINE]);
      expect(result.workflowRole).toBe(registry.domainRole('General'));
    });

    it('should use an external description verbatim', () => {
      const result = deriveBusinessRules(unknownMatch(), profile, eligibility(false), registry, {
        description: 'Internal routing flag.',
        section: 'Operations',
      });
      expect(result.businessMeaning).toBe('Internal routing flag.');
    });
  });

  describe('formatRulesDisplay', () => {
    it('should fall back to a standard line when no rule is active', () => {
      expect(
        formatRulesDisplay({
          unique: false,
          mandatory: false,
          primaryKey: false,
          foreignKey: false,
          format: '',
          allowedValues: null,
        }),
      ).toEqual([STANDARD_RULES_LINE]);
    });

    it('should show at most five allowed values', () => {
      const lines = formatRulesDisplay({
        unique: null,
        mandatory: null,
        primaryKey: false,
        foreignKey: false,
        format: '',
        allowedValues: ['A', 'B', 'C', 'D', 'E', 'F'],
      });
      expect(lines).toEqual(['✓ Allowed values: A, B, C, D, E']);
    });
  });
});
