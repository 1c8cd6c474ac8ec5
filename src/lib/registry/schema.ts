/**
 * JSON Schema (draft-07) for concept registry artifacts
 */

const DATA_TYPES = ["numeric", "decimal", "date", "text", "alphanumeric"];
const DOMAINS = ["Customer", "Account", "Loan", "Transaction"];

const nonEmptyString = { type: "string", minLength: 1 };

export const registryArtifactSchema = {
  type: "object",
  required: ["version", "domainRoles", "concepts"],
  additionalProperties: false,
  properties: {
    version: nonEmptyString,
    domainRoles: {
      type: "object",
      required: [...DOMAINS, "General"],
      additionalProperties: false,
      properties: Object.fromEntries(
        [...DOMAINS, "General"].map((domain) => [domain, nonEmptyString]),
      ),
    },
    concepts: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        required: [
          "conceptKey",
          "domain",
          "namePatterns",
          "dataPatterns",
          "isIdentifier",
          "businessRules",
        ],
        additionalProperties: false,
        properties: {
          conceptKey: { type: "string", pattern: "^[a-z][a-z0-9_]*$" },
          domain: { enum: DOMAINS },
          namePatterns: {
            type: "array",
            minItems: 1,
            items: { type: "string", pattern: "^[a-z0-9_]+$" },
          },
          dataPatterns: {
            type: "object",
            required: ["type", "uniqueness", "nullable"],
            additionalProperties: false,
            properties: {
              type: {
                type: "array",
                minItems: 1,
                uniqueItems: true,
                items: { enum: DATA_TYPES },
              },
              uniqueness: {
                enum: ["very_high", "high", "medium", "low", "very_low"],
              },
              length: {
                oneOf: [
                  {
                    type: "object",
                    required: ["exact"],
                    additionalProperties: false,
                    properties: { exact: { type: "integer", minimum: 1 } },
                  },
                  {
                    type: "object",
                    required: ["min", "max"],
                    additionalProperties: false,
                    properties: {
                      min: { type: "integer", minimum: 0 },
                      max: { type: "integer", minimum: 0 },
                    },
                  },
                ],
              },
              cardinality: {
                type: "object",
                required: ["max"],
                additionalProperties: false,
                properties: { max: { type: "integer", minimum: 1 } },
              },
              nullable: { type: "boolean" },
            },
          },
          isIdentifier: { type: "boolean" },
          workflowRole: nonEmptyString,
          businessRules: {
            type: "object",
            required: [
              "unique",
              "mandatory",
              "primaryKey",
              "foreignKey",
              "format",
              "allowedValues",
              "reason",
              "violationImpact",
            ],
            additionalProperties: false,
            properties: {
              unique: { type: "boolean" },
              mandatory: { type: "boolean" },
              primaryKey: { type: "boolean" },
              foreignKey: { type: "boolean" },
              format: { type: "string" },
              allowedValues: {
                anyOf: [
                  { type: "null" },
                  { type: "array", items: { type: "string" } },
                ],
              },
              reason: nonEmptyString,
              violationImpact: nonEmptyString,
            },
          },
        },
      },
    },
  },
};
