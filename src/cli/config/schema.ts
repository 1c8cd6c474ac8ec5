/**
 * JSON Schema for the configuration file
 */

export const configFileSchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    analysis: {
      type: "object",
      additionalProperties: false,
      properties: {
        minMatchScore: { type: "number" },
        eligibilityPenalty: { type: "number" },
        sampleSize: { type: "integer" },
        identifierUniquenessThreshold: { type: "number" },
        lookupTimeoutMs: { type: "number" },
      },
    },
    registry: {
      type: "object",
      additionalProperties: false,
      properties: { path: { type: "string" } },
    },
    descriptions: {
      type: "object",
      additionalProperties: false,
      properties: { path: { type: "string" } },
    },
    output: {
      type: "object",
      additionalProperties: false,
      properties: { dir: { type: "string" } },
    },
  },
} as const;
