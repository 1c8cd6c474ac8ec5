/**
 * Description catalogue types
 */

import type { ColumnDescription } from "../../types/data-model.js";

/**
 * DescriptionLookup - Read-only source of human-authored column descriptions.
 * Resolving to undefined means no enrichment is available for the column.
 */
export interface DescriptionLookup {
  lookup(columnName: string): Promise<ColumnDescription | undefined>;
}

/**
 * Normalized column key → description entry
 */
export type DescriptionEntries = Record<string, ColumnDescription>;

export type DescriptionMatchKind = "exact" | "partial" | "base";
