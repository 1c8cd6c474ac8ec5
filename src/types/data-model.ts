/**
 * Core data model types for ConceptLens
 * These structures flow through the per-column pipeline: profiling → eligibility → matching → scoring → rule derivation → summary
 */

/**
 * CellValue - One logical cell of a tabular dataset, independent of the source file type
 */
export type CellValue = string | number | null | undefined;

/**
 * ColumnarDataset - Ordered map of column name → cell values (insertion order is column order)
 */
export type ColumnarDataset = Map<string, CellValue[]>;

/**
 * DataType - Structural type detected for a column
 */
export type DataType = "numeric" | "decimal" | "date" | "text" | "alphanumeric";

/**
 * ColumnPatterns - Structural and statistical facts detected on a column's values.
 * Every field is optional: a fact that does not apply to the column's type is left out.
 */
export interface ColumnPatterns {
  // Length facts (text / alphanumeric only)
  minLength?: number;
  maxLength?: number;
  avgLength?: number;
  lengthStdDev?: number;
  fixedLength?: boolean;
  fixedLengthValue?: number;
  nearFixedLength?: boolean;
  typicalLength?: number;

  // Character-class facts over the pattern sample
  onlyDigits?: boolean;
  onlyDigitsRatio?: number;
  alphanumeric?: boolean;
  alphanumericRatio?: number;

  // Cardinality
  lowCardinality?: boolean;
  distinctValues?: Array<string | number>;

  // Dates
  dateFormat?: string;

  // Numeric range (numeric / decimal only)
  minValue?: number;
  maxValue?: number;
  meanValue?: number;
  medianValue?: number;
  hasNegative?: boolean;
  hasZero?: boolean;
  hasPositive?: boolean;
}

/**
 * ColumnProfile - Structural/statistical profile of one column, created once per analysis run
 */
export interface ColumnProfile {
  readonly columnName: string;
  readonly normalizedName: string;
  readonly keywords: readonly string[];
  readonly dataType: DataType;
  readonly totalRecords: number;
  readonly nonNullCount: number;
  readonly nullCount: number;
  readonly nullPercentage: number;
  readonly emptyCount: number;
  readonly emptyPercentage: number;
  readonly uniqueCount: number;
  readonly uniquenessPercentage: number;
  readonly patterns: Readonly<ColumnPatterns>;
}

/**
 * IdentifierEligibility - Whether a column is structurally allowed to be a unique identifier
 */
export interface IdentifierEligibility {
  isEligible: boolean;
  reason: string;
  uniquenessPct: number;
  hasFixedLength: boolean;
  hasStrictPattern: boolean;
  isDescriptive: boolean;
  isContact: boolean;
}

/**
 * Banking sub-area a concept belongs to. "General" is reserved for unidentified columns.
 */
export type ConceptDomain = "Customer" | "Account" | "Loan" | "Transaction";

export type UniquenessClass = "very_high" | "high" | "medium" | "low" | "very_low";

export type LengthExpectation =
  | { exact: number }
  | { min: number; max: number };

export interface DataPatternExpectation {
  type: readonly DataType[];
  uniqueness: UniquenessClass;
  length?: LengthExpectation;
  cardinality?: { max: number };
  nullable: boolean;
}

export interface BusinessRuleTemplate {
  unique: boolean;
  mandatory: boolean;
  primaryKey: boolean;
  foreignKey: boolean;
  format: string;
  allowedValues: readonly string[] | null;
  reason: string;
  violationImpact: string;
}

/**
 * ConceptDefinition - One registry entry describing a banking concept
 */
export interface ConceptDefinition {
  conceptKey: string;
  domain: ConceptDomain;
  namePatterns: readonly string[];
  dataPatterns: DataPatternExpectation;
  isIdentifier: boolean;
  businessRules: BusinessRuleTemplate;
  workflowRole?: string;
}

export const UNKNOWN_CONCEPT = "unknown";

/**
 * ConceptMatch - Best registry entry for a column (or "unknown")
 */
export interface ConceptMatch {
  conceptKey: string;
  displayLabel: string;
  domain: ConceptDomain | "General";
  /** Raw, unclamped score */
  matchScore: number;
  definition: ConceptDefinition | null;
}

/**
 * DerivedRules - Rule set applied to a column. `null` means the rule could not be determined.
 */
export interface DerivedRules {
  unique: boolean | null;
  mandatory: boolean | null;
  primaryKey: boolean;
  foreignKey: boolean;
  format: string;
  allowedValues: readonly string[] | null;
}

export interface BusinessRuleExplanation {
  businessMeaning: string;
  rules: DerivedRules;
  rulesDisplay: string[];
  whyRuleExists: string;
  violationImpact: string;
  workflowRole: string;
}

/**
 * ColumnDescription - Human-authored description from an external catalogue
 */
export interface ColumnDescription {
  description: string;
  section: string;
}

/**
 * ColumnAnalysisResult - Unit returned to callers, one per input column
 */
export interface ColumnAnalysisResult extends BusinessRuleExplanation {
  columnName: string;
  profile: ColumnProfile;
  eligibility: IdentifierEligibility;
  match: ConceptMatch;
  conceptKey: string;
  displayLabel: string;
  domain: ConceptDomain | "General";
  confidence: number;
  description?: ColumnDescription;
}

/**
 * DatasetSummary - Aggregate statistics over all column results
 */
export interface DatasetSummary {
  totalColumns: number;
  identifiedColumns: number;
  unidentifiedColumns: number;
  identificationRate: number;
  averageConfidence: number;
  domainDistribution: Record<string, number>;
  identifierCount: number;
}

export interface DatasetAnalysis {
  columnsAnalysis: ColumnAnalysisResult[];
  summary: DatasetSummary;
}
