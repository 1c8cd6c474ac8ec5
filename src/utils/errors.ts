/**
 * Standard error classes for ConceptLens
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  REGISTRY_ERROR = "REGISTRY_ERROR",
  EMPTY_DATASET = "EMPTY_DATASET",
  INPUT_READ_ERROR = "INPUT_READ_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  DESCRIPTION_LOOKUP_UNAVAILABLE = "DESCRIPTION_LOOKUP_UNAVAILABLE",
}

export type ErrorDetails = Record<string, unknown>;

export interface ErrorResponse {
  status: "error";
  phase: string;
  error: {
    code: ErrorCode;
    message: string;
    details?: ErrorDetails;
    cause?: string;
  };
}

export class ConceptLensError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ConceptLensError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string): ErrorResponse {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

/**
 * Raised when a dataset has no columns or no rows; nothing can be summarized
 */
export class EmptyDatasetError extends ConceptLensError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.EMPTY_DATASET, message, details, options);
    this.name = "EmptyDatasetError";
  }
}

export class ConfigError extends ConceptLensError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class RegistryError extends ConceptLensError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.REGISTRY_ERROR, message, details, options);
    this.name = "RegistryError";
  }
}

export class InputReadError extends ConceptLensError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.INPUT_READ_ERROR, message, details, options);
    this.name = "InputReadError";
  }
}

export class FileIOError extends ConceptLensError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

/**
 * Non-fatal: the analysis carries on with registry-only text
 */
export class DescriptionLookupUnavailableError extends ConceptLensError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.DESCRIPTION_LOOKUP_UNAVAILABLE, message, details, options);
    this.name = "DescriptionLookupUnavailableError";
  }
}

/**
 * Wrap any thrown value into a ConceptLensError
 */
export function toConceptLensError(error: unknown): ConceptLensError {
  if (error instanceof ConceptLensError) {
    return error;
  }
  return new ConceptLensError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}
