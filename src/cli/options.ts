/**
 * Shared option parsers and exit codes for CLI commands
 */

import { InvalidArgumentError } from "commander";
import { type LogLevel, isLogLevel } from "../utils/logger.js";
import { type ConceptLensError, ErrorCode } from "../utils/errors.js";

export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

export function parseIntOption(value: string): number {
  const parsed = parseNumberOption(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

export function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError("Use one of: error, warn, info, debug.");
  }
  return value;
}

/**
 * Configuration and registry problems exit with 2, everything else with 1
 */
export function exitCodeFor(error: ConceptLensError): number {
  return error.code === ErrorCode.CONFIG_ERROR || error.code === ErrorCode.REGISTRY_ERROR
    ? 2
    : 1;
}
