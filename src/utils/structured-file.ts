/**
 * Read JSON or YAML files into plain values
 */

import { readFileSync } from "node:fs";
import { extname } from "node:path";
import { parse as parseYaml } from "yaml";
import { FileIOError } from "./errors.js";

export type StructuredFormat = "json" | "yaml";

export function detectStructuredFormat(filePath: string): StructuredFormat | null {
  const ext = extname(filePath).toLowerCase();
  if (ext === ".yaml" || ext === ".yml") return "yaml";
  if (ext === ".json") return "json";
  return null;
}

export function readTextFile(filePath: string): string {
  try {
    return readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }
}

/**
 * Parse a .json, .yaml or .yml file. The caller validates the shape.
 *
 * @throws FileIOError when the file cannot be read, has an unsupported extension or does not parse
 */
export function readStructuredFile(filePath: string): unknown {
  const format = detectStructuredFormat(filePath);
  if (!format) {
    throw new FileIOError(
      `Unsupported file format: ${filePath}. Must be .json, .yaml, or .yml`,
      { filePath },
    );
  }

  const content = readTextFile(filePath);

  try {
    return format === "yaml" ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new FileIOError(`Failed to parse ${format} file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }
}
