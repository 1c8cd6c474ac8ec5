/**
 * Loader module - reads dataset files into an ordered column map
 */

import { extname } from "node:path";
import type { CellValue, ColumnarDataset } from "../../types/data-model.js";
import { readTextFile } from "../../utils/structured-file.js";
import { InputReadError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export type DatasetFormat = "json" | "ndjson";

export function detectDatasetFormat(filePath: string): DatasetFormat | null {
  const ext = extname(filePath).toLowerCase();
  if (ext === ".json") return "json";
  if (ext === ".ndjson" || ext === ".jsonl") return "ndjson";
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Booleans become text, nested values JSON text, anything absent null
 */
export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number") return value;
  if (typeof value === "boolean" || typeof value === "bigint") return String(value);
  return JSON.stringify(value);
}

/**
 * Build columns from row objects; column order is first appearance,
 * and rows without a column get null there
 */
export function rowsToColumns(rows: readonly Record<string, unknown>[]): ColumnarDataset {
  const columns: ColumnarDataset = new Map();

  rows.forEach((row, rowIndex) => {
    for (const key of Object.keys(row)) {
      if (!columns.has(key)) {
        columns.set(key, new Array<CellValue>(rowIndex).fill(null));
      }
    }
    for (const [key, cells] of columns) {
      cells.push(toCellValue(row[key]));
    }
  });

  return columns;
}

/**
 * Accept `{ column: [values] }` or `[ { row } ]`
 */
export function parseDatasetJson(raw: unknown, source = "<inline>"): ColumnarDataset {
  if (Array.isArray(raw)) {
    const rows: Record<string, unknown>[] = [];
    raw.forEach((row, index) => {
      if (!isRecord(row)) {
        throw new InputReadError(`Row ${index + 1} is not an object`, { source, row: index + 1 });
      }
      rows.push(row);
    });
    return rowsToColumns(rows);
  }

  if (isRecord(raw)) {
    const columns: ColumnarDataset = new Map();
    for (const [column, values] of Object.entries(raw)) {
      if (!Array.isArray(values)) {
        throw new InputReadError(`Column "${column}" is not an array of values`, {
          source,
          column,
        });
      }
      columns.set(column, values.map(toCellValue));
    }
    return columns;
  }

  throw new InputReadError("Dataset must be an array of rows or a map of columns", {
    source,
  });
}

/**
 * One JSON row object per non-blank line
 */
export function parseNdjson(content: string, source = "<inline>"): ColumnarDataset {
  const rows: Record<string, unknown>[] = [];

  content.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === "") return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      throw new InputReadError(
        `Invalid JSON on line ${index + 1}`,
        { source, line: index + 1 },
        { cause: error },
      );
    }
    if (!isRecord(parsed)) {
      throw new InputReadError(`Line ${index + 1} is not a JSON object`, {
        source,
        line: index + 1,
      });
    }
    rows.push(parsed);
  });

  return rowsToColumns(rows);
}

/**
 * Read a dataset file
 *
 * @throws InputReadError when the file cannot be read, has an unsupported extension or is malformed
 */
export function loadDataset(filePath: string): ColumnarDataset {
  const format = detectDatasetFormat(filePath);
  if (!format) {
    throw new InputReadError(
      `Unsupported dataset format: ${filePath}. Must be .json, .ndjson, or .jsonl`,
      { filePath },
    );
  }

  let content: string;
  try {
    content = readTextFile(filePath);
  } catch (error) {
    throw new InputReadError(`Failed to read dataset: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  let dataset: ColumnarDataset;
  if (format === "ndjson") {
    dataset = parseNdjson(content, filePath);
  } else {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new InputReadError(`Failed to parse dataset: ${filePath}`, { filePath }, {
        cause: error,
      });
    }
    dataset = parseDatasetJson(raw, filePath);
  }

  logger.info("Dataset loaded", { filePath, format, columns: dataset.size });
  return dataset;
}
