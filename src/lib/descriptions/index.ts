/**
 * Descriptions module - external column description catalogue and bounded lookups
 */

import { extname } from "node:path";
import type { ColumnDescription } from "../../types/data-model.js";
import type {
  DescriptionEntries,
  DescriptionLookup,
  DescriptionMatchKind,
} from "./types.js";
import { normalizeColumnName } from "../../utils/column-names.js";
import { readStructuredFile, readTextFile } from "../../utils/structured-file.js";
import { ConfigError, DescriptionLookupUnavailableError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";

const DEFAULT_SECTION = "General";
const BASE_NAME_SUFFIXES = /_(?:id|number|code)(?=_|$)/g;

/**
 * Strip identifier suffixes so "branch_code" and "branch" share a base name
 */
export function baseName(normalized: string): string {
  return normalized.replace(BASE_NAME_SUFFIXES, "");
}

/**
 * DescriptionCatalog - in-memory catalogue keyed by normalized column name.
 * Lookup order: exact key → partial key (containment either way) → base name.
 */
export class DescriptionCatalog implements DescriptionLookup {
  private readonly entries: ReadonlyMap<string, ColumnDescription>;

  constructor(entries: DescriptionEntries = {}) {
    const normalized = new Map<string, ColumnDescription>();
    for (const [key, entry] of Object.entries(entries)) {
      const normalizedKey = normalizeColumnName(key);
      if (normalizedKey) {
        normalized.set(normalizedKey, Object.freeze({ ...entry }));
      }
    }
    this.entries = normalized;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Resolve a column name, reporting which rule matched
   */
  resolve(
    columnName: string,
  ): { entry: ColumnDescription; kind: DescriptionMatchKind } | undefined {
    const normalized = normalizeColumnName(columnName);
    if (!normalized) return undefined;

    const exact = this.entries.get(normalized);
    if (exact) return { entry: exact, kind: "exact" };

    for (const [key, entry] of this.entries) {
      if (key.includes(normalized) || normalized.includes(key)) {
        return { entry, kind: "partial" };
      }
    }

    const base = baseName(normalized);
    for (const [key, entry] of this.entries) {
      if (baseName(key) === base) {
        return { entry, kind: "base" };
      }
    }

    return undefined;
  }

  lookupSync(columnName: string): ColumnDescription | undefined {
    return this.resolve(columnName)?.entry;
  }

  async lookup(columnName: string): Promise<ColumnDescription | undefined> {
    return this.lookupSync(columnName);
  }

  bySection(section: string): DescriptionEntries {
    const result: DescriptionEntries = {};
    for (const [key, entry] of this.entries) {
      if (entry.section.toLowerCase() === section.toLowerCase()) {
        result[key] = entry;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed `{ column: { description, section? } | "description" }` map
 *
 * @throws ConfigError when an entry has no description text
 */
export function parseDescriptionEntries(
  raw: unknown,
  source = "<inline>",
): DescriptionEntries {
  if (!isRecord(raw)) {
    throw new ConfigError("Description catalogue must be a mapping of column names", {
      source,
    });
  }

  const entries: DescriptionEntries = {};
  for (const [column, value] of Object.entries(raw)) {
    if (typeof value === "string") {
      entries[column] = { description: value, section: DEFAULT_SECTION };
      continue;
    }
    if (isRecord(value) && typeof value.description === "string") {
      entries[column] = {
        description: value.description,
        section: typeof value.section === "string" ? value.section : DEFAULT_SECTION,
      };
      continue;
    }
    throw new ConfigError(`Description entry "${column}" has no description text`, {
      source,
      column,
    });
  }
  return entries;
}

const MARKDOWN_ENTRY = /^([a-z_][a-z0-9_]*)\s+-\s+(.+)$/i;
const MARKDOWN_SECTION = /^(.+?)\s+Columns\b/i;

/**
 * Parse `column_name - description` lines; a line containing "<Section> Columns"
 * starts a new section.
 *
 * @example
 * parseMarkdownDescriptions("## Customer & Account Columns\ncustomer_id - Unique customer key")
 * // { customer_id: { description: "Unique customer key", section: "Customer and Account" } }
 */
export function parseMarkdownDescriptions(content: string): DescriptionEntries {
  const entries: DescriptionEntries = {};
  let section = DEFAULT_SECTION;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim().replace(/^(?:#+|[-*])\s+/, "");
    if (!line) continue;

    const heading = line.match(MARKDOWN_SECTION);
    if (heading && !MARKDOWN_ENTRY.test(line)) {
      section = (heading[1] ?? "").replace(/&/g, "and").trim() || DEFAULT_SECTION;
      continue;
    }

    const entry = line.match(MARKDOWN_ENTRY);
    if (entry?.[1] && entry[2]) {
      entries[entry[1].toLowerCase()] = {
        description: entry[2].trim(),
        section,
      };
    }
  }

  return entries;
}

/**
 * Load a catalogue from .yaml, .yml, .json or .md
 */
export function loadDescriptionCatalog(path: string): DescriptionCatalog {
  const ext = extname(path).toLowerCase();
  const entries =
    ext === ".md" || ext === ".markdown"
      ? parseMarkdownDescriptions(readTextFile(path))
      : parseDescriptionEntries(readStructuredFile(path), path);

  const catalog = new DescriptionCatalog(entries);
  logger.debug("Description catalogue loaded", { path, entries: catalog.size });
  return catalog;
}

/**
 * CachedDescriptionLookup - memoizes another lookup's answers, including misses.
 * Cached entries are read-only and safe to share between analyses.
 */
export class CachedDescriptionLookup implements DescriptionLookup {
  private readonly cache = new Map<string, Promise<ColumnDescription | undefined>>();

  constructor(private readonly inner: DescriptionLookup) {}

  lookup(columnName: string): Promise<ColumnDescription | undefined> {
    const key = normalizeColumnName(columnName);
    const cached = this.cache.get(key);
    if (cached) return cached;

    const pending = this.inner.lookup(columnName).then(
      (result) => (result ? Object.freeze({ ...result }) : undefined),
    );
    this.cache.set(key, pending);
    // Failed lookups are not remembered
    pending.catch(() => this.cache.delete(key));
    return pending;
  }

  clear(): void {
    this.cache.clear();
  }
}

/**
 * Look up a description with a bounded wait.
 * A timeout or a failing lookup logs a warning and resolves to undefined.
 */
export async function lookupWithTimeout(
  lookup: DescriptionLookup,
  columnName: string,
  timeoutMs: number,
): Promise<ColumnDescription | undefined> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(
        new DescriptionLookupUnavailableError(
          `Description lookup timed out after ${timeoutMs}ms`,
          { columnName, timeoutMs },
        ),
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([lookup.lookup(columnName), timeout]);
  } catch (error) {
    const unavailable =
      error instanceof DescriptionLookupUnavailableError
        ? error
        : new DescriptionLookupUnavailableError(
            "Description lookup failed",
            { columnName },
            { cause: error },
          );
    logger.warn(unavailable.message, {
      ...unavailable.details,
      ...(unavailable.cause ? { cause: String(unavailable.cause) } : {}),
    });
    return undefined;
  } finally {
    clearTimeout(timer);
  }
}
