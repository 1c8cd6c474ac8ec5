import { fileURLToPath } from "node:url";
import { dirname, join, resolve } from "node:path";
import { existsSync, readFileSync } from "node:fs";
import { logger } from "./logger.js";

const moduleDir = dirname(fileURLToPath(import.meta.url));

const PACKAGE_NAME = "conceptlens";

function isPackageRoot(dir: string): boolean {
  const packageJsonPath = join(dir, "package.json");
  if (!existsSync(packageJsonPath)) return false;

  try {
    const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
    return (
      typeof pkg === "object" &&
      pkg !== null &&
      "name" in pkg &&
      pkg.name === PACKAGE_NAME
    );
  } catch {
    // Unreadable package.json: keep walking up
    return false;
  }
}

/**
 * Find the package root by walking up from this module until our package.json is found.
 * Works from both src/utils (tests) and dist/ (bundled build).
 */
function findPackageRoot(): string {
  let current = moduleDir;

  while (current !== dirname(current)) {
    if (isPackageRoot(current)) {
      return current;
    }
    current = dirname(current);
  }

  // Fallback: assume we're in src/utils
  return resolve(moduleDir, "..", "..");
}

export const PACKAGE_ROOT = findPackageRoot();

export const paths = {
  root: PACKAGE_ROOT,
  dataDir: join(PACKAGE_ROOT, "data"),
  defaultRegistry: join(PACKAGE_ROOT, "data", "concepts.yaml"),
  defaultDescriptions: join(PACKAGE_ROOT, "data", "column-descriptions.yaml"),
};

let cachedVersion: string | undefined;

/**
 * Version field of our package.json, "0.0.0" when it cannot be read
 */
export function packageVersion(): string {
  if (cachedVersion === undefined) {
    cachedVersion = "0.0.0";
    try {
      const pkg: unknown = JSON.parse(
        readFileSync(join(PACKAGE_ROOT, "package.json"), "utf-8"),
      );
      if (
        typeof pkg === "object" &&
        pkg !== null &&
        "version" in pkg &&
        typeof pkg.version === "string"
      ) {
        cachedVersion = pkg.version;
      }
    } catch (error) {
      logger.debug("Could not read package version", { error: String(error) });
    }
  }
  return cachedVersion;
}
