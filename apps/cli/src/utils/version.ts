import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

interface PackageJson {
  version?: string;
}

const FALLBACK_VERSION = "0.0.0";

const isPackageJson = (value: unknown): value is PackageJson =>
  typeof value === "object" &&
  value !== null &&
  (!("version" in value) || typeof value.version === "string");

/**
 * Version of the CLI package, read from its package.json.
 * Works from src/ (tests) and dist/ (built) alike.
 */
export const getVersion = (): string => {
  try {
    const here = dirname(fileURLToPath(import.meta.url));
    const pkgPath = join(here, "..", "..", "package.json");
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    if (!isPackageJson(pkg)) {
      return FALLBACK_VERSION;
    }
    return pkg.version ?? FALLBACK_VERSION;
  } catch {
    return FALLBACK_VERSION;
  }
};
