import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

function readPackageVersion(relativePath: string): string | undefined {
  const pkg: unknown = JSON.parse(readFileSync(fileURLToPath(new URL(relativePath, import.meta.url)), "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return undefined;
}

/**
 * Library version (single source of truth)
 *
 * Read from package.json relative to this file, which sits one level below
 * the root in src/ and two levels below it in dist/src/.
 */
export const LIBRARY_VERSION =
  process.env.DEP2CON_VERSION ??
  ((): string => {
    try {
      return readPackageVersion("../package.json") ?? "0.0.0";
    } catch {
      try {
        return readPackageVersion("../../package.json") ?? "0.0.0";
      } catch {
        return "0.0.0";
      }
    }
  })();
