/**
 * Tool version, read from package.json. Works from sources (package.json beside this file)
 * and from dist/ (package.json one level up).
 */

import { existsSync } from "node:fs";
import { createRequire } from "node:module";
import { fileURLToPath } from "node:url";

const require = createRequire(import.meta.url);

function readPackageVersion(): string {
  for (const candidate of ["./package.json", "../package.json"]) {
    if (!existsSync(fileURLToPath(new URL(candidate, import.meta.url)))) continue;
    const pkg: unknown = require(candidate);
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  }
  return "0.0.0";
}

/** Release version of commit-bump (from package.json). */
export const toolVersion: string = readPackageVersion();

export const versionInfo = {
  toolVersion,
} as const;

export default versionInfo;
