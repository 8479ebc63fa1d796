/**
 * Reads the version stored in each artifact and compares it with the canonical one.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import type { CommitBumpConfig } from "../config.js";
import type { ArtifactFormat } from "../types/auto-version.js";
import { extractArtifactVersion } from "./artifacts.js";

export type ArtifactVersionStatus = "ok" | "missing-file" | "no-version" | "mismatch";

export type ArtifactVersionEntry = {
  path: string;
  format: ArtifactFormat;
  canonical: boolean;
  version: string | null;
  status: ArtifactVersionStatus;
};

export type ConsistencyReport = {
  canonicalVersion: string | null;
  consistent: boolean;
  artifacts: ArtifactVersionEntry[];
};

export function checkConsistency(root: string, config: CommitBumpConfig): ConsistencyReport {
  const read = config.artifacts.map((a) => {
    const abs = join(root, a.path);
    const exists = existsSync(abs);
    const version = exists ? extractArtifactVersion(readFileSync(abs, "utf-8"), a.format) : null;
    return { artifact: a, exists, version };
  });

  const canonicalVersion = read.find((r) => r.artifact.path === config.canonical)?.version ?? null;

  const artifacts = read.map(({ artifact, exists, version }): ArtifactVersionEntry => {
    let status: ArtifactVersionStatus;
    if (!exists) status = "missing-file";
    else if (version === null) status = "no-version";
    else if (canonicalVersion !== null && version !== canonicalVersion) status = "mismatch";
    else status = "ok";
    return {
      path: artifact.path,
      format: artifact.format,
      canonical: artifact.path === config.canonical,
      version,
      status,
    };
  });

  return {
    canonicalVersion,
    consistent: canonicalVersion !== null && artifacts.every((a) => a.status === "ok"),
    artifacts,
  };
}
