/**
 * Version fields inside configuration artifacts (TOML manifests, JSON app descriptor).
 *
 * The post-commit hook treats every artifact as opaque text: it locates the old version with an
 * exact pattern and swaps in the new one. A file that is missing or has no match is a miss, not a failure.
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { Artifact, ArtifactFormat, ArtifactRewrite } from "../types/auto-version.js";

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export type CanonicalRead =
  | { ok: true; version: string }
  | { ok: false; reason: string };

/**
 * Read the version from the canonical manifest: first line starting with `version =`,
 * value taken between the first pair of double quotes.
 */
export function extractCanonicalVersion(text: string): string | null {
  for (const line of text.split(/\r?\n/)) {
    if (!line.startsWith("version =")) continue;
    const value = line.split('"')[1];
    return value ? value : null;
  }
  return null;
}

export function readCanonicalVersion(root: string, canonicalPath: string): CanonicalRead {
  const abs = join(root, canonicalPath);
  if (!existsSync(abs)) return { ok: false, reason: `${canonicalPath} does not exist` };
  const version = extractCanonicalVersion(readFileSync(abs, "utf-8"));
  if (!version) return { ok: false, reason: `no version line in ${canonicalPath}` };
  return { ok: true, version };
}

function versionPattern(format: ArtifactFormat, version: string): RegExp {
  const v = escapeRegExp(version);
  return format === "toml" ? new RegExp(`^version = "${v}"`, "gm") : new RegExp(`"version": "${v}"`, "g");
}

function versionField(format: ArtifactFormat, version: string): string {
  return format === "toml" ? `version = "${version}"` : `"version": "${version}"`;
}

/** Replace every version field holding `from` with `to`. */
export function substituteVersion(
  text: string,
  format: ArtifactFormat,
  from: string,
  to: string,
): { text: string; replacements: number } {
  let replacements = 0;
  const replacement = versionField(format, to);
  const out = text.replace(versionPattern(format, from), () => {
    replacements++;
    return replacement;
  });
  return { text: out, replacements };
}

/** Rewrite one artifact in place. The file is only written when something matched. */
export function rewriteArtifact(root: string, artifact: Artifact, from: string, to: string): ArtifactRewrite {
  const abs = join(root, artifact.path);
  if (!existsSync(abs)) {
    return { artifact: artifact.path, ok: false, miss: { artifact: artifact.path, reason: "missing-file" } };
  }
  const result = substituteVersion(readFileSync(abs, "utf-8"), artifact.format, from, to);
  if (result.replacements === 0) {
    return { artifact: artifact.path, ok: false, miss: { artifact: artifact.path, reason: "no-match" } };
  }
  writeFileSync(abs, result.text, "utf-8");
  return { artifact: artifact.path, ok: true, replacements: result.replacements };
}

const TOML_VERSION_RE = /^version\s*=\s*"([^"]+)"/m;

/** Version as stored in an artifact, or null when absent. JSON that fails to parse counts as absent. */
export function extractArtifactVersion(text: string, format: ArtifactFormat): string | null {
  if (format === "toml") {
    return TOML_VERSION_RE.exec(text)?.[1] ?? null;
  }
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return null;
  }
  if (data && typeof data === "object" && !Array.isArray(data) && "version" in data) {
    return typeof data.version === "string" ? data.version : null;
  }
  return null;
}
