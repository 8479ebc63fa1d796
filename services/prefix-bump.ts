/**
 * Prefix-driven bump for manual or CI use: `release(...)` → major, `feature(...)` → minor, `fix(...)` → patch.
 * Updates the `[package]` version of TOML manifests and the `version` field of JSON descriptors.
 * Does not touch git.
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { CommitBumpConfig } from "../config.js";
import type { BumpKind } from "../types/auto-version.js";
import { extractArtifactVersion } from "./artifacts.js";
import { updateJsonVersion, updatePackageSectionVersion } from "./manifest-update.js";
import { bumpVersion, decidePrefixBump, formatVersion, parseVersion } from "./version.js";

export type PrefixBumpOpts = {
  message: string;
  /** Version to bump from instead of the current one */
  baseVersion?: string;
  dryRun?: boolean;
};

export type PrefixBumpResult =
  | { outcome: "no_bump" }
  | { outcome: "unchanged"; current: string }
  | { outcome: "bumped"; kind: BumpKind; from: string; to: string; current: string; updated: string[]; dryRun: boolean }
  | { outcome: "error"; error: string };

export function runPrefixBump(root: string, config: CommitBumpConfig, opts: PrefixBumpOpts): PrefixBumpResult {
  const kind = decidePrefixBump(opts.message);
  if (!kind) return { outcome: "no_bump" };

  const canonicalPath = join(root, config.canonical);
  if (!existsSync(canonicalPath)) {
    return { outcome: "error", error: `Could not find ${config.canonical}` };
  }
  const current = extractArtifactVersion(readFileSync(canonicalPath, "utf-8"), "toml");
  if (!current) {
    return { outcome: "error", error: `Could not find version in ${config.canonical}` };
  }

  const from = opts.baseVersion ?? current;
  const parsed = parseVersion(from);
  if (!parsed) {
    return { outcome: "error", error: `Invalid version format: ${from}` };
  }
  const to = formatVersion(bumpVersion(parsed, kind));
  if (to === current) {
    return { outcome: "unchanged", current };
  }

  // compute all, then write: an error leaves every file as it was
  const pending: { path: string; abs: string; text: string }[] = [];
  for (const artifact of config.artifacts) {
    const abs = join(root, artifact.path);
    if (!existsSync(abs)) continue;
    const text = readFileSync(abs, "utf-8");
    let next: { text: string; updated: boolean };
    try {
      next = artifact.format === "toml" ? updatePackageSectionVersion(text, to) : updateJsonVersion(text, to);
    } catch (err) {
      return { outcome: "error", error: `${artifact.path}: ${err instanceof Error ? err.message : String(err)}` };
    }
    if (next.updated) pending.push({ path: artifact.path, abs, text: next.text });
  }

  if (!opts.dryRun) {
    for (const p of pending) writeFileSync(p.abs, p.text, "utf-8");
  }
  const updated = pending.map((p) => p.path);

  return { outcome: "bumped", kind, from, to, current, updated, dryRun: opts.dryRun === true };
}
