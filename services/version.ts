/**
 * Version parsing, formatting and bump rules.
 *
 * Two decision rules exist:
 * - keyword rule (post-commit hook): case-insensitive substring search, minor keywords win over patch keywords
 * - prefix rule (`bump` command): `release(` → major, `feature(` → minor, `fix(` → patch
 */

import type { BumpKind, HookBumpKind, Version } from "../types/auto-version.js";

const VERSION_RE = /^(\d+)\.(\d+)\.(\d+)$/;

/** Parse "major.minor.patch". Returns null for anything else (no pre-release or build suffixes). */
export function parseVersion(input: string): Version | null {
  const match = VERSION_RE.exec(input.trim());
  if (!match) return null;
  const major = Number.parseInt(match[1], 10);
  const minor = Number.parseInt(match[2], 10);
  const patch = Number.parseInt(match[3], 10);
  if (![major, minor, patch].every(Number.isSafeInteger)) return null;
  return { major, minor, patch };
}

export function formatVersion(v: Version): string {
  return `${v.major}.${v.minor}.${v.patch}`;
}

export function bumpVersion(v: Version, kind: BumpKind): Version {
  switch (kind) {
    case "major":
      return { major: v.major + 1, minor: 0, patch: 0 };
    case "minor":
      return { major: v.major, minor: v.minor + 1, patch: 0 };
    case "patch":
      return { major: v.major, minor: v.minor, patch: v.patch + 1 };
  }
}

export type BumpKeywords = {
  minor: string[];
  patch: string[];
};

export const DEFAULT_BUMP_KEYWORDS: BumpKeywords = {
  minor: ["feature"],
  patch: ["fix"],
};

function containsAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some((n) => n.length > 0 && haystack.includes(n.toLowerCase()));
}

/**
 * Keyword rule for the post-commit hook. Substring match, so "prefix" counts as "fix".
 */
export function decideHookBump(
  message: string,
  keywords: BumpKeywords = DEFAULT_BUMP_KEYWORDS,
): HookBumpKind | null {
  const lower = message.toLowerCase();
  if (containsAny(lower, keywords.minor)) return "minor";
  if (containsAny(lower, keywords.patch)) return "patch";
  return null;
}

const PREFIX_RULES: ReadonlyArray<readonly [prefix: string, kind: BumpKind]> = [
  ["release(", "major"],
  ["feature(", "minor"],
  ["fix(", "patch"],
];

/** Prefix rule for the `bump` command. */
export function decidePrefixBump(message: string): BumpKind | null {
  const normalized = message.trim().toLowerCase();
  for (const [prefix, kind] of PREFIX_RULES) {
    if (normalized.startsWith(prefix)) return kind;
  }
  return null;
}
