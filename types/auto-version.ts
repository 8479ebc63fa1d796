/**
 * Shared types for version bumping: versions, decisions, artifacts and run outcomes.
 */

export type Version = {
  major: number;
  minor: number;
  patch: number;
};

/** Keyword rule used by the post-commit hook. Major is never bumped there. */
export const HOOK_BUMP_KINDS = ["minor", "patch"] as const;
export type HookBumpKind = (typeof HOOK_BUMP_KINDS)[number];

/** Prefix rule used by the `bump` command (release( / feature( / fix(). */
export const BUMP_KINDS = ["major", "minor", "patch"] as const;
export type BumpKind = (typeof BUMP_KINDS)[number];

export const ARTIFACT_FORMATS = ["toml", "json"] as const;
export type ArtifactFormat = (typeof ARTIFACT_FORMATS)[number];

export type Artifact = {
  /** Path relative to the repository root */
  path: string;
  format: ArtifactFormat;
};

export type SubstitutionMissReason = "missing-file" | "no-match";

export type SubstitutionMiss = {
  artifact: string;
  reason: SubstitutionMissReason;
};

export type ArtifactRewrite =
  | { artifact: string; ok: true; replacements: number }
  | { artifact: string; ok: false; miss: SubstitutionMiss };

export type HookOutcome =
  | { outcome: "reentrant" }
  | { outcome: "noop"; reason: string }
  | { outcome: "missing_version"; canonical: string; reason: string }
  | { outcome: "dry_run"; kind: HookBumpKind; from: string; to: string }
  | {
      outcome: "bumped";
      kind: HookBumpKind;
      from: string;
      to: string;
      /** Artifacts that were rewritten (and staged) */
      updated: string[];
      misses: SubstitutionMiss[];
      /** Every path handed to `git add` */
      staged: string[];
      lockRefreshed: boolean;
      amended: boolean;
      /** Set when `git add` or the amend failed */
      gitError?: string;
    };
