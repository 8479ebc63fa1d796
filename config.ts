import { existsSync, readFileSync } from "node:fs";
import { isAbsolute, join } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { Artifact } from "./types/auto-version.js";
import { DEFAULT_BUMP_KEYWORDS, type BumpKeywords } from "./services/version.js";

export const CONFIG_FILE_NAME = ".commitbumprc.json";

/** Environment variable the amend sets so the nested post-commit run exits immediately. */
export const GUARD_ENV = "COMMIT_BUMP_RUNNING";

export const DEFAULT_CANONICAL = "src-tauri/Cargo.toml";

/** Backend manifest, frontend manifest, app descriptor. Rewritten in this order. */
export const DEFAULT_ARTIFACTS: readonly Artifact[] = [
  { path: "src-tauri/Cargo.toml", format: "toml" },
  { path: "Cargo.toml", format: "toml" },
  { path: "src-tauri/tauri.conf.json", format: "json" },
];

export type LockRefreshConfig = {
  command: string;
  args: string[];
  /** Lock file staged alongside the artifacts when it exists */
  lockFile: string;
};

export const DEFAULT_LOCK_REFRESH: LockRefreshConfig = {
  command: "cargo",
  args: ["check", "--manifest-path", "src-tauri/Cargo.toml"],
  lockFile: "Cargo.lock",
};

export type ErrorReportingConfig = {
  enabled: boolean;
  consent: boolean;
  dsn?: string;
  environment: string;
  sampleRate: number; // 0.0-1.0
};

export type CommitBumpConfig = {
  canonical: string;
  artifacts: Artifact[];
  keywords: BumpKeywords;
  /** null disables the lock refresh */
  lockRefresh: LockRefreshConfig | null;
  errorReporting: ErrorReportingConfig;
};

const ArtifactSchema = Type.Object(
  {
    path: Type.String({ minLength: 1 }),
    format: Type.Union([Type.Literal("toml"), Type.Literal("json")]),
  },
  { additionalProperties: false },
);

export const configFileSchema = Type.Object(
  {
    canonical: Type.Optional(Type.String({ minLength: 1 })),
    artifacts: Type.Optional(Type.Array(ArtifactSchema, { minItems: 1 })),
    keywords: Type.Optional(
      Type.Object(
        {
          minor: Type.Optional(Type.Array(Type.String({ minLength: 1 }), { minItems: 1 })),
          patch: Type.Optional(Type.Array(Type.String({ minLength: 1 }), { minItems: 1 })),
        },
        { additionalProperties: false },
      ),
    ),
    lockRefresh: Type.Optional(
      Type.Union([
        Type.Null(),
        Type.Object(
          {
            command: Type.String({ minLength: 1 }),
            args: Type.Optional(Type.Array(Type.String())),
            lockFile: Type.Optional(Type.String({ minLength: 1 })),
          },
          { additionalProperties: false },
        ),
      ]),
    ),
    errorReporting: Type.Optional(
      Type.Object(
        {
          enabled: Type.Optional(Type.Boolean()),
          consent: Type.Optional(Type.Boolean()),
          dsn: Type.Optional(Type.String()),
          environment: Type.Optional(Type.String()),
          sampleRate: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
        },
        { additionalProperties: false },
      ),
    ),
  },
  { additionalProperties: false },
);

export type CommitBumpConfigFile = Static<typeof configFileSchema>;

export const commitBumpConfigSchema = {
  parse(value: unknown): CommitBumpConfig {
    if (value === null || typeof value !== "object" || Array.isArray(value)) {
      throw new Error(`${CONFIG_FILE_NAME} must contain a JSON object`);
    }
    if (!Value.Check(configFileSchema, value)) {
      const problems = [...Value.Errors(configFileSchema, value)].map(
        (e) => `${e.path || "/"}: ${e.message}`,
      );
      throw new Error(`Invalid ${CONFIG_FILE_NAME}: ${problems.join("; ")}`);
    }
    const cfg = value;

    const artifacts = cfg.artifacts ? cfg.artifacts.map((a) => ({ path: a.path, format: a.format })) : [...DEFAULT_ARTIFACTS];
    const canonical = cfg.canonical ?? DEFAULT_CANONICAL;
    const canonicalArtifact = artifacts.find((a) => a.path === canonical);
    if (!canonicalArtifact) {
      throw new Error(`canonical "${canonical}" must be listed in artifacts`);
    }
    if (canonicalArtifact.format !== "toml") {
      throw new Error(`canonical "${canonical}" must be a toml artifact`);
    }

    let lockRefresh: LockRefreshConfig | null;
    if (cfg.lockRefresh === null) {
      lockRefresh = null;
    } else if (cfg.lockRefresh) {
      lockRefresh = {
        command: cfg.lockRefresh.command,
        args: cfg.lockRefresh.args ?? [],
        lockFile: cfg.lockRefresh.lockFile ?? DEFAULT_LOCK_REFRESH.lockFile,
      };
    } else {
      lockRefresh = { ...DEFAULT_LOCK_REFRESH, args: [...DEFAULT_LOCK_REFRESH.args] };
    }

    const er = cfg.errorReporting;
    const dsn = er?.dsn?.trim();
    const errorReporting: ErrorReportingConfig = {
      enabled: er?.enabled === true,
      consent: er?.consent === true,
      ...(dsn ? { dsn } : {}),
      environment: er?.environment ?? "production",
      sampleRate: er?.sampleRate ?? 1.0,
    };

    return {
      canonical,
      artifacts,
      keywords: {
        minor: cfg.keywords?.minor ?? [...DEFAULT_BUMP_KEYWORDS.minor],
        patch: cfg.keywords?.patch ?? [...DEFAULT_BUMP_KEYWORDS.patch],
      },
      lockRefresh,
      errorReporting,
    };
  },
};

export type LoadedConfig = {
  config: CommitBumpConfig;
  /** File the config came from; null when defaults were used */
  source: string | null;
};

/**
 * Load config from an explicit path, or from `.commitbumprc.json` under root.
 * A missing default file means defaults; a missing explicit file is an error.
 */
export function loadConfig(root: string, explicitPath?: string): LoadedConfig {
  const path = explicitPath
    ? isAbsolute(explicitPath)
      ? explicitPath
      : join(root, explicitPath)
    : join(root, CONFIG_FILE_NAME);

  if (!existsSync(path)) {
    if (explicitPath) throw new Error(`Config file not found: ${path}`);
    return { config: commitBumpConfigSchema.parse({}), source: null };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new Error(`Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return { config: commitBumpConfigSchema.parse(raw), source: path };
}
