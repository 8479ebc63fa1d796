import { describe, it, expect, afterEach } from "vitest";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { commitBumpConfigSchema, type CommitBumpConfig } from "../config.js";
import { guardedEnv, isGuardActive, runAutoVersion, type AutoVersionContext } from "../services/auto-version.js";
import type { Logger } from "../utils/logger.js";
import {
  appDescriptor,
  backendManifest,
  fakeGit,
  fakeRunner,
  frontendManifest,
  makeRepo,
  readRepoFile,
  removeRepo,
  type FakeGit,
  type RepoFiles,
} from "./fixtures.js";

const DEFAULT_STAGED = ["src-tauri/Cargo.toml", "Cargo.toml", "src-tauri/tauri.conf.json"];

let root: string | undefined;

afterEach(() => {
  if (root) removeRepo(root);
  root = undefined;
});

function recordingLogger() {
  const lines: string[] = [];
  const logger: Logger = {
    info: (m) => lines.push(`info ${m}`),
    warn: (m) => lines.push(`warn ${m}`),
    error: (m) => lines.push(`error ${m}`),
  };
  return { logger, lines };
}

function setup(opts: {
  version: string;
  message: string | null;
  files?: RepoFiles;
  config?: CommitBumpConfig;
  env?: NodeJS.ProcessEnv;
  runnerStatus?: number | null;
  dryRun?: boolean;
  git?: (root: string) => FakeGit;
}) {
  const repo = makeRepo(opts.version, opts.files);
  root = repo;
  const git = opts.git ? opts.git(repo) : fakeGit(repo, opts.message);
  const { runner, run } = fakeRunner(opts.runnerStatus ?? 0);
  const { logger, lines } = recordingLogger();
  const ctx: AutoVersionContext = {
    root: repo,
    config: opts.config ?? commitBumpConfigSchema.parse({}),
    git,
    runner,
    env: opts.env ?? { PATH: "/usr/bin" },
    logger,
    dryRun: opts.dryRun,
  };
  return { repo, git, run, lines, ctx };
}

// ---------------------------------------------------------------------------
// Guard
// ---------------------------------------------------------------------------

describe("re-entrancy guard", () => {
  it("isGuardActive only for the exact value 1", () => {
    expect(isGuardActive({ COMMIT_BUMP_RUNNING: "1" })).toBe(true);
    expect(isGuardActive({ COMMIT_BUMP_RUNNING: "0" })).toBe(false);
    expect(isGuardActive({ COMMIT_BUMP_RUNNING: "true" })).toBe(false);
    expect(isGuardActive({})).toBe(false);
  });

  it("guardedEnv adds the flag without mutating the input", () => {
    const env = { PATH: "/usr/bin" };
    expect(guardedEnv(env)).toEqual({ PATH: "/usr/bin", COMMIT_BUMP_RUNNING: "1" });
    expect(env).toEqual({ PATH: "/usr/bin" });
  });

  it("a guarded run is a no-op even with trigger tokens", () => {
    const { ctx, git, run, repo, lines } = setup({
      version: "0.4.7",
      message: "feature and fix",
      env: { COMMIT_BUMP_RUNNING: "1" },
    });
    expect(runAutoVersion(ctx)).toEqual({ outcome: "reentrant" });
    expect(readRepoFile(repo, "src-tauri/Cargo.toml")).toBe(backendManifest("0.4.7"));
    expect(git.added).toEqual([]);
    expect(git.amendEnvs).toEqual([]);
    expect(run).not.toHaveBeenCalled();
    expect(lines).toEqual([]);
  });

  it("the nested run triggered by the amend sees the guard", () => {
    const { ctx, git } = setup({ version: "0.4.7", message: "fix crash on startup" });
    runAutoVersion(ctx);
    const nestedEnv = git.amendEnvs[0];
    expect(nestedEnv).toBeDefined();
    expect(runAutoVersion({ ...ctx, env: nestedEnv ?? {} })).toEqual({ outcome: "reentrant" });
  });
});

// ---------------------------------------------------------------------------
// Decisions
// ---------------------------------------------------------------------------

describe("runAutoVersion: no-op paths", () => {
  it("message without keywords: no writes, no amend", () => {
    const { ctx, git, run, repo } = setup({ version: "0.5.0", message: "update README" });
    expect(runAutoVersion(ctx)).toEqual({ outcome: "noop", reason: "no bump keyword in commit message" });
    expect(readRepoFile(repo, "src-tauri/Cargo.toml")).toBe(backendManifest("0.5.0"));
    expect(readRepoFile(repo, "Cargo.toml")).toBe(frontendManifest("0.5.0"));
    expect(readRepoFile(repo, "src-tauri/tauri.conf.json")).toBe(appDescriptor("0.5.0"));
    expect(git.added).toEqual([]);
    expect(git.amendEnvs).toEqual([]);
    expect(run).not.toHaveBeenCalled();
  });

  it("unreadable commit message: no-op", () => {
    const { ctx, git } = setup({ version: "0.5.0", message: null });
    expect(runAutoVersion(ctx)).toEqual({ outcome: "noop", reason: "could not read the last commit message" });
    expect(git.amendEnvs).toEqual([]);
  });
});

describe("runAutoVersion: missing version", () => {
  it("missing canonical manifest aborts with no changes", () => {
    const { ctx, git, repo, lines } = setup({
      version: "0.4.7",
      message: "fix crash",
      files: { "src-tauri/Cargo.toml": null },
    });
    expect(runAutoVersion(ctx)).toEqual({
      outcome: "missing_version",
      canonical: "src-tauri/Cargo.toml",
      reason: "src-tauri/Cargo.toml does not exist",
    });
    expect(lines).toEqual(["warn Could not find version in src-tauri/Cargo.toml"]);
    expect(readRepoFile(repo, "Cargo.toml")).toBe(frontendManifest("0.4.7"));
    expect(git.amendEnvs).toEqual([]);
  });

  it("unparseable canonical version aborts with no changes", () => {
    const { ctx, git, repo } = setup({
      version: "0.4.7",
      message: "fix crash",
      files: { "src-tauri/Cargo.toml": '[package]\nversion = "0.4.7-beta"\n' },
    });
    expect(runAutoVersion(ctx)).toEqual({
      outcome: "missing_version",
      canonical: "src-tauri/Cargo.toml",
      reason: '"0.4.7-beta" is not major.minor.patch',
    });
    expect(readRepoFile(repo, "src-tauri/tauri.conf.json")).toBe(appDescriptor("0.4.7"));
    expect(git.added).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Bumps
// ---------------------------------------------------------------------------

describe("runAutoVersion: bumps", () => {
  it('"Add new feature: cascii export" on 0.4.7 → 0.5.0 in all three artifacts, amended', () => {
    const { ctx, git, run, repo, lines } = setup({ version: "0.4.7", message: "Add new feature: cascii export" });

    const outcome = runAutoVersion(ctx);

    expect(outcome).toEqual({
      outcome: "bumped",
      kind: "minor",
      from: "0.4.7",
      to: "0.5.0",
      updated: DEFAULT_STAGED,
      misses: [],
      staged: DEFAULT_STAGED,
      lockRefreshed: true,
      amended: true,
    });
    expect(readRepoFile(repo, "src-tauri/Cargo.toml")).toBe(backendManifest("0.5.0"));
    expect(readRepoFile(repo, "Cargo.toml")).toBe(frontendManifest("0.5.0"));
    expect(readRepoFile(repo, "src-tauri/tauri.conf.json")).toBe(appDescriptor("0.5.0"));
    expect(run).toHaveBeenCalledWith("cargo", ["check", "--manifest-path", "src-tauri/Cargo.toml"], { cwd: repo });
    expect(git.added).toEqual([DEFAULT_STAGED]);
    expect(git.amendEnvs).toEqual([{ PATH: "/usr/bin", COMMIT_BUMP_RUNNING: "1" }]);
    expect(lines).toEqual(["info Auto-bumping version (minor) from 0.4.7 to 0.5.0"]);
  });

  it('"fix crash on startup" on 0.5.0 → 0.5.1', () => {
    const { ctx, repo } = setup({ version: "0.5.0", message: "fix crash on startup" });
    const outcome = runAutoVersion(ctx);
    expect(outcome.outcome).toBe("bumped");
    if (outcome.outcome !== "bumped") return;
    expect(outcome.kind).toBe("patch");
    expect(outcome.to).toBe("0.5.1");
    expect(readRepoFile(repo, "Cargo.toml")).toBe(frontendManifest("0.5.1"));
  });

  it("successive runs: 1.2.3 → minor 1.3.0 → patch 1.3.1", () => {
    const first = setup({ version: "1.2.3", message: "feature: export" });
    runAutoVersion(first.ctx);
    const second = runAutoVersion({ ...first.ctx, git: fakeGit(first.repo, "fix: export") });
    expect(second).toMatchObject({ outcome: "bumped", from: "1.3.0", to: "1.3.1" });
    expect(readRepoFile(first.repo, "src-tauri/tauri.conf.json")).toBe(appDescriptor("1.3.1"));
  });

  it("stages the lock file when it exists", () => {
    const { ctx, git } = setup({
      version: "0.4.7",
      message: "fix",
      files: { "Cargo.lock": "# lock\n" },
    });
    const outcome = runAutoVersion(ctx);
    expect(outcome).toMatchObject({ staged: [...DEFAULT_STAGED, "Cargo.lock"] });
    expect(git.added).toEqual([[...DEFAULT_STAGED, "Cargo.lock"]]);
  });

  it("a failing lock refresh is a warning; artifacts are still staged and amended", () => {
    const { ctx, git, lines } = setup({ version: "0.4.7", message: "fix", runnerStatus: 101 });
    const outcome = runAutoVersion(ctx);
    expect(outcome).toMatchObject({ outcome: "bumped", lockRefreshed: false, amended: true });
    expect(lines).toContain(
      'warn lock refresh "cargo check --manifest-path src-tauri/Cargo.toml" failed (exit 101)',
    );
    expect(git.amendEnvs).toHaveLength(1);
  });

  it("lockRefresh: null skips the refresh", () => {
    const { ctx, run, repo } = setup({
      version: "0.4.7",
      message: "fix",
      config: commitBumpConfigSchema.parse({ lockRefresh: null }),
    });
    writeFileSync(join(repo, "Cargo.lock"), "# lock\n");
    const outcome = runAutoVersion(ctx);
    expect(run).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({ lockRefreshed: false, staged: DEFAULT_STAGED });
  });
});

// ---------------------------------------------------------------------------
// Best-effort propagation
// ---------------------------------------------------------------------------

describe("runAutoVersion: substitution misses", () => {
  it("a lagging artifact is reported, skipped from staging, and the amend still happens", () => {
    const { ctx, git, repo, lines } = setup({
      version: "0.4.7",
      message: "feature: frames",
      files: { "src-tauri/tauri.conf.json": appDescriptor("0.4.6") },
    });

    const outcome = runAutoVersion(ctx);

    expect(outcome).toMatchObject({
      outcome: "bumped",
      to: "0.5.0",
      updated: ["src-tauri/Cargo.toml", "Cargo.toml"],
      misses: [{ artifact: "src-tauri/tauri.conf.json", reason: "no-match" }],
      amended: true,
    });
    expect(lines).toContain("warn version 0.4.7 not updated in src-tauri/tauri.conf.json (no-match)");
    expect(readRepoFile(repo, "src-tauri/tauri.conf.json")).toBe(appDescriptor("0.4.6"));
    expect(git.added).toEqual([["src-tauri/Cargo.toml", "Cargo.toml"]]);
  });

  it("a missing secondary artifact is reported as missing-file", () => {
    const { ctx, lines } = setup({ version: "0.4.7", message: "fix", files: { "Cargo.toml": null } });
    const outcome = runAutoVersion(ctx);
    expect(outcome).toMatchObject({ misses: [{ artifact: "Cargo.toml", reason: "missing-file" }] });
    expect(lines).toContain("warn version 0.4.7 not updated in Cargo.toml (missing-file)");
  });
});

// ---------------------------------------------------------------------------
// Git failures and dry run
// ---------------------------------------------------------------------------

describe("runAutoVersion: git failures", () => {
  it("a failed amend is logged and returned, not thrown", () => {
    const { ctx, lines } = setup({
      version: "0.4.7",
      message: "fix",
      git: (repo) => fakeGit(repo, "fix", { amend: { ok: false, error: "git commit --amend exited with 1" } }),
    });
    const outcome = runAutoVersion(ctx);
    expect(outcome).toMatchObject({ outcome: "bumped", amended: false, gitError: "git commit --amend exited with 1" });
    expect(lines).toContain("error git commit --amend exited with 1");
  });

  it("a failed add still attempts the amend and joins both errors", () => {
    const { ctx, git } = setup({
      version: "0.4.7",
      message: "fix",
      git: (repo) =>
        fakeGit(repo, "fix", {
          add: { ok: false, error: "git add exited with 128" },
          amend: { ok: false, error: "git commit --amend exited with 1" },
        }),
    });
    const outcome = runAutoVersion(ctx);
    expect(outcome).toMatchObject({ gitError: "git add exited with 128; git commit --amend exited with 1" });
    expect(git.amendEnvs).toHaveLength(1);
  });
});

describe("runAutoVersion: dry run", () => {
  it("reports the next version without touching files or git", () => {
    const { ctx, git, run, repo, lines } = setup({ version: "0.4.7", message: "feature", dryRun: true });
    expect(runAutoVersion(ctx)).toEqual({ outcome: "dry_run", kind: "minor", from: "0.4.7", to: "0.5.0" });
    expect(readRepoFile(repo, "src-tauri/Cargo.toml")).toBe(backendManifest("0.4.7"));
    expect(run).not.toHaveBeenCalled();
    expect(git.added).toEqual([]);
    expect(git.amendEnvs).toEqual([]);
    expect(lines).toEqual(["info [dry-run] would bump version (minor) from 0.4.7 to 0.5.0"]);
  });
});
