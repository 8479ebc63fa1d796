/**
 * Post-commit auto-versioning.
 *
 * Idle → message inspected → (noop | bumping) → artifacts rewritten → commit amended.
 * There is no rollback: a partial rewrite is still staged and amended.
 * Nothing here throws for expected conditions; every path ends in a HookOutcome.
 */

import { existsSync } from "node:fs";
import { join } from "node:path";
import { GUARD_ENV, type CommitBumpConfig } from "../config.js";
import type { HookOutcome, SubstitutionMiss } from "../types/auto-version.js";
import type { Logger } from "../utils/logger.js";
import { readCanonicalVersion, rewriteArtifact } from "./artifacts.js";
import type { CommandRunner, GitClient } from "./git.js";
import { bumpVersion, decideHookBump, formatVersion, parseVersion } from "./version.js";

export type AutoVersionContext = {
  root: string;
  config: CommitBumpConfig;
  git: GitClient;
  runner: CommandRunner;
  /** Environment the process was started with; the guard flag is read from here */
  env: NodeJS.ProcessEnv;
  logger: Logger;
  dryRun?: boolean;
};

export function isGuardActive(env: NodeJS.ProcessEnv): boolean {
  return env[GUARD_ENV] === "1";
}

/** Environment for the amending `git commit`: the caller's env plus the guard flag. */
export function guardedEnv(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  return { ...env, [GUARD_ENV]: "1" };
}

export function runAutoVersion(ctx: AutoVersionContext): HookOutcome {
  const { root, config, git, runner, env, logger } = ctx;

  if (isGuardActive(env)) {
    return { outcome: "reentrant" };
  }

  const message = git.lastCommitMessage();
  if (message === null) {
    return { outcome: "noop", reason: "could not read the last commit message" };
  }

  const kind = decideHookBump(message, config.keywords);
  if (!kind) {
    return { outcome: "noop", reason: "no bump keyword in commit message" };
  }

  const canonical = readCanonicalVersion(root, config.canonical);
  if (!canonical.ok) {
    logger.warn(`Could not find version in ${config.canonical}`);
    return { outcome: "missing_version", canonical: config.canonical, reason: canonical.reason };
  }
  const current = parseVersion(canonical.version);
  if (!current) {
    logger.warn(`Could not find version in ${config.canonical}`);
    return {
      outcome: "missing_version",
      canonical: config.canonical,
      reason: `"${canonical.version}" is not major.minor.patch`,
    };
  }

  const from = canonical.version;
  const to = formatVersion(bumpVersion(current, kind));

  if (ctx.dryRun) {
    logger.info(`[dry-run] would bump version (${kind}) from ${from} to ${to}`);
    return { outcome: "dry_run", kind, from, to };
  }

  logger.info(`Auto-bumping version (${kind}) from ${from} to ${to}`);

  const updated: string[] = [];
  const misses: SubstitutionMiss[] = [];
  for (const artifact of config.artifacts) {
    const result = rewriteArtifact(root, artifact, from, to);
    if (result.ok) {
      updated.push(result.artifact);
    } else {
      misses.push(result.miss);
      logger.warn(`version ${from} not updated in ${result.miss.artifact} (${result.miss.reason})`);
    }
  }

  let lockRefreshed = false;
  const staged = [...updated];
  if (config.lockRefresh) {
    const { command, args, lockFile } = config.lockRefresh;
    const res = runner.run(command, args, { cwd: root });
    lockRefreshed = res.status === 0;
    if (!lockRefreshed) {
      logger.warn(`lock refresh "${[command, ...args].join(" ")}" failed${res.error ? `: ${res.error}` : ` (exit ${res.status ?? "signal"})`}`);
    }
    if (existsSync(join(root, lockFile))) staged.push(lockFile);
  }

  const added = git.add(staged);
  let gitError = added.ok ? undefined : added.error;
  if (gitError) logger.error(gitError);

  const amend = git.amendNoEdit(guardedEnv(env));
  if (!amend.ok) {
    logger.error(amend.error);
    gitError = gitError ? `${gitError}; ${amend.error}` : amend.error;
  }

  return {
    outcome: "bumped",
    kind,
    from,
    to,
    updated,
    misses,
    staged,
    lockRefreshed,
    amended: amend.ok,
    ...(gitError ? { gitError } : {}),
  };
}
