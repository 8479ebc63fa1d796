/**
 * `commit-bump hook`: the post-commit run.
 *
 * Always leaves exit code 0, whatever happens, so it never fails the commit that triggered it.
 */

import type { Command } from "commander";
import { GUARD_ENV } from "../config.js";
import { isGuardActive, runAutoVersion } from "../services/auto-version.js";
import { captureError, flushErrorReporter } from "../services/error-reporter.js";
import type { HookOutcome } from "../types/auto-version.js";
import { errorMessage, openCommandContext, sinkLogger, type CliDeps, type CommandContext } from "./shared.js";
import type { HookCliOpts } from "./types.js";

/** Returns null when the run was skipped because of an error (config or unexpected). */
export async function runHookCommand(deps: CliDeps, opts: HookCliOpts): Promise<HookOutcome | null> {
  // Checked before anything else: the amend re-triggers post-commit.
  if (isGuardActive(deps.env)) {
    return { outcome: "reentrant" };
  }

  let ctx: CommandContext;
  try {
    ctx = await openCommandContext(deps, opts);
  } catch (err) {
    sinkLogger(deps.sink).error(`skipping version bump: ${errorMessage(err)}`);
    return null;
  }

  const { root, git, loaded, logger } = ctx;
  try {
    const outcome = runAutoVersion({
      root,
      config: loaded.config,
      git,
      runner: deps.runner,
      env: deps.env,
      logger,
      dryRun: opts.dryRun,
    });
    if (outcome.outcome === "bumped") {
      if (outcome.updated.length > 0) logger.info(`Updated: ${outcome.updated.join(", ")}`);
      if (outcome.amended) logger.info(`Amended HEAD with version ${outcome.to}`);
    }
    return outcome;
  } catch (err) {
    captureError(err instanceof Error ? err : new Error(String(err)), { subsystem: "hook", operation: "auto-version" });
    logger.error(`version bump failed: ${errorMessage(err)}`);
    return null;
  } finally {
    await flushErrorReporter();
  }
}

export function registerHookCommand(program: Command, deps: CliDeps): void {
  program
    .command("hook")
    .description(
      `Post-commit run: bump minor on "feature", patch on "fix", rewrite artifacts and amend HEAD (skipped when ${GUARD_ENV}=1)`,
    )
    .option("--config <path>", "Config file (default: .commitbumprc.json at the repo root)")
    .option("--dry-run", "Show the decision and next version without writing or amending")
    .option("-q, --quiet", "Only print warnings and errors")
    .action(async (opts: HookCliOpts) => {
      await runHookCommand(deps, opts);
    });
}
