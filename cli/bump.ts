/**
 * `commit-bump bump <message> [base]`: prefix-driven bump for manual or CI use.
 */

import type { Command } from "commander";
import { runPrefixBump, type PrefixBumpResult } from "../services/prefix-bump.js";
import { openCommandContext, withErrorCapture, type CliDeps } from "./shared.js";
import type { BumpCliOpts, CliSink } from "./types.js";

export async function runBumpCommand(
  deps: CliDeps,
  message: string,
  baseVersion: string | undefined,
  opts: BumpCliOpts,
): Promise<PrefixBumpResult> {
  const { root, loaded } = await openCommandContext(deps, opts);
  return runPrefixBump(root, loaded.config, { message, baseVersion, dryRun: opts.dryRun });
}

/** Print a bump result; returns the exit code. */
export function printBumpResult(result: PrefixBumpResult, sink: CliSink): number {
  switch (result.outcome) {
    case "no_bump":
      return 0;
    case "unchanged":
      sink.log(`No version change: ${result.current}`);
      return 0;
    case "error":
      sink.error(`Error: ${result.error}`);
      return 1;
    case "bumped": {
      if (result.updated.length === 0) {
        sink.log(`No changes made for version: ${result.current}`);
        return 0;
      }
      const prefix = result.dryRun ? "[dry-run] " : "";
      sink.log(`${prefix}Version bumped: ${result.from} -> ${result.to} (${result.kind})`);
      sink.log(`${prefix}Updated: ${result.updated.join(", ")}`);
      return 0;
    }
  }
}

export function registerBumpCommand(program: Command, deps: CliDeps): void {
  program
    .command("bump")
    .description("Bump from a commit message prefix: release(...) → major, feature(...) → minor, fix(...) → patch")
    .argument("<message>", "Commit message")
    .argument("[base]", "Version to bump from instead of the current one")
    .option("--config <path>", "Config file (default: .commitbumprc.json at the repo root)")
    .option("--dry-run", "Report without writing")
    .action(
      withErrorCapture(deps, "bump", async (message: string, base: string | undefined, opts: BumpCliOpts) => {
        const result = await runBumpCommand(deps, message, base, opts);
        const code = printBumpResult(result, deps.sink);
        if (code !== 0) process.exitCode = code;
      }),
    );
}
