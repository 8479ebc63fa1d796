/**
 * `commit-bump install`: write the post-commit hook.
 */

import type { Command } from "commander";
import { DEFAULT_HOOK_COMMAND, installPostCommitHook } from "../services/hook-install.js";
import { withErrorCapture, type CliDeps } from "./shared.js";
import type { CliSink, InstallCliOpts, InstallCliResult } from "./types.js";

export function runInstallCommand(deps: CliDeps, opts: InstallCliOpts): InstallCliResult {
  const git = deps.createGit(deps.cwd);
  const root = git.topLevel();
  const hooksDir = git.hooksDir();
  if (!root || !hooksDir) {
    return { ok: false, error: "Not inside a git work tree" };
  }
  return installPostCommitHook({ root, hooksDir, force: opts.force, dryRun: opts.dryRun, command: opts.command });
}

export function printInstallResult(result: InstallCliResult, sink: CliSink): number {
  if (!result.ok) {
    sink.error(`Error: ${result.error}`);
    return 1;
  }
  if (result.dryRun) {
    sink.log(`[dry-run] would write ${result.hookPath}:`);
    sink.log(result.script);
    return 0;
  }
  if (!result.written) {
    sink.log(`Hook already installed: ${result.hookPath}`);
    return 0;
  }
  sink.log(`${result.replaced ? "Replaced" : "Installed"} ${result.hookPath}`);
  return 0;
}

export function registerInstallCommand(program: Command, deps: CliDeps): void {
  program
    .command("install")
    .description("Install the git post-commit hook that runs `commit-bump hook`")
    .option("--force", "Replace an existing post-commit hook not written by commit-bump")
    .option("--dry-run", "Print the hook without writing it")
    .option("--command <cmd>", "Command the hook runs", DEFAULT_HOOK_COMMAND)
    .action(
      withErrorCapture(deps, "install", async (opts: InstallCliOpts) => {
        const code = printInstallResult(runInstallCommand(deps, opts), deps.sink);
        if (code !== 0) process.exitCode = code;
      }),
    );
}
