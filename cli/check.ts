/**
 * `commit-bump check`: report the version held by each artifact.
 */

import type { Command } from "commander";
import { checkConsistency, type ConsistencyReport } from "../services/consistency.js";
import { openCommandContext, withErrorCapture, type CliDeps } from "./shared.js";
import type { CheckCliOpts, CliSink } from "./types.js";

export async function runCheckCommand(deps: CliDeps, opts: CheckCliOpts): Promise<ConsistencyReport> {
  const { root, loaded } = await openCommandContext(deps, opts);
  return checkConsistency(root, loaded.config);
}

/** Print the report; returns 1 when artifacts disagree. */
export function printCheckReport(report: ConsistencyReport, sink: CliSink, json = false): number {
  if (json) {
    sink.log(JSON.stringify(report, null, 2));
    return report.consistent ? 0 : 1;
  }
  for (const a of report.artifacts) {
    const tag = a.canonical ? " (canonical)" : "";
    const flag = a.status === "ok" ? "✅" : "⚠️";
    sink.log(`${flag} ${a.path}${tag}: ${a.version ?? "-"}${a.status === "ok" ? "" : ` [${a.status}]`}`);
  }
  if (report.consistent) {
    sink.log(`All artifacts at ${report.canonicalVersion}`);
    return 0;
  }
  sink.error(
    report.canonicalVersion === null
      ? "Canonical version not found"
      : `Artifacts disagree with canonical version ${report.canonicalVersion}`,
  );
  return 1;
}

export function registerCheckCommand(program: Command, deps: CliDeps): void {
  program
    .command("check")
    .description("Show the version stored in each artifact and whether they agree")
    .option("--config <path>", "Config file (default: .commitbumprc.json at the repo root)")
    .option("--json", "Print the report as JSON")
    .action(
      withErrorCapture(deps, "check", async (opts: CheckCliOpts) => {
        const report = await runCheckCommand(deps, opts);
        const code = printCheckReport(report, deps.sink, opts.json === true);
        if (code !== 0) process.exitCode = code;
      }),
    );
}
