/**
 * Builds the commit-bump program and registers every subcommand:
 *   hook, bump <message> [base], check, install
 */

import { Command } from "commander";
import { toolVersion } from "../versionInfo.js";
import { registerBumpCommand } from "./bump.js";
import { registerCheckCommand } from "./check.js";
import { registerHookCommand } from "./hook.js";
import { registerInstallCommand } from "./install.js";
import { defaultCliDeps, type CliDeps } from "./shared.js";

export function buildProgram(deps: CliDeps = defaultCliDeps()): Command {
  const program = new Command();
  program
    .name("commit-bump")
    .description("Bump the app version from commit messages and keep manifests in sync")
    .version(toolVersion);

  registerHookCommand(program, deps);
  registerBumpCommand(program, deps);
  registerCheckCommand(program, deps);
  registerInstallCommand(program, deps);

  return program;
}
