/**
 * Shared utilities for CLI commands.
 */

import { loadConfig, type LoadedConfig } from "../config.js";
import { captureError, flushErrorReporter, initErrorReporter } from "../services/error-reporter.js";
import { createGitClient, spawnCommandRunner, type CommandRunner, type GitClient } from "../services/git.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { toolVersion } from "../versionInfo.js";
import type { CliSink } from "./types.js";

/** Everything a command touches outside its own logic; tests pass fakes. */
export type CliDeps = {
  cwd: string;
  env: NodeJS.ProcessEnv;
  sink: CliSink;
  createGit: (cwd: string) => GitClient;
  runner: CommandRunner;
};

export function defaultCliDeps(): CliDeps {
  return {
    cwd: process.cwd(),
    env: process.env,
    sink: { log: (s) => console.log(s), error: (s) => console.error(s) },
    createGit: createGitClient,
    runner: spawnCommandRunner,
  };
}

export function sinkLogger(sink: CliSink, quiet?: boolean): Logger {
  return createLogger({
    quiet,
    sink: { info: sink.log, warn: sink.error, error: sink.error },
  });
}

export type CommandContext = {
  root: string;
  git: GitClient;
  loaded: LoadedConfig;
  logger: Logger;
};

/** Resolve the repository root, load config and start the error reporter when it is opted in. */
export async function openCommandContext(
  deps: CliDeps,
  opts: { config?: string; quiet?: boolean },
): Promise<CommandContext> {
  const logger = sinkLogger(deps.sink, opts.quiet);
  const git = deps.createGit(deps.cwd);
  const root = git.topLevel() ?? deps.cwd;
  const loaded = loadConfig(root, opts.config);
  await initErrorReporter(loaded.config.errorReporting, toolVersion, logger);
  return { root, git, loaded, logger };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Wrap a command action: unexpected errors are reported, printed and turned into exit code 1.
 * Pending error reports are flushed before the action resolves.
 */
export const withErrorCapture =
  <A extends unknown[]>(deps: CliDeps, operation: string, fn: (...args: A) => Promise<void>) =>
  async (...args: A): Promise<void> => {
    try {
      await fn(...args);
    } catch (err) {
      captureError(err instanceof Error ? err : new Error(String(err)), { subsystem: "cli", operation });
      deps.sink.error(`Error: ${errorMessage(err)}`);
      process.exitCode = 1;
    } finally {
      await flushErrorReporter();
    }
  };
