/**
 * Thin synchronous wrappers over the git CLI and other child processes.
 * Callers depend on the GitClient / CommandRunner types so tests can substitute in-process fakes.
 */

import { spawnSync, type SpawnSyncReturns } from "node:child_process";
import { resolve } from "node:path";

export type GitResult = { ok: true } | { ok: false; error: string };

export type GitClient = {
  /** Body of HEAD's commit message, or null when it cannot be read (no commits, not a repo) */
  lastCommitMessage(): string | null;
  /** Repository top-level directory, or null outside a work tree */
  topLevel(): string | null;
  /** Absolute hooks directory (honours core.hooksPath) */
  hooksDir(): string | null;
  add(paths: readonly string[]): GitResult;
  /** `git commit --amend --no-edit --allow-empty` with the given environment */
  amendNoEdit(env: NodeJS.ProcessEnv): GitResult;
};

export type CommandResult = { status: number | null; error?: string };

export type CommandRunner = {
  run(command: string, args: readonly string[], opts: { cwd: string }): CommandResult;
};

function failure(result: SpawnSyncReturns<string>, what: string): string {
  if (result.error) return `${what}: ${result.error.message}`;
  const stderr = (result.stderr ?? "").trim();
  const stdout = (result.stdout ?? "").trim();
  return `${what} exited with ${result.status ?? "signal"}${stderr || stdout ? `: ${stderr || stdout}` : ""}`;
}

export function createGitClient(cwd: string): GitClient {
  const git = (args: string[], env?: NodeJS.ProcessEnv): SpawnSyncReturns<string> =>
    spawnSync("git", args, { cwd, encoding: "utf-8", env: env ?? process.env });

  const read = (args: string[]): string | null => {
    const result = git(args);
    if (result.status !== 0) return null;
    return result.stdout;
  };

  return {
    lastCommitMessage() {
      const out = read(["log", "-1", "--pretty=%B"]);
      return out === null ? null : out.trimEnd();
    },
    topLevel() {
      const out = read(["rev-parse", "--show-toplevel"])?.trim();
      return out ? out : null;
    },
    hooksDir() {
      // printed relative to cwd
      const out = read(["rev-parse", "--git-path", "hooks"])?.trim();
      return out ? resolve(cwd, out) : null;
    },
    add(paths) {
      if (paths.length === 0) return { ok: true };
      const result = git(["add", "--", ...paths]);
      return result.status === 0 ? { ok: true } : { ok: false, error: failure(result, "git add") };
    },
    amendNoEdit(env) {
      const result = git(["commit", "--amend", "--no-edit", "--allow-empty"], env);
      return result.status === 0 ? { ok: true } : { ok: false, error: failure(result, "git commit --amend") };
    },
  };
}

/** Runs a command with its output discarded. */
export const spawnCommandRunner: CommandRunner = {
  run(command, args, opts) {
    const result = spawnSync(command, [...args], { cwd: opts.cwd, stdio: "ignore" });
    return result.error ? { status: result.status, error: result.error.message } : { status: result.status };
  },
};
