/**
 * Installs the git post-commit hook that runs `commit-bump hook`.
 */

import { chmodSync, existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { isAbsolute, join } from "node:path";

/** Marker line identifying a hook written by this tool (safe to overwrite). */
export const HOOK_MARKER = "# installed by commit-bump";

/** Hooks run without node_modules/.bin on PATH, so the default goes through npx. */
export const DEFAULT_HOOK_COMMAND = "npx --no-install commit-bump hook";

export function buildPostCommitHook(command = DEFAULT_HOOK_COMMAND): string {
  return ["#!/bin/sh", HOOK_MARKER, `exec ${command}`, ""].join("\n");
}

export type InstallHookOpts = {
  /** Repository root */
  root: string;
  /** Hooks dir as printed by `git rev-parse --git-path hooks` (may be root-relative) */
  hooksDir: string;
  force?: boolean;
  dryRun?: boolean;
  command?: string;
};

export type InstallHookResult =
  | { ok: true; hookPath: string; dryRun: boolean; written: boolean; script: string; replaced?: boolean }
  | { ok: false; error: string };

export function installPostCommitHook(opts: InstallHookOpts): InstallHookResult {
  const dir = isAbsolute(opts.hooksDir) ? opts.hooksDir : join(opts.root, opts.hooksDir);
  const hookPath = join(dir, "post-commit");
  const script = buildPostCommitHook(opts.command);

  let replaced = false;
  if (existsSync(hookPath)) {
    const existing = readFileSync(hookPath, "utf-8");
    if (existing === script) {
      return { ok: true, hookPath, dryRun: opts.dryRun === true, written: false, script };
    }
    if (!existing.includes(HOOK_MARKER) && !opts.force) {
      return { ok: false, error: `${hookPath} already exists and was not written by commit-bump (use --force to replace it)` };
    }
    replaced = true;
  }

  if (opts.dryRun) {
    return { ok: true, hookPath, dryRun: true, written: false, script, replaced };
  }

  try {
    mkdirSync(dir, { recursive: true });
    writeFileSync(hookPath, script, "utf-8");
    chmodSync(hookPath, 0o755);
  } catch (err) {
    return { ok: false, error: `Could not write ${hookPath}: ${err instanceof Error ? err.message : String(err)}` };
  }
  return { ok: true, hookPath, dryRun: false, written: true, script, replaced };
}
