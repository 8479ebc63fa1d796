/**
 * Type definitions for CLI commands and results.
 */

export type HookCliOpts = {
  config?: string;
  dryRun?: boolean;
  quiet?: boolean;
};

export type BumpCliOpts = {
  config?: string;
  dryRun?: boolean;
};

export type CheckCliOpts = {
  config?: string;
  json?: boolean;
};

export type InstallCliOpts = {
  force?: boolean;
  dryRun?: boolean;
  /** Command the hook execs */
  command?: string;
};

export type { InstallHookResult as InstallCliResult } from "../services/hook-install.js";

/** Output sink so command renderers can be exercised without touching the console. */
export type CliSink = { log: (s: string) => void; error: (s: string) => void };
