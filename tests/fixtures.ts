import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { vi } from "vitest";
import type { CommandRunner, GitClient, GitResult } from "../services/git.js";

export const backendManifest = (version: string) =>
  [
    "[package]",
    'name = "artshell"',
    `version = "${version}"`,
    'edition = "2021"',
    "",
    "[dependencies]",
    'serde = { version = "1", features = ["derive"] }',
    "",
  ].join("\n");

export const frontendManifest = (version: string) =>
  ["[package]", 'name = "artshell-ui"', `version = "${version}"`, 'edition = "2021"', ""].join("\n");

export const appDescriptor = (version: string) =>
  ["{", '  "productName": "artshell",', `  "version": "${version}",`, '  "identifier": "dev.artshell.app"', "}", ""].join("\n");

export type RepoFiles = Record<string, string | null>;

/** Temp repo with the three default artifacts at `version`. Pass null to leave a file out. */
export function makeRepo(version: string, files: RepoFiles = {}): string {
  const root = mkdtempSync(join(tmpdir(), "commit-bump-"));
  const all: RepoFiles = {
    "src-tauri/Cargo.toml": backendManifest(version),
    "Cargo.toml": frontendManifest(version),
    "src-tauri/tauri.conf.json": appDescriptor(version),
    ...files,
  };
  for (const [rel, content] of Object.entries(all)) {
    if (content === null) continue;
    const abs = join(root, rel);
    mkdirSync(dirname(abs), { recursive: true });
    writeFileSync(abs, content, "utf-8");
  }
  return root;
}

export function readRepoFile(root: string, rel: string): string {
  return readFileSync(join(root, rel), "utf-8");
}

export function removeRepo(root: string): void {
  rmSync(root, { recursive: true, force: true });
}

export type FakeGit = GitClient & {
  added: string[][];
  amendEnvs: NodeJS.ProcessEnv[];
};

export function fakeGit(
  root: string | null,
  message: string | null,
  opts: { add?: GitResult; amend?: GitResult; hooksDir?: string | null } = {},
): FakeGit {
  const added: string[][] = [];
  const amendEnvs: NodeJS.ProcessEnv[] = [];
  return {
    added,
    amendEnvs,
    lastCommitMessage: () => message,
    topLevel: () => root,
    hooksDir: () => (opts.hooksDir === undefined ? ".git/hooks" : opts.hooksDir),
    add(paths) {
      added.push([...paths]);
      return opts.add ?? { ok: true };
    },
    amendNoEdit(env) {
      amendEnvs.push(env);
      return opts.amend ?? { ok: true };
    },
  };
}

export function fakeRunner(status: number | null = 0) {
  const run = vi.fn<CommandRunner["run"]>(() => ({ status }));
  const runner: CommandRunner = { run };
  return { runner, run };
}

export function captureSink() {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, sink: { log: (s: string) => out.push(s), error: (s: string) => err.push(s) } };
}
