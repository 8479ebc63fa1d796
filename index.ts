/**
 * commit-bump: bump the app version from commit messages and keep its manifests in sync.
 */

export {
  CONFIG_FILE_NAME,
  DEFAULT_ARTIFACTS,
  DEFAULT_CANONICAL,
  DEFAULT_LOCK_REFRESH,
  GUARD_ENV,
  commitBumpConfigSchema,
  loadConfig,
  type CommitBumpConfig,
  type ErrorReportingConfig,
  type LoadedConfig,
  type LockRefreshConfig,
} from "./config.js";
export { versionInfo, toolVersion } from "./versionInfo.js";
export * from "./types/auto-version.js";
export {
  bumpVersion,
  decideHookBump,
  decidePrefixBump,
  formatVersion,
  parseVersion,
  DEFAULT_BUMP_KEYWORDS,
  type BumpKeywords,
} from "./services/version.js";
export {
  extractArtifactVersion,
  extractCanonicalVersion,
  readCanonicalVersion,
  rewriteArtifact,
  substituteVersion,
} from "./services/artifacts.js";
export { updateJsonVersion, updatePackageSectionVersion } from "./services/manifest-update.js";
export { runAutoVersion, isGuardActive, guardedEnv, type AutoVersionContext } from "./services/auto-version.js";
export { runPrefixBump, type PrefixBumpOpts, type PrefixBumpResult } from "./services/prefix-bump.js";
export { checkConsistency, type ConsistencyReport, type ArtifactVersionEntry } from "./services/consistency.js";
export {
  DEFAULT_HOOK_COMMAND,
  buildPostCommitHook,
  installPostCommitHook,
  type InstallHookResult,
} from "./services/hook-install.js";
export { createGitClient, spawnCommandRunner, type GitClient, type CommandRunner } from "./services/git.js";
export { createLogger, type Logger } from "./utils/logger.js";
export { buildProgram } from "./cli/register.js";
