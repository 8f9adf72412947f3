/**
 * Services layer public API.
 */

export * from "./errors";
export * from "./logging";
export { ExecaProcessRunner, runCommand, toCommandOutcome } from "./platform/process";
export type {
  ProcessRunner,
  ProcessResult,
  ProcessOptions,
  SpawnedProcess,
  CommandOutcome,
} from "./platform/process";
export { LoggingProcessRunner } from "./platform/logging-process-runner";
export { DefaultFileSystemLayer, type FileSystemLayer } from "./platform/filesystem";
export { CommandPresenceChecker, type PresenceChecker } from "./platform/presence";
export { DefaultElevationChecker, type ElevationChecker } from "./platform/privileges";
export { RegistrySearchPathRefresher, type SearchPathRefresher } from "./platform/search-path";
export { SimpleGitClient } from "./git/simple-git-client";
export type { IGitClient } from "./git/git-client";
export { DEFAULT_CATALOG_PATH, loadCatalog, validateCatalog, type Catalog } from "./config/catalog";
export { loadRunConfiguration, type RunConfiguration } from "./config/run-config";
export { CommandPackageManager, type PackageManager } from "./package-manager/package-manager";
export { PackageInstaller } from "./provision/package-installer";
export { IdentityApplier } from "./provision/identity-applier";
export { ExtensionInstaller } from "./provision/extension-installer";
export { RepoCloner } from "./provision/repo-cloner";
export { formatSummary, hasFailures } from "./provision/summary";
export type * from "./provision/types";
