/**
 * Provisioning run: precondition, catalog, then each step in order.
 *
 * Packages run first so later steps can rely on git and the editors being
 * installed; the search path is refreshed after any install so they can be
 * found. Only this module maps results to exit codes.
 */

import {
  CommandPackageManager,
  ExtensionInstaller,
  IdentityApplier,
  PackageInstaller,
  RepoCloner,
  formatSummary,
  getErrorMessage,
  hasFailures,
  loadCatalog,
  loadRunConfiguration,
  type Catalog,
  type ElevationChecker,
  type FileSystemLayer,
  type IGitClient,
  type LoggingService,
  type PresenceChecker,
  type ProcessRunner,
  type SearchPathRefresher,
  type StepReport,
} from "../services";
import type { Settings } from "./settings";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_ITEM_FAILURES = 2;

export interface ProvisionDependencies {
  readonly elevation: ElevationChecker;
  readonly presence: PresenceChecker;
  readonly searchPath: SearchPathRefresher;
  readonly runner: ProcessRunner;
  readonly fs: FileSystemLayer;
  readonly git: IGitClient;
  readonly loggingService: LoggingService;
  readonly platform: NodeJS.Platform;
}

export interface ProvisionResult {
  readonly exitCode: number;
  readonly reports: readonly StepReport[];
}

export async function runProvision(
  deps: ProvisionDependencies,
  settings: Settings
): Promise<ProvisionResult> {
  const logger = deps.loggingService.createLogger("provision");

  if (settings.requireElevation && !(await deps.elevation.isElevated())) {
    logger.error("rigup must run elevated (administrator or root)");
    return { exitCode: EXIT_FATAL, reports: [] };
  }

  let catalog: Catalog;
  try {
    catalog = await loadCatalog(deps.fs, settings.catalogPath);
  } catch (error: unknown) {
    logger.error("Cannot load catalog", { error: getErrorMessage(error) });
    return { exitCode: EXIT_FATAL, reports: [] };
  }

  const runConfig = await loadRunConfiguration(
    deps.fs,
    settings.configPath,
    deps.loggingService.createLogger("config")
  );

  const reports: StepReport[] = [];

  const packageManager = new CommandPackageManager(
    catalog.packageManager,
    deps.runner,
    settings.installTimeoutMs
  );
  const packages = new PackageInstaller(packageManager, deps.presence, logger);
  const packageReport = await packages.installAll(catalog.packages);
  reports.push(packageReport);
  if (packageReport.outcomes.some((outcome) => outcome.status === "installed")) {
    await deps.searchPath.refresh();
  }

  const gitPresence = (await deps.presence.exists("git")) ? "present" : "absent";
  const identity = new IdentityApplier(deps.git, catalog.aliases, logger);
  reports.push(
    await identity.applyIdentity(gitPresence, runConfig.identityName, runConfig.identityEmail)
  );

  const extensions = new ExtensionInstaller(deps.runner, deps.presence, logger, deps.platform);
  reports.push(
    ...(await extensions.installExtensionsForEditors(catalog.editors, catalog.extensions))
  );

  if (settings.clone) {
    const cloner = new RepoCloner(deps.fs, deps.git, logger);
    reports.push(await cloner.cloneAll(settings.reposFile, settings.cloneDir));
  } else {
    logger.debug("Repository cloning disabled; pass --clone to enable");
  }

  logger.info("Summary");
  for (const line of formatSummary(reports)) {
    logger.info(line);
  }

  const failed = hasFailures(reports);
  if (failed && settings.strict) {
    logger.error("Some items failed");
    return { exitCode: EXIT_ITEM_FAILURES, reports };
  }
  return { exitCode: EXIT_OK, reports };
}
