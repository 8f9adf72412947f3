/**
 * CLI entry point.
 * Resolves settings, wires the services and runs the provisioning steps.
 */

import os from "node:os";
import {
  CommandPresenceChecker,
  DefaultElevationChecker,
  DefaultFileSystemLayer,
  ElectronLogService,
  ExecaProcessRunner,
  LoggingProcessRunner,
  RegistrySearchPathRefresher,
  SimpleGitClient,
  getErrorMessage,
  isServiceError,
} from "../services";
import { createProgram } from "./cli";
import { EXIT_FATAL, runProvision } from "./provision-run";
import { resolveSettings, type CliFlags, type Settings } from "./settings";

async function main(flags: CliFlags): Promise<void> {
  let settings: Settings;
  try {
    settings = resolveSettings(flags, {
      env: process.env,
      platform: process.platform,
      cwd: process.cwd(),
      homeDir: os.homedir(),
    });
  } catch (error: unknown) {
    if (!isServiceError(error)) throw error;
    console.error(error.message);
    process.exitCode = EXIT_FATAL;
    return;
  }

  const loggingService = new ElectronLogService({
    consoleLevel: settings.logLevel,
    ...(settings.logFile !== undefined && { logFile: settings.logFile }),
  });
  const runner = new LoggingProcessRunner(
    new ExecaProcessRunner(),
    loggingService.createLogger("process")
  );

  const result = await runProvision(
    {
      elevation: new DefaultElevationChecker(runner),
      presence: new CommandPresenceChecker(runner, loggingService.createLogger("process")),
      searchPath: new RegistrySearchPathRefresher(runner, loggingService.createLogger("provision")),
      runner,
      fs: new DefaultFileSystemLayer(loggingService.createLogger("provision")),
      git: new SimpleGitClient(loggingService.createLogger("git"), {
        blockTimeoutMs: settings.cloneTimeoutMs,
      }),
      loggingService,
      platform: process.platform,
    },
    settings
  );
  process.exitCode = result.exitCode;
}

createProgram(main)
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`rigup failed: ${getErrorMessage(error)}`);
    process.exitCode = EXIT_FATAL;
  });
