/**
 * Command-line surface. Options are left undefined when not given so that
 * environment variables and defaults can apply in resolveSettings.
 */

import { Command } from "commander";
import type { CliFlags } from "./settings";

export const VERSION = "0.1.0";

export function createProgram(run: (flags: CliFlags) => Promise<void>): Command {
  return new Command()
    .name("rigup")
    .description("Provision a developer workstation: packages, git, editor extensions, repositories")
    .version(VERSION)
    .option("--config <path>", "run configuration file (GitUserName, GitUserEmail)")
    .option("--catalog <path>", "catalog JSON file")
    .option("--repos-file <path>", "newline-delimited list of repositories to clone")
    .option("--clone-dir <path>", "directory to clone repositories into")
    .option("--clone", "clone the repositories listed in the repos file")
    .option("--strict", "exit with code 2 when any item failed")
    .option("--skip-elevation-check", "skip the administrator check (skipped by default off Windows)")
    .option("--log-level <level>", "console log level (debug, info, warn, error)")
    .option("--log-file <path>", "also write debug logs to this file")
    .option("--install-timeout <minutes>", "time limit for each package install")
    .option("--clone-timeout <minutes>", "abort a clone after this many minutes without output")
    .action(async (options: CliFlags) => {
      await run(options);
    });
}
