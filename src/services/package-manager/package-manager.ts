/**
 * External package manager invoked as a black box.
 */

import type { ProcessRunner, CommandOutcome } from "../platform/process";
import { runCommand } from "../platform/process";
import type { PackageManagerConfig } from "../config/catalog";

export interface PackageManager {
  readonly name: string;
  /**
   * Install a package unattended. Resolves with the outcome; never rejects
   * for a failed install.
   */
  install(packageIdentifier: string): Promise<CommandOutcome>;
}

export const DEFAULT_INSTALL_TIMEOUT_MS = 30 * 60 * 1000;

/**
 * Package manager driven by a command line: `<command> <installArgs...> <id>`.
 * The auto-confirm flag belongs in installArgs (e.g. `choco install --yes`).
 */
export class CommandPackageManager implements PackageManager {
  constructor(
    private readonly config: PackageManagerConfig,
    private readonly runner: ProcessRunner,
    private readonly timeoutMs: number = DEFAULT_INSTALL_TIMEOUT_MS
  ) {}

  get name(): string {
    return this.config.command;
  }

  install(packageIdentifier: string): Promise<CommandOutcome> {
    return runCommand(
      this.runner,
      this.config.command,
      [...this.config.installArgs, packageIdentifier],
      { timeout: this.timeoutMs }
    );
  }
}
