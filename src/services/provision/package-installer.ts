/**
 * Package Install Driver.
 *
 * Walks the catalog in order, skips packages whose presence check resolves,
 * and installs the rest. One failed install never stops the batch.
 */

import type { PackageManager } from "../package-manager/package-manager";
import type { PresenceChecker } from "../platform/presence";
import type { Logger } from "../logging";
import { getErrorMessage } from "../errors";
import type { DesiredPackage, ItemOutcome, StepReport } from "./types";

export class PackageInstaller {
  constructor(
    private readonly packageManager: PackageManager,
    private readonly presence: PresenceChecker,
    private readonly logger: Logger
  ) {}

  async installAll(items: readonly DesiredPackage[]): Promise<StepReport> {
    const outcomes: ItemOutcome[] = [];

    for (const item of items) {
      outcomes.push(await this.installOne(item));
    }

    return { step: "packages", outcomes };
  }

  private async installOne(item: DesiredPackage): Promise<ItemOutcome> {
    if (await this.presence.exists(item.presenceCheck)) {
      this.logger.info(`${item.displayName} already installed, skipping`, {
        package: item.installIdentifier,
        presenceCheck: item.presenceCheck,
      });
      return {
        item: item.installIdentifier,
        status: "skipped",
        detail: `${item.presenceCheck} found`,
      };
    }

    this.logger.info(`Installing ${item.displayName}`, {
      package: item.installIdentifier,
      manager: this.packageManager.name,
    });

    try {
      const outcome = await this.packageManager.install(item.installIdentifier);
      if (outcome.ok) {
        return { item: item.installIdentifier, status: "installed" };
      }
      const detail = outcome.error ?? "install failed";
      this.logger.warn(`Failed to install ${item.displayName}`, {
        package: item.installIdentifier,
        error: detail,
      });
      return { item: item.installIdentifier, status: "failed", detail };
    } catch (error: unknown) {
      const detail = getErrorMessage(error);
      this.logger.warn(`Failed to install ${item.displayName}`, {
        package: item.installIdentifier,
        error: detail,
      });
      return { item: item.installIdentifier, status: "failed", detail };
    }
  }
}
