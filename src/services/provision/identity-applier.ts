/**
 * Tool-Config Applier for git.
 *
 * Identity (user.name / user.email) is written only when both values are
 * non-empty. The alias table is written whenever git is present, whether or
 * not identity was configured.
 */

import type { IGitClient } from "../git/git-client";
import type { Logger } from "../logging";
import { getErrorMessage } from "../errors";
import type { ItemOutcome, StepReport, ToolConfigEntry, ToolPresence } from "./types";

export const IDENTITY_STEP = "git config";

/**
 * Turn an alias table into `alias.<name>` config entries, in table order.
 */
export function aliasEntries(aliases: Readonly<Record<string, string>>): ToolConfigEntry[] {
  return Object.entries(aliases).map(([name, command]) => ({
    key: `alias.${name}`,
    value: command,
  }));
}

export class IdentityApplier {
  constructor(
    private readonly git: IGitClient,
    private readonly aliases: Readonly<Record<string, string>>,
    private readonly logger: Logger
  ) {}

  async applyIdentity(tool: ToolPresence, name?: string, email?: string): Promise<StepReport> {
    if (tool === "absent") {
      this.logger.warn("git not found; skipping git configuration");
      return { step: IDENTITY_STEP, outcomes: [], skippedReason: "git not installed" };
    }

    const outcomes: ItemOutcome[] = [];
    const trimmedName = name?.trim() ?? "";
    const trimmedEmail = email?.trim() ?? "";

    if (trimmedName !== "" && trimmedEmail !== "") {
      outcomes.push(await this.apply({ key: "user.name", value: trimmedName }));
      outcomes.push(await this.apply({ key: "user.email", value: trimmedEmail }));
    } else {
      this.logger.warn("Git identity not configured; set GitUserName and GitUserEmail", {
        hasName: trimmedName !== "",
        hasEmail: trimmedEmail !== "",
      });
    }

    for (const entry of aliasEntries(this.aliases)) {
      outcomes.push(await this.apply(entry));
    }

    return { step: IDENTITY_STEP, outcomes };
  }

  private async apply(entry: ToolConfigEntry): Promise<ItemOutcome> {
    try {
      await this.git.setGlobalConfig(entry.key, entry.value);
      this.logger.debug("Applied git config", { key: entry.key });
      return { item: entry.key, status: "installed" };
    } catch (error: unknown) {
      const detail = getErrorMessage(error);
      this.logger.warn("Failed to apply git config", { key: entry.key, error: detail });
      return { item: entry.key, status: "failed", detail };
    }
  }
}
