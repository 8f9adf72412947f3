/**
 * Extension Install Driver.
 *
 * Installs the same extension list into each compatible host editor through
 * the editor's `--install-extension <id> --force` subcommand.
 */

import type { ProcessRunner } from "../platform/process";
import { runCommand } from "../platform/process";
import type { PresenceChecker } from "../platform/presence";
import type { Logger } from "../logging";
import { getErrorMessage } from "../errors";
import type { ItemOutcome, StepReport } from "./types";

export const DEFAULT_EXTENSION_TIMEOUT_MS = 5 * 60 * 1000;

export class ExtensionInstaller {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly presence: PresenceChecker,
    private readonly logger: Logger,
    private readonly platform: NodeJS.Platform = process.platform,
    private readonly timeoutMs: number = DEFAULT_EXTENSION_TIMEOUT_MS
  ) {}

  /**
   * Install every extension into one editor. An absent editor is a warning,
   * not an error.
   */
  async installExtensions(
    editorCommand: string,
    extensions: readonly string[]
  ): Promise<StepReport> {
    const step = `extensions (${editorCommand})`;

    if (!(await this.presence.exists(editorCommand))) {
      this.logger.warn(`${editorCommand} not found; skipping its extensions`);
      return { step, outcomes: [], skippedReason: `${editorCommand} not installed` };
    }

    const outcomes: ItemOutcome[] = [];
    for (const extension of extensions) {
      outcomes.push(await this.installOne(editorCommand, extension));
    }
    return { step, outcomes };
  }

  /**
   * Run installExtensions once per editor, independently.
   */
  async installExtensionsForEditors(
    editors: readonly string[],
    extensions: readonly string[]
  ): Promise<StepReport[]> {
    const reports: StepReport[] = [];
    for (const editor of editors) {
      reports.push(await this.installExtensions(editor, extensions));
    }
    return reports;
  }

  private async installOne(editorCommand: string, extension: string): Promise<ItemOutcome> {
    this.logger.info(`Installing extension ${extension}`, { editor: editorCommand });

    try {
      const outcome = await runCommand(
        this.runner,
        editorCommand,
        ["--install-extension", extension, "--force"],
        // Editor CLIs are .cmd shims on Windows, which only run through a shell
        { timeout: this.timeoutMs, shell: this.platform === "win32" }
      );
      if (outcome.ok) {
        return { item: extension, status: "installed" };
      }
      const detail = outcome.error ?? "install failed";
      this.logger.warn(`Failed to install extension ${extension}`, {
        editor: editorCommand,
        error: detail,
      });
      return { item: extension, status: "failed", detail };
    } catch (error: unknown) {
      const detail = getErrorMessage(error);
      this.logger.warn(`Failed to install extension ${extension}`, {
        editor: editorCommand,
        error: detail,
      });
      return { item: extension, status: "failed", detail };
    }
  }
}
