/**
 * Batch Repository Cloner.
 *
 * Reads a newline-delimited list of repository references and clones each
 * into `targetDir/<derived name>`. A missing list file turns the step into a
 * no-op; nothing is created.
 */

import path from "path";
import type { FileSystemLayer } from "../platform/filesystem";
import type { IGitClient } from "../git/git-client";
import type { Logger } from "../logging";
import { getErrorMessage } from "../errors";
import type { ItemOutcome, StepReport } from "./types";

export const CLONE_STEP = "repositories";

/**
 * Derive a destination directory name from a repository reference:
 * the last path segment with its extension removed.
 *
 * @example deriveRepoDirName("https://example.com/a/b.git") // "b"
 * @example deriveRepoDirName("git@example.com:team/tool.git") // "tool"
 */
export function deriveRepoDirName(reference: string): string {
  const trimmed = reference.trim().replace(/[\\/]+$/, "");
  const segments = trimmed.split(/[\\/:]/);
  const last = segments[segments.length - 1] ?? "";
  const dot = last.lastIndexOf(".");
  return dot > 0 ? last.slice(0, dot) : last;
}

/**
 * Split list-file content into repository references, dropping blank lines.
 */
export function parseRepoList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "");
}

export class RepoCloner {
  constructor(
    private readonly fs: FileSystemLayer,
    private readonly git: IGitClient,
    private readonly logger: Logger
  ) {}

  async cloneAll(listFilePath: string, targetDir: string): Promise<StepReport> {
    if (!(await this.fs.pathExists(listFilePath))) {
      this.logger.info("Repository list not found; skipping clones", { path: listFilePath });
      return { step: CLONE_STEP, outcomes: [], skippedReason: `${listFilePath} not found` };
    }

    try {
      await this.fs.mkdir(targetDir);
    } catch (error: unknown) {
      return this.unusable(targetDir, "Cannot create clone directory", error);
    }

    let references: string[];
    try {
      references = parseRepoList(await this.fs.readFile(listFilePath));
    } catch (error: unknown) {
      return this.unusable(listFilePath, "Cannot read repository list", error);
    }

    this.logger.info(`Cloning ${references.length} repositories`, { targetDir });

    const outcomes: ItemOutcome[] = [];
    for (const reference of references) {
      outcomes.push(await this.cloneOne(reference, targetDir));
    }
    return { step: CLONE_STEP, outcomes };
  }

  /**
   * Report the whole step as one failed item.
   */
  private unusable(path: string, message: string, error: unknown): StepReport {
    const detail = getErrorMessage(error);
    this.logger.warn(`${message}; skipping clones`, { path, error: detail });
    return { step: CLONE_STEP, outcomes: [{ item: path, status: "failed", detail }] };
  }

  private async cloneOne(reference: string, targetDir: string): Promise<ItemOutcome> {
    const name = deriveRepoDirName(reference);
    if (name === "") {
      this.logger.warn("Cannot derive a directory name; skipping", { repository: reference });
      return { item: reference, status: "failed", detail: "no directory name" };
    }

    const destination = path.join(targetDir, name);
    if (await this.fs.pathExists(destination)) {
      this.logger.info(`${name} already exists, skipping`, { destination });
      return { item: reference, status: "skipped", detail: `${destination} exists` };
    }

    this.logger.info(`Cloning ${reference}`, { destination });
    try {
      await this.git.clone(reference, destination);
      return { item: reference, status: "installed" };
    } catch (error: unknown) {
      const detail = getErrorMessage(error);
      this.logger.warn(`Failed to clone ${reference}`, { error: detail });
      return { item: reference, status: "failed", detail };
    }
  }
}
