/**
 * Search path refresh after package installs.
 *
 * Windows package managers record PATH changes in the registry. A running
 * process keeps the PATH it started with, so commands installed during the
 * run stay invisible to presence checks, git and the editor CLIs until the
 * process environment is updated.
 */

import type { ProcessRunner } from "./process";
import type { Logger } from "../logging";
import { getErrorMessage } from "../errors";

export interface SearchPathRefresher {
  /** Update this process's PATH from the system's persisted value. Never rejects. */
  refresh(): Promise<void>;
}

export const DEFAULT_PATH_QUERY_TIMEOUT_MS = 10_000;

type PathScope = "Machine" | "User";

/**
 * Merge PATH lists, keeping the first occurrence of each entry.
 * Windows paths compare case-insensitively.
 */
export function mergeSearchPath(...lists: readonly string[]): string {
  const seen = new Set<string>();
  const merged: string[] = [];
  for (const list of lists) {
    for (const entry of list.split(";")) {
      const trimmed = entry.trim();
      const key = trimmed.toLowerCase();
      if (trimmed === "" || seen.has(key)) continue;
      seen.add(key);
      merged.push(trimmed);
    }
  }
  return merged.join(";");
}

/**
 * Reads the Machine and User PATH through PowerShell and puts them ahead of
 * the current entries. A no-op off Windows.
 */
export class RegistrySearchPathRefresher implements SearchPathRefresher {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly logger: Logger,
    private readonly platform: NodeJS.Platform = process.platform,
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly timeoutMs: number = DEFAULT_PATH_QUERY_TIMEOUT_MS
  ) {}

  async refresh(): Promise<void> {
    if (this.platform !== "win32") return;

    const machine = await this.query("Machine");
    const user = await this.query("User");
    if (machine === undefined || user === undefined) return;

    const key = Object.keys(this.env).find((name) => name.toLowerCase() === "path") ?? "Path";
    const refreshed = mergeSearchPath(machine, user, this.env[key] ?? "");
    this.env[key] = refreshed;
    this.logger.info("Refreshed search path", { entries: refreshed.split(";").length });
  }

  private async query(scope: PathScope): Promise<string | undefined> {
    try {
      const result = await this.runner
        .run(
          "powershell",
          [
            "-NoProfile",
            "-NonInteractive",
            "-Command",
            `[Environment]::GetEnvironmentVariable('Path','${scope}')`,
          ],
          { timeout: this.timeoutMs }
        )
        .wait();
      if (result.exitCode === 0) {
        return result.stdout.trim();
      }
      this.logger.warn("Could not read search path; keeping the current one", {
        scope,
        error: result.stderr.trim() || `exit code ${result.exitCode ?? "none"}`,
      });
    } catch (error: unknown) {
      this.logger.warn("Could not read search path; keeping the current one", {
        scope,
        error: getErrorMessage(error),
      });
    }
    return undefined;
  }
}
