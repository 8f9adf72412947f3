/**
 * Presence checks: is a command resolvable on the search path?
 */

import type { ProcessRunner } from "./process";
import type { Logger } from "../logging";
import { getErrorMessage } from "../errors";

export interface PresenceChecker {
  /**
   * Resolve to true when `identifier` names a command on the search path.
   * Never rejects; absence is reported as false.
   */
  exists(identifier: string): Promise<boolean>;
}

export const DEFAULT_PROBE_TIMEOUT_MS = 10_000;

/**
 * Build the lookup command for a platform.
 * POSIX passes the name as a positional parameter so it is never parsed by the shell.
 */
export function lookupCommand(
  identifier: string,
  platform: NodeJS.Platform
): { command: string; args: readonly string[] } {
  if (platform === "win32") {
    return { command: "where.exe", args: [identifier] };
  }
  return { command: "sh", args: ["-c", 'command -v -- "$1"', "sh", identifier] };
}

/**
 * PresenceChecker that asks the system's own command lookup.
 */
export class CommandPresenceChecker implements PresenceChecker {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly logger: Logger,
    private readonly platform: NodeJS.Platform = process.platform,
    private readonly timeoutMs: number = DEFAULT_PROBE_TIMEOUT_MS
  ) {}

  async exists(identifier: string): Promise<boolean> {
    const name = identifier.trim();
    if (name === "") {
      return false;
    }

    const { command, args } = lookupCommand(name, this.platform);
    try {
      const result = await this.runner.run(command, args, { timeout: this.timeoutMs }).wait();
      const found = result.exitCode === 0;
      this.logger.debug("Presence check", { identifier: name, found });
      return found;
    } catch (error: unknown) {
      this.logger.debug("Presence check failed", {
        identifier: name,
        error: getErrorMessage(error),
      });
      return false;
    }
  }
}
