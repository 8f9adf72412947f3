/**
 * Elevated-privilege detection.
 */

import type { ProcessRunner } from "./process";

export interface ElevationChecker {
  isElevated(): Promise<boolean>;
}

/**
 * Windows: `net session` only succeeds from an elevated prompt.
 * POSIX: effective uid 0.
 */
export class DefaultElevationChecker implements ElevationChecker {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly platform: NodeJS.Platform = process.platform,
    private readonly getEffectiveUid: () => number | undefined = () => process.geteuid?.()
  ) {}

  async isElevated(): Promise<boolean> {
    if (this.platform === "win32") {
      const result = await this.runner.run("net", ["session"], { timeout: 10_000 }).wait();
      return result.exitCode === 0;
    }
    return this.getEffectiveUid() === 0;
  }
}
