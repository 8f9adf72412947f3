/**
 * SimpleGitClient implementation using the simple-git library.
 */

import simpleGit, { type SimpleGit, type SimpleGitOptions } from "simple-git";
import path from "path";
import { GitError } from "../errors";
import type { IGitClient } from "./git-client";
import type { Logger } from "../logging";

export interface SimpleGitClientOptions {
  /** Kill a git process that produces no output for this long */
  readonly blockTimeoutMs?: number;
  /** Working directory for config writes (must exist) */
  readonly baseDir?: string;
}

export const DEFAULT_GIT_BLOCK_TIMEOUT_MS = 10 * 60 * 1000;

/**
 * Implementation of IGitClient using the simple-git library.
 * Wraps simple-git calls and maps errors to GitError.
 */
export class SimpleGitClient implements IGitClient {
  private readonly blockTimeoutMs: number;
  private readonly baseDir: string;

  constructor(
    private readonly logger: Logger,
    options: SimpleGitClientOptions = {}
  ) {
    this.blockTimeoutMs = options.blockTimeoutMs ?? DEFAULT_GIT_BLOCK_TIMEOUT_MS;
    this.baseDir = options.baseDir ?? process.cwd();
  }

  /**
   * Create a simple-git instance for a given path.
   */
  private getGit(basePath: string): SimpleGit {
    const options: Partial<SimpleGitOptions> = {
      baseDir: basePath,
      binary: "git",
      maxConcurrentProcesses: 1,
      trimmed: true,
      timeout: { block: this.blockTimeoutMs },
    };
    return simpleGit(options);
  }

  /**
   * Wrap a simple-git operation and convert errors to GitError.
   * Logs errors at WARN level.
   */
  private async wrapGitOperation<T>(
    operation: () => Promise<T>,
    opName: string,
    target: string,
    errorMessage: string
  ): Promise<T> {
    try {
      return await operation();
    } catch (error: unknown) {
      const errMsg = error instanceof Error ? error.message : String(error);
      this.logger.warn("Git error", { op: opName, target, error: errMsg });
      const message = error instanceof Error ? `${errorMessage}: ${error.message}` : errorMessage;
      throw new GitError(message);
    }
  }

  async setGlobalConfig(key: string, value: string): Promise<void> {
    await this.wrapGitOperation(
      async () => {
        const git = this.getGit(this.baseDir);
        await git.addConfig(key, value, false, "global");
      },
      "setGlobalConfig",
      key,
      `Failed to set ${key}`
    );
    this.logger.debug("SetGlobalConfig", { key });
  }

  async clone(source: string, destination: string): Promise<void> {
    await this.wrapGitOperation(
      async () => {
        // Run from the destination's parent so relative sources resolve predictably
        const git = this.getGit(path.dirname(destination));
        await git.clone(source, destination);
      },
      "clone",
      source,
      `Failed to clone ${source}`
    );
    this.logger.debug("Clone", { source, destination });
  }
}
