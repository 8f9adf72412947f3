/**
 * Filesystem abstraction used by the config loaders and the repository cloner.
 */

import { promises as fs } from "fs";
import type { Logger } from "../logging";

export interface FileSystemLayer {
  /** True when anything (file or directory) exists at the path */
  pathExists(path: string): Promise<boolean>;
  /** Read a UTF-8 text file. Rejects when missing or unreadable. */
  readFile(path: string): Promise<string>;
  /** Create a directory and any missing parents */
  mkdir(path: string): Promise<void>;
}

export class DefaultFileSystemLayer implements FileSystemLayer {
  constructor(private readonly logger: Logger) {}

  async pathExists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }

  async readFile(path: string): Promise<string> {
    const content = await fs.readFile(path, "utf-8");
    this.logger.debug("Read file", { path, bytes: content.length });
    return content;
  }

  async mkdir(path: string): Promise<void> {
    await fs.mkdir(path, { recursive: true });
    this.logger.debug("Created directory", { path });
  }
}
