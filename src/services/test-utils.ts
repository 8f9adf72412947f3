/**
 * Test utilities for service tests.
 * These helpers create temporary directories with automatic cleanup.
 */

import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

/**
 * Create a temporary directory with automatic cleanup.
 * @returns Object with path and cleanup function
 */
export async function createTempDir(): Promise<{
  path: string;
  cleanup: () => Promise<void>;
}> {
  const path = await mkdtemp(join(tmpdir(), "rigup-test-"));
  return {
    path,
    cleanup: async () => {
      await rm(path, { recursive: true, force: true });
    },
  };
}

/**
 * Run a test function with a temporary directory.
 * The directory is removed afterwards, even if the test fails.
 *
 * @param fn Test function that receives the directory path
 */
export async function withTempDir(fn: (dirPath: string) => Promise<void>): Promise<void> {
  const { path, cleanup } = await createTempDir();
  try {
    await fn(path);
  } finally {
    await cleanup();
  }
}
