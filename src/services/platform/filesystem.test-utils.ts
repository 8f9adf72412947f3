/**
 * In-memory FileSystemLayer mock for unit tests.
 */
import { vi, type Mock } from "vitest";
import type { FileSystemLayer } from "./filesystem";

export interface MockFileSystemLayer extends FileSystemLayer {
  pathExists: Mock<(path: string) => Promise<boolean>>;
  readFile: Mock<(path: string) => Promise<string>>;
  mkdir: Mock<(path: string) => Promise<void>>;
  /** Current in-memory state, for assertions */
  readonly $: {
    readonly files: Map<string, string>;
    readonly directories: Set<string>;
  };
}

/**
 * Create a mock filesystem seeded with files and directories.
 * Paths are compared verbatim; mkdir only records the path it was given.
 *
 * @example
 * ```typescript
 * const fs = createMockFileSystem({ files: { "/work/repos.txt": "https://example.com/a.git\n" } });
 * ```
 */
export function createMockFileSystem(initial?: {
  files?: Record<string, string>;
  directories?: readonly string[];
}): MockFileSystemLayer {
  const files = new Map(Object.entries(initial?.files ?? {}));
  const directories = new Set(initial?.directories ?? []);

  return {
    $: { files, directories },
    pathExists: vi.fn(async (path: string) => files.has(path) || directories.has(path)),
    readFile: vi.fn(async (path: string) => {
      const content = files.get(path);
      if (content === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return content;
    }),
    mkdir: vi.fn(async (path: string) => {
      directories.add(path);
    }),
  };
}
