import { vi, type Mock } from "vitest";
import type { IGitClient } from "./git-client";

export interface MockGitClient extends IGitClient {
  setGlobalConfig: Mock<(key: string, value: string) => Promise<void>>;
  clone: Mock<(source: string, destination: string) => Promise<void>>;
}

/**
 * Git client mock whose operations succeed unless reconfigured.
 */
export function createMockGitClient(): MockGitClient {
  return {
    setGlobalConfig: vi.fn(async () => {}),
    clone: vi.fn(async () => {}),
  };
}
