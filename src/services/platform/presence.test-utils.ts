import { vi, type Mock } from "vitest";
import type { PresenceChecker } from "./presence";

export interface MockPresenceChecker extends PresenceChecker {
  exists: Mock<(identifier: string) => Promise<boolean>>;
}

/**
 * PresenceChecker that reports exactly the given commands as present.
 */
export function createMockPresenceChecker(present: readonly string[] = []): MockPresenceChecker {
  const known = new Set(present);
  return {
    exists: vi.fn(async (identifier: string) => known.has(identifier)),
  };
}
