/**
 * Test utilities for process module.
 */
import { vi, type Mock } from "vitest";
import type { SpawnedProcess, ProcessResult, ProcessRunner, ProcessOptions } from "./process";

/**
 * Mock SpawnedProcess with vitest mock methods for assertions.
 */
export interface MockSpawnedProcess extends SpawnedProcess {
  kill: Mock<(signal?: NodeJS.Signals) => boolean>;
  wait: Mock<(timeout?: number) => Promise<ProcessResult>>;
}

/**
 * Mock ProcessRunner with vitest mock method for assertions.
 */
export interface MockProcessRunner extends ProcessRunner {
  run: Mock<(command: string, args: readonly string[], options?: ProcessOptions) => SpawnedProcess>;
}

export const SUCCESS_RESULT: ProcessResult = { exitCode: 0, stdout: "", stderr: "" };

/**
 * Create a mock SpawnedProcess with controllable behavior.
 * Pass `pid: null` to simulate a spawn failure (pid undefined).
 */
export function createMockSpawnedProcess(overrides?: {
  pid?: number | null;
  killResult?: boolean;
  waitResult?: ProcessResult | (() => Promise<ProcessResult>);
}): MockSpawnedProcess {
  const pid = overrides?.pid === null ? undefined : (overrides?.pid ?? 12345);

  return {
    pid,
    kill: vi.fn().mockReturnValue(overrides?.killResult ?? true),
    wait: vi.fn().mockImplementation(async () => {
      if (typeof overrides?.waitResult === "function") {
        return overrides.waitResult();
      }
      return overrides?.waitResult ?? SUCCESS_RESULT;
    }),
  };
}

/**
 * Create a mock ProcessRunner returning the given SpawnedProcess.
 */
export function createMockProcessRunner(spawnedProcess?: SpawnedProcess): MockProcessRunner {
  return {
    run: vi.fn().mockReturnValue(spawnedProcess ?? createMockSpawnedProcess()),
  };
}

/**
 * Create a mock ProcessRunner whose result depends on the invocation.
 * The handler returns the ProcessResult for each (command, args) pair.
 *
 * @example
 * ```typescript
 * const runner = createScriptedProcessRunner((command, args) =>
 *   args.includes("broken") ? { exitCode: 1, stdout: "", stderr: "nope" } : SUCCESS_RESULT
 * );
 * ```
 */
export function createScriptedProcessRunner(
  handler: (command: string, args: readonly string[]) => ProcessResult
): MockProcessRunner {
  return {
    run: vi.fn().mockImplementation((command: string, args: readonly string[]) =>
      createMockSpawnedProcess({ waitResult: handler(command, args) })
    ),
  };
}
