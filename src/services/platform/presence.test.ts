import { describe, it, expect, beforeEach } from "vitest";
import { CommandPresenceChecker, lookupCommand } from "./presence";
import {
  createMockProcessRunner,
  createMockSpawnedProcess,
  type MockProcessRunner,
} from "./process.test-utils";
import { createMockLogger } from "../logging/logging.test-utils";

describe("lookupCommand", () => {
  it("uses command -v with a positional parameter on POSIX", () => {
    expect(lookupCommand("git", "linux")).toEqual({
      command: "sh",
      args: ["-c", 'command -v -- "$1"', "sh", "git"],
    });
  });

  it("uses where.exe on Windows", () => {
    expect(lookupCommand("git", "win32")).toEqual({ command: "where.exe", args: ["git"] });
  });
});

describe("CommandPresenceChecker", () => {
  let runner: MockProcessRunner;

  beforeEach(() => {
    runner = createMockProcessRunner();
  });

  it("reports present when the lookup exits 0", async () => {
    runner.run.mockReturnValue(
      createMockSpawnedProcess({ waitResult: { exitCode: 0, stdout: "/usr/bin/git\n", stderr: "" } })
    );
    const checker = new CommandPresenceChecker(runner, createMockLogger(), "linux", 500);

    await expect(checker.exists("git")).resolves.toBe(true);
    expect(runner.run).toHaveBeenCalledWith(
      "sh",
      ["-c", 'command -v -- "$1"', "sh", "git"],
      { timeout: 500 }
    );
  });

  it("reports absent when the lookup exits non-zero", async () => {
    runner.run.mockReturnValue(
      createMockSpawnedProcess({ waitResult: { exitCode: 1, stdout: "", stderr: "" } })
    );
    const checker = new CommandPresenceChecker(runner, createMockLogger(), "win32");

    await expect(checker.exists("code")).resolves.toBe(false);
    expect(runner.run).toHaveBeenCalledWith("where.exe", ["code"], { timeout: 10_000 });
  });

  it("reports absent when the lookup cannot be spawned", async () => {
    runner.run.mockReturnValue(
      createMockSpawnedProcess({
        pid: null,
        waitResult: { exitCode: null, stdout: "", stderr: "spawn sh ENOENT" },
      })
    );
    const checker = new CommandPresenceChecker(runner, createMockLogger(), "linux");

    await expect(checker.exists("git")).resolves.toBe(false);
  });

  it("reports absent instead of rejecting when the runner throws", async () => {
    runner.run.mockImplementation(() => {
      throw new Error("runner exploded");
    });
    const logger = createMockLogger();
    const checker = new CommandPresenceChecker(runner, logger, "linux");

    await expect(checker.exists("git")).resolves.toBe(false);
    expect(logger.debug).toHaveBeenCalledWith("Presence check failed", {
      identifier: "git",
      error: "runner exploded",
    });
  });

  it("reports absent for blank identifiers without spawning", async () => {
    const checker = new CommandPresenceChecker(runner, createMockLogger(), "linux");

    await expect(checker.exists("   ")).resolves.toBe(false);
    expect(runner.run).not.toHaveBeenCalled();
  });

  it("trims the identifier before lookup", async () => {
    const checker = new CommandPresenceChecker(runner, createMockLogger(), "win32");

    await checker.exists(" node ");

    expect(runner.run).toHaveBeenCalledWith("where.exe", ["node"], { timeout: 10_000 });
  });
});
