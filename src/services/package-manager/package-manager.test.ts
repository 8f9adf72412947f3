import { describe, it, expect } from "vitest";
import { CommandPackageManager } from "./package-manager";
import { createMockProcessRunner, createMockSpawnedProcess } from "../platform/process.test-utils";

describe("CommandPackageManager", () => {
  const config = { command: "choco", installArgs: ["install", "--yes"] };

  it("is named after its command", () => {
    expect(new CommandPackageManager(config, createMockProcessRunner()).name).toBe("choco");
  });

  it("appends the package identifier to the install arguments", async () => {
    const runner = createMockProcessRunner();
    const manager = new CommandPackageManager(config, runner, 60_000);

    const outcome = await manager.install("git");

    expect(runner.run).toHaveBeenCalledWith("choco", ["install", "--yes", "git"], {
      timeout: 60_000,
    });
    expect(outcome).toEqual({ ok: true, exitCode: 0 });
  });

  it("resolves with a failed outcome instead of rejecting", async () => {
    const runner = createMockProcessRunner(
      createMockSpawnedProcess({
        waitResult: { exitCode: 1, stdout: "", stderr: "The package was not found" },
      })
    );
    const manager = new CommandPackageManager(config, runner);

    await expect(manager.install("nope")).resolves.toEqual({
      ok: false,
      exitCode: 1,
      error: "exited with code 1: The package was not found",
    });
  });
});
