import { describe, it, expect } from "vitest";
import { RegistrySearchPathRefresher, mergeSearchPath } from "./search-path";
import { SUCCESS_RESULT, createScriptedProcessRunner } from "./process.test-utils";
import { createMockLogger } from "../logging/logging.test-utils";
import type { ProcessResult } from "./process";

function registryRunner(machine: ProcessResult, user: ProcessResult) {
  return createScriptedProcessRunner((_command, args) =>
    args.some((arg) => arg.includes("'Machine'")) ? machine : user
  );
}

describe("mergeSearchPath", () => {
  it("keeps the first occurrence of each entry, ignoring case and blanks", () => {
    expect(mergeSearchPath("C:\\Windows;;C:\\Git\\cmd", "c:\\windows;C:\\Users\\t\\bin;")).toBe(
      "C:\\Windows;C:\\Git\\cmd;C:\\Users\\t\\bin"
    );
  });
});

describe("RegistrySearchPathRefresher", () => {
  it("puts the persisted Machine and User entries ahead of the current ones", async () => {
    const runner = registryRunner(
      { exitCode: 0, stdout: "C:\\Windows;C:\\Program Files\\Git\\cmd\r\n", stderr: "" },
      { exitCode: 0, stdout: "C:\\Users\\t\\bin\r\n", stderr: "" }
    );
    const env: NodeJS.ProcessEnv = { Path: "C:\\Windows;C:\\node" };
    const refresher = new RegistrySearchPathRefresher(runner, createMockLogger(), "win32", env, 500);

    await refresher.refresh();

    expect(env.Path).toBe("C:\\Windows;C:\\Program Files\\Git\\cmd;C:\\Users\\t\\bin;C:\\node");
    expect(runner.run).toHaveBeenCalledWith(
      "powershell",
      [
        "-NoProfile",
        "-NonInteractive",
        "-Command",
        "[Environment]::GetEnvironmentVariable('Path','Machine')",
      ],
      { timeout: 500 }
    );
  });

  it("keeps the current path when a query fails", async () => {
    const runner = registryRunner(SUCCESS_RESULT, {
      exitCode: 1,
      stdout: "",
      stderr: "access denied",
    });
    const logger = createMockLogger();
    const env: NodeJS.ProcessEnv = { Path: "C:\\node" };
    const refresher = new RegistrySearchPathRefresher(runner, logger, "win32", env);

    await refresher.refresh();

    expect(env.Path).toBe("C:\\node");
    expect(logger.warn).toHaveBeenCalledWith("Could not read search path; keeping the current one", {
      scope: "User",
      error: "access denied",
    });
  });

  it("does nothing off Windows", async () => {
    const runner = registryRunner(SUCCESS_RESULT, SUCCESS_RESULT);
    const env: NodeJS.ProcessEnv = { PATH: "/usr/bin" };
    const refresher = new RegistrySearchPathRefresher(runner, createMockLogger(), "linux", env);

    await refresher.refresh();

    expect(runner.run).not.toHaveBeenCalled();
    expect(env.PATH).toBe("/usr/bin");
  });
});
