import { describe, it, expect, beforeEach } from "vitest";
import { IdentityApplier, aliasEntries } from "./identity-applier";
import { createMockGitClient, type MockGitClient } from "../git/git.test-utils";
import { createMockLogger, type MockLogger } from "../logging/logging.test-utils";
import { GitError } from "../errors";

const ALIASES = {
  cb: "rev-parse --abbrev-ref HEAD",
  b: "branch",
  a: "add",
  c: "commit",
  p: "push",
  f: "fetch",
  l: "log",
  co: "checkout",
  s: "status",
  d: "diff",
};

const ALIAS_KEYS = [
  "alias.cb",
  "alias.b",
  "alias.a",
  "alias.c",
  "alias.p",
  "alias.f",
  "alias.l",
  "alias.co",
  "alias.s",
  "alias.d",
];

describe("aliasEntries", () => {
  it("prefixes alias names and keeps table order", () => {
    expect(aliasEntries({ s: "status", cb: "rev-parse --abbrev-ref HEAD" })).toEqual([
      { key: "alias.s", value: "status" },
      { key: "alias.cb", value: "rev-parse --abbrev-ref HEAD" },
    ]);
  });
});

describe("IdentityApplier", () => {
  let git: MockGitClient;
  let logger: MockLogger;
  let applier: IdentityApplier;

  beforeEach(() => {
    git = createMockGitClient();
    logger = createMockLogger();
    applier = new IdentityApplier(git, ALIASES, logger);
  });

  function writtenKeys(): string[] {
    return git.setGlobalConfig.mock.calls.map((call) => call[0]);
  }

  it("does nothing but warn when git is absent", async () => {
    const report = await applier.applyIdentity("absent", "Test User", "test@example.com");

    expect(git.setGlobalConfig).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith("git not found; skipping git configuration");
    expect(report).toEqual({ step: "git config", outcomes: [], skippedReason: "git not installed" });
  });

  it("applies identity then every alias when both fields are set", async () => {
    await applier.applyIdentity("present", "Test User", "test@example.com");

    expect(git.setGlobalConfig).toHaveBeenNthCalledWith(1, "user.name", "Test User");
    expect(git.setGlobalConfig).toHaveBeenNthCalledWith(2, "user.email", "test@example.com");
    expect(writtenKeys()).toEqual(["user.name", "user.email", ...ALIAS_KEYS]);
  });

  it("skips identity but applies the full alias table when the name is empty", async () => {
    const report = await applier.applyIdentity("present", "", "x@y.com");

    expect(writtenKeys()).toEqual(ALIAS_KEYS);
    expect(git.setGlobalConfig).toHaveBeenCalledWith("alias.cb", "rev-parse --abbrev-ref HEAD");
    expect(logger.warn).toHaveBeenCalledWith(
      "Git identity not configured; set GitUserName and GitUserEmail",
      { hasName: false, hasEmail: true }
    );
    expect(report.outcomes).toHaveLength(10);
  });

  it("skips identity when the email is missing", async () => {
    await applier.applyIdentity("present", "Test User");

    expect(writtenKeys()).toEqual(ALIAS_KEYS);
  });

  it("treats whitespace-only values as empty", async () => {
    await applier.applyIdentity("present", "   ", "test@example.com");

    expect(writtenKeys()).not.toContain("user.name");
    expect(writtenKeys()).not.toContain("user.email");
  });

  it("trims identity values before writing", async () => {
    await applier.applyIdentity("present", "  Test User ", " test@example.com ");

    expect(git.setGlobalConfig).toHaveBeenNthCalledWith(1, "user.name", "Test User");
    expect(git.setGlobalConfig).toHaveBeenNthCalledWith(2, "user.email", "test@example.com");
  });

  it("records a failed write and keeps applying the rest", async () => {
    git.setGlobalConfig.mockImplementation(async (key: string) => {
      if (key === "alias.b") {
        throw new GitError("Failed to set alias.b: locked");
      }
    });

    const report = await applier.applyIdentity("present", "Test User", "test@example.com");

    expect(writtenKeys()).toEqual(["user.name", "user.email", ...ALIAS_KEYS]);
    expect(report.outcomes.filter((o) => o.status === "failed")).toEqual([
      { item: "alias.b", status: "failed", detail: "Failed to set alias.b: locked" },
    ]);
  });
});
