import { describe, it, expect } from "vitest";
import { formatLogMessage } from "./types";

describe("formatLogMessage", () => {
  it("returns the message unchanged without context", () => {
    expect(formatLogMessage("Starting")).toBe("Starting");
  });

  it("returns the message unchanged for empty context", () => {
    expect(formatLogMessage("Starting", {})).toBe("Starting");
  });

  it("appends key=value pairs in insertion order", () => {
    expect(formatLogMessage("Installed", { id: "git", exitCode: 0, forced: true })).toBe(
      "Installed id=git exitCode=0 forced=true"
    );
  });

  it("renders null values", () => {
    expect(formatLogMessage("Exited", { exitCode: null })).toBe("Exited exitCode=null");
  });
});
