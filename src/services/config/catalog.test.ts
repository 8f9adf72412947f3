import { describe, it, expect } from "vitest";
import { loadCatalog, validateCatalog } from "./catalog";
import { ConfigError } from "../errors";
import { createMockFileSystem } from "../platform/filesystem.test-utils";

const validCatalog = {
  packageManager: { command: "choco", installArgs: ["install", "--yes"] },
  packages: [{ displayName: "Git", installIdentifier: "git", presenceCheck: "git" }],
  extensions: ["publisher.one"],
  editors: ["code"],
  aliases: { s: "status" },
};

describe("validateCatalog", () => {
  it("accepts a valid catalog", () => {
    expect(validateCatalog(validCatalog)).toEqual(validCatalog);
  });

  it("trims string values", () => {
    const catalog = validateCatalog({ ...validCatalog, editors: ["  code  "] });

    expect(catalog.editors).toEqual(["code"]);
  });

  it("accepts empty lists", () => {
    const catalog = validateCatalog({ ...validCatalog, packages: [], extensions: [], editors: [] });

    expect(catalog.packages).toEqual([]);
  });

  it("rejects blank package fields with the offending path", () => {
    expect(() =>
      validateCatalog({
        ...validCatalog,
        packages: [{ displayName: "Git", installIdentifier: " ", presenceCheck: "git" }],
      })
    ).toThrow(/packages\.0\.installIdentifier/);
  });

  it("rejects alias names that git would not accept", () => {
    expect(() => validateCatalog({ ...validCatalog, aliases: { "bad name": "status" } })).toThrow(
      ConfigError
    );
  });

  it("rejects a missing section", () => {
    const { extensions: _omitted, ...withoutExtensions } = validCatalog;

    expect(() => validateCatalog(withoutExtensions)).toThrow(/extensions/);
  });

  it("uses the INVALID_CATALOG code", () => {
    let caught: unknown;
    try {
      validateCatalog(null);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ code: "INVALID_CATALOG" });
  });
});

describe("loadCatalog", () => {
  it("reads and validates a JSON catalog", async () => {
    const fs = createMockFileSystem({ files: { "/cfg/catalog.json": JSON.stringify(validCatalog) } });

    await expect(loadCatalog(fs, "/cfg/catalog.json")).resolves.toEqual(validCatalog);
  });

  it("reports unreadable files", async () => {
    const fs = createMockFileSystem();

    await expect(loadCatalog(fs, "/cfg/missing.json")).rejects.toThrow(
      "Cannot read catalog /cfg/missing.json"
    );
  });

  it("reports malformed JSON", async () => {
    const fs = createMockFileSystem({ files: { "/cfg/catalog.json": "{ not json" } });

    await expect(loadCatalog(fs, "/cfg/catalog.json")).rejects.toThrow(
      "Catalog /cfg/catalog.json is not valid JSON"
    );
  });
});
