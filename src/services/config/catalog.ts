/**
 * Provisioning catalog: packages, extensions, host editors and git aliases.
 *
 * The catalog is data, loaded from JSON and validated with zod, so the
 * drivers can be exercised with synthetic catalogs.
 */

import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError, getErrorMessage } from "../errors";
import type { FileSystemLayer } from "../platform/filesystem";

/**
 * Path of the catalog shipped with the tool.
 */
export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL("./default-catalog.json", import.meta.url)
);

const nonBlank = z.string().trim().min(1);

const DesiredPackageSchema = z.object({
  displayName: nonBlank,
  installIdentifier: nonBlank,
  presenceCheck: nonBlank,
});

const PackageManagerSchema = z.object({
  /** Package manager executable */
  command: nonBlank,
  /** Arguments placed before the package identifier; must include auto-confirm */
  installArgs: z.array(nonBlank),
});

export const CatalogSchema = z.object({
  packageManager: PackageManagerSchema,
  packages: z.array(DesiredPackageSchema),
  extensions: z.array(nonBlank),
  editors: z.array(nonBlank),
  aliases: z.record(z.string().regex(/^[A-Za-z0-9-]+$/), nonBlank),
});

export type Catalog = z.infer<typeof CatalogSchema>;
export type PackageManagerConfig = z.infer<typeof PackageManagerSchema>;

/**
 * Validate an unknown value as a Catalog.
 * @throws ConfigError listing every issue
 */
export function validateCatalog(value: unknown, source = "catalog"): Catalog {
  const result = CatalogSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid ${source}: ${issues}`, "INVALID_CATALOG");
  }
  return result.data;
}

/**
 * Load and validate a catalog file.
 * @throws ConfigError when the file is missing, not JSON, or invalid
 */
export async function loadCatalog(fs: FileSystemLayer, catalogPath: string): Promise<Catalog> {
  let text: string;
  try {
    text = await fs.readFile(catalogPath);
  } catch (error: unknown) {
    throw new ConfigError(
      `Cannot read catalog ${catalogPath}: ${getErrorMessage(error)}`,
      "CATALOG_UNREADABLE"
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error: unknown) {
    throw new ConfigError(
      `Catalog ${catalogPath} is not valid JSON: ${getErrorMessage(error)}`,
      "INVALID_CATALOG"
    );
  }

  return validateCatalog(parsed, `catalog ${catalogPath}`);
}
