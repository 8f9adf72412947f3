/**
 * Run configuration: identity values read once from a key/value file.
 *
 * Format, one entry per line:
 *   GitUserName = Jane Doe
 *   GitUserEmail: "jane@example.com"
 * Blank lines and lines starting with `#` or `;` are ignored. Keys are
 * case-insensitive. Unknown keys are ignored.
 */

import type { FileSystemLayer } from "../platform/filesystem";
import type { Logger } from "../logging";
import { getErrorMessage } from "../errors";

export interface RunConfiguration {
  readonly identityName?: string;
  readonly identityEmail?: string;
}

export const EMPTY_RUN_CONFIGURATION: RunConfiguration = {};

const KEY_NAME = "gitusername";
const KEY_EMAIL = "gituseremail";

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return value.slice(1, -1);
    }
  }
  return value;
}

/**
 * Parse key/value text into a map of lower-cased keys to values.
 * Later duplicates win.
 */
export function parseKeyValueText(text: string): Map<string, string> {
  const entries = new Map<string, string>();

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#") || line.startsWith(";")) {
      continue;
    }

    const separator = line.search(/[=:]/);
    if (separator <= 0) {
      continue;
    }

    const key = line.slice(0, separator).trim().toLowerCase();
    const value = unquote(line.slice(separator + 1).trim());
    entries.set(key, value);
  }

  return entries;
}

/**
 * Build a RunConfiguration from key/value text.
 * Empty values count as unset.
 */
export function parseRunConfiguration(text: string): RunConfiguration {
  const entries = parseKeyValueText(text);
  const name = entries.get(KEY_NAME)?.trim();
  const email = entries.get(KEY_EMAIL)?.trim();

  return {
    ...(name ? { identityName: name } : {}),
    ...(email ? { identityEmail: email } : {}),
  };
}

/**
 * Load the run configuration.
 *
 * A missing file yields an empty configuration. An unreadable file is logged
 * and also yields an empty configuration, so only the identity step degrades.
 */
export async function loadRunConfiguration(
  fs: FileSystemLayer,
  configPath: string,
  logger: Logger
): Promise<RunConfiguration> {
  if (!(await fs.pathExists(configPath))) {
    logger.info("No run configuration found; identity will not be configured", {
      path: configPath,
    });
    return EMPTY_RUN_CONFIGURATION;
  }

  let text: string;
  try {
    text = await fs.readFile(configPath);
  } catch (error: unknown) {
    logger.warn("Could not read run configuration; identity will not be configured", {
      path: configPath,
      error: getErrorMessage(error),
    });
    return EMPTY_RUN_CONFIGURATION;
  }

  const config = parseRunConfiguration(text);
  logger.debug("Loaded run configuration", {
    path: configPath,
    hasName: config.identityName !== undefined,
    hasEmail: config.identityEmail !== undefined,
  });
  return config;
}
