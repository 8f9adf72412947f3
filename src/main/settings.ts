/**
 * Run settings: CLI flags, then environment variables, then defaults.
 */

import path from "node:path";
import { z } from "zod";
import { ConfigError, DEFAULT_CATALOG_PATH } from "../services";

/**
 * Raw option values as parsed by commander.
 */
export interface CliFlags {
  readonly config?: string;
  readonly catalog?: string;
  readonly reposFile?: string;
  readonly cloneDir?: string;
  readonly clone?: boolean;
  readonly strict?: boolean;
  readonly skipElevationCheck?: boolean;
  readonly logLevel?: string;
  readonly logFile?: string;
  readonly installTimeout?: string;
  readonly cloneTimeout?: string;
}

export interface SettingsContext {
  readonly env: NodeJS.ProcessEnv;
  readonly platform: NodeJS.Platform;
  readonly cwd: string;
  readonly homeDir: string;
}

const minutes = z.coerce
  .number({ invalid_type_error: "must be a number of minutes" })
  .positive()
  .transform((value) => Math.round(value * 60_000));

const SettingsSchema = z.object({
  configPath: z.string().min(1),
  catalogPath: z.string().min(1),
  reposFile: z.string().min(1),
  cloneDir: z.string().min(1),
  clone: z.boolean(),
  strict: z.boolean(),
  requireElevation: z.boolean(),
  logLevel: z.enum(["debug", "info", "warn", "error"]),
  logFile: z.string().min(1).optional(),
  installTimeoutMs: minutes,
  cloneTimeoutMs: minutes,
});

export type Settings = Readonly<z.infer<typeof SettingsSchema>>;

export const DEFAULT_INSTALL_TIMEOUT_MINUTES = 30;
export const DEFAULT_CLONE_TIMEOUT_MINUTES = 10;

/**
 * Interpret an environment flag. Unset or unrecognized values yield undefined.
 */
export function parseEnvFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  switch (value.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true;
    case "0":
    case "false":
    case "no":
    case "":
      return false;
    default:
      return undefined;
  }
}

/**
 * Default clone destination: `C:\src` on Windows, `~/src` elsewhere.
 */
export function defaultCloneDir(platform: NodeJS.Platform, homeDir: string): string {
  return platform === "win32" ? "C:\\src" : path.join(homeDir, "src");
}

/**
 * Resolve and validate settings.
 * @throws ConfigError when a value is invalid
 */
export function resolveSettings(flags: CliFlags, context: SettingsContext): Settings {
  const { env, cwd } = context;

  const raw = {
    configPath: flags.config ?? env.RIGUP_CONFIG ?? path.join(cwd, "rigup.config"),
    catalogPath: flags.catalog ?? env.RIGUP_CATALOG ?? DEFAULT_CATALOG_PATH,
    reposFile: flags.reposFile ?? env.RIGUP_REPOS_FILE ?? path.join(cwd, "repos.txt"),
    cloneDir:
      flags.cloneDir ?? env.RIGUP_CLONE_DIR ?? defaultCloneDir(context.platform, context.homeDir),
    clone: flags.clone ?? parseEnvFlag(env.RIGUP_CLONE) ?? false,
    strict: flags.strict ?? parseEnvFlag(env.RIGUP_STRICT) ?? false,
    // Off Windows the editors and git must run as the invoking user, not root
    requireElevation: !(
      flags.skipElevationCheck ??
      parseEnvFlag(env.RIGUP_SKIP_ELEVATION_CHECK) ??
      context.platform !== "win32"
    ),
    logLevel: flags.logLevel ?? env.RIGUP_LOG_LEVEL ?? "info",
    logFile: flags.logFile ?? env.RIGUP_LOG_FILE,
    installTimeoutMs:
      flags.installTimeout ?? env.RIGUP_INSTALL_TIMEOUT ?? DEFAULT_INSTALL_TIMEOUT_MINUTES,
    cloneTimeoutMs: flags.cloneTimeout ?? env.RIGUP_CLONE_TIMEOUT ?? DEFAULT_CLONE_TIMEOUT_MINUTES,
  };

  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid settings: ${issues}`, "INVALID_SETTINGS");
  }
  return result.data;
}
