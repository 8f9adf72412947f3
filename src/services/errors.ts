/**
 * Central error definitions for the services layer.
 *
 * All service errors extend ServiceError so callers can discriminate on
 * `type` and serialize them for the run summary.
 */

/**
 * Serialized form of a ServiceError.
 */
export interface SerializedServiceError {
  readonly type: ServiceErrorType;
  readonly message: string;
  readonly code?: string;
}

export type ServiceErrorType = "config" | "git";

/**
 * Base class for all service errors.
 */
export abstract class ServiceError extends Error {
  abstract readonly type: ServiceErrorType;

  constructor(
    message: string,
    /** Optional machine-readable code */
    readonly code?: string
  ) {
    super(message);
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedServiceError {
    return {
      type: this.type,
      message: this.message,
      ...(this.code !== undefined && { code: this.code }),
    };
  }
}

/**
 * Invalid or unreadable configuration (settings, catalog, run config).
 */
export class ConfigError extends ServiceError {
  readonly type = "config" as const;
  readonly name = "ConfigError";
}

/**
 * Git operation failed.
 */
export class GitError extends ServiceError {
  readonly type = "git" as const;
  readonly name = "GitError";
}

/**
 * Type guard for ServiceError instances.
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

/**
 * Extract a human-readable message from any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "Unknown error";
}
