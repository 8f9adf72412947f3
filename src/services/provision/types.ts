/**
 * Provisioning type definitions.
 * All properties are readonly; catalogs are never mutated after load.
 */

/**
 * A package the machine should have.
 */
export interface DesiredPackage {
  /** Human-readable name for logs */
  readonly displayName: string;
  /** Identifier passed to the package manager */
  readonly installIdentifier: string;
  /** Command whose presence means the package is already installed */
  readonly presenceCheck: string;
}

/**
 * One key/value pair in a tool's global configuration.
 */
export interface ToolConfigEntry {
  readonly key: string;
  readonly value: string;
}

/**
 * Whether the tool being configured is installed.
 */
export type ToolPresence = "present" | "absent";

export type ItemStatus = "installed" | "skipped" | "failed";

/**
 * Outcome of processing one catalog item.
 */
export interface ItemOutcome {
  /** Item identifier (package id, extension id, config key, repository) */
  readonly item: string;
  readonly status: ItemStatus;
  /** Why the item was skipped or failed */
  readonly detail?: string;
}

/**
 * Result of one provisioning step.
 */
export interface StepReport {
  /** Step label shown in the summary, e.g. "packages" or "extensions (code)" */
  readonly step: string;
  readonly outcomes: readonly ItemOutcome[];
  /** Set when the whole step was skipped (tool absent, input missing) */
  readonly skippedReason?: string;
}
