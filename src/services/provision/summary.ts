/**
 * Run summary built from the step reports.
 */

import type { ItemStatus, StepReport } from "./types";

export type StatusCounts = Readonly<Record<ItemStatus, number>>;

export function countOutcomes(report: StepReport): StatusCounts {
  const counts = { installed: 0, skipped: 0, failed: 0 };
  for (const outcome of report.outcomes) {
    counts[outcome.status] += 1;
  }
  return counts;
}

export function hasFailures(reports: readonly StepReport[]): boolean {
  return reports.some((report) => report.outcomes.some((outcome) => outcome.status === "failed"));
}

/**
 * Render one line per step, followed by one indented line per failure.
 *
 * @example
 * packages: 2 installed, 1 skipped, 1 failed
 *   ✗ docker-desktop: exited with code 1
 * repositories: skipped (repos.txt not found)
 */
export function formatSummary(reports: readonly StepReport[]): string[] {
  const lines: string[] = [];

  for (const report of reports) {
    if (report.skippedReason !== undefined) {
      lines.push(`${report.step}: skipped (${report.skippedReason})`);
      continue;
    }

    const counts = countOutcomes(report);
    lines.push(
      `${report.step}: ${counts.installed} installed, ${counts.skipped} skipped, ${counts.failed} failed`
    );
    for (const outcome of report.outcomes) {
      if (outcome.status === "failed") {
        lines.push(`  ✗ ${outcome.item}: ${outcome.detail ?? "failed"}`);
      }
    }
  }

  return lines;
}
