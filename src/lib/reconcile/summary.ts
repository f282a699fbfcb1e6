import { formatCount, formatCountCheck } from "../formatting.js";
import { hasFailures, type OutcomeCounters } from "./counters.js";
import type { ReconcileAction } from "./engine.js";

export type SummaryLevel = "success" | "warning" | "nothing";

export interface PassSummary {
  title: string;
  headline: string;
  details: string[];
  level: SummaryLevel;
}

export function precheckLines(counters: OutcomeCounters): string[] {
  const invalid = formatCount(counters.invalidTemplates, "Found {count} invalid template material{s}");
  return [
    formatCountCheck(counters.geometries, counters.geometries > 0, "Found {count} thread geometr{s}", {
      plural: "ies",
      singular: "y",
    }),
    formatCountCheck(counters.existing, true, "Found {count} existing thread material{s}"),
    formatCountCheck(
      counters.validTemplates,
      counters.validTemplates > 0,
      "Found {count} valid template material{s}"
    ),
    invalid + (counters.invalidTemplates > 0 ? " --> ignore" : " --> ok"),
  ];
}

/**
 * What create mode will do, for the mode prompt.
 */
export function describeCreate(counters: OutcomeCounters): string {
  const create = formatCount(
    counters.geometries * counters.validTemplates,
    "Will create {count} thread material{s}."
  );
  if (counters.existing === 0) {
    return create;
  }
  return `${create} ${formatCount(counters.existing, "{count} existing thread material{s} may be overwritten.")}`;
}

export function describeDelete(counters: OutcomeCounters): string {
  return formatCount(
    counters.existing,
    "Will delete {count} existing thread material{s}. Template or other materials will not be deleted!"
  );
}

export function summarizeReconciliation(
  action: ReconcileAction,
  counters: OutcomeCounters
): PassSummary {
  const failed = hasFailures(counters);
  const title = failed ? "Operation Completed with Errors" : "Operation Completed";
  const details: string[] = [];
  let headline: string;
  let level: SummaryLevel = failed ? "warning" : "success";

  if (action === "create") {
    if (!failed && counters.created === 0 && counters.overwritten === 0) {
      headline = "All thread materials were already present. Did not create new materials.";
      level = "nothing";
    } else {
      headline = formatCount(counters.created + counters.overwritten, "Created {count} thread material{s}.");
    }
    details.push(formatCount(counters.created, "Created {count} new material{s}"));
    details.push(formatCount(counters.overwritten, "Overwrote {count} material{s}"));
    if (counters.skipped > 0) {
      details.push(formatCount(counters.skipped, "Skipped {count} existing material{s}"));
    }
    if (counters.createFailed > 0) {
      details.push(formatCount(counters.createFailed, "Failed to create {count} material{s}"));
    }
    if (counters.overwriteFailed > 0) {
      details.push(formatCount(counters.overwriteFailed, "Failed to overwrite {count} material{s}"));
    }
  } else {
    if (!failed && counters.deleted === 0) {
      headline = "No thread materials were found. Did not delete any materials.";
      level = "nothing";
    } else {
      headline = formatCount(counters.deleted, "Deleted {count} thread material{s}.");
    }
    details.push(formatCount(counters.deleted, "Deleted {count} material{s}"));
    if (counters.deleteFailed > 0) {
      details.push(formatCount(counters.deleteFailed, "Failed to delete {count} material{s}"));
    }
  }

  return { title, headline, details, level };
}
