/**
 * Outcome counters of one reconciliation pass.
 * `invalidTemplates` also counts template validation failures.
 */
export interface OutcomeCounters {
  geometries: number;
  validTemplates: number;
  invalidTemplates: number;
  existing: number;
  skipped: number;
  deleted: number;
  overwritten: number;
  created: number;
  deleteFailed: number;
  overwriteFailed: number;
  createFailed: number;
}

export type CounterName = keyof OutcomeCounters;

export function createCounters(): OutcomeCounters {
  return {
    geometries: 0,
    validTemplates: 0,
    invalidTemplates: 0,
    existing: 0,
    skipped: 0,
    deleted: 0,
    overwritten: 0,
    created: 0,
    deleteFailed: 0,
    overwriteFailed: 0,
    createFailed: 0,
  };
}

/** Zero the execution counters, keeping what discovery found. */
export function resetExecutionCounters(counters: OutcomeCounters): void {
  counters.skipped = 0;
  counters.deleted = 0;
  counters.overwritten = 0;
  counters.created = 0;
  counters.deleteFailed = 0;
  counters.overwriteFailed = 0;
  counters.createFailed = 0;
}

export function failureCount(counters: OutcomeCounters): number {
  return counters.deleteFailed + counters.overwriteFailed + counters.createFailed;
}

export function hasFailures(counters: OutcomeCounters): boolean {
  return failureCount(counters) > 0;
}
