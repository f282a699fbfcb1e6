import fg from "fast-glob";
import { join } from "node:path";
import { SCHEDULE_KINDS, ScheduleKind, type OutputFileKey, type ScheduleKindType } from "../constants.js";
import type { BoltGeometry } from "../geometry/bolt-geometry.js";
import type { TextFileSink, WriteOutcome } from "../file-sink.js";
import type { PassLog } from "../pass-log.js";
import type { ScheduleOption } from "../prompt.js";
import type { PassSummary } from "../reconcile/summary.js";
import { formatErrorChain } from "../errors.js";
import { formatCount } from "../formatting.js";
import { renderAssemblyCatalog, renderBoltCatalog, type CatalogOptions } from "./type-catalogs.js";
import {
  renderDiameterBandingTable,
  renderGeometryParameterTable,
  renderGripToLengthTable,
} from "./lookup-tables.js";
import { renderGeometryHtml } from "./geometry-html.js";

export interface FileJob {
  key: OutputFileKey;
  fileName: string;
  render: () => string;
}

export interface ScheduleContext {
  geometries: readonly BoltGeometry[];
  catalog: CatalogOptions;
  files: Record<OutputFileKey, string>;
}

export type FileOutcome = WriteOutcome | "failed";

export interface FileResult {
  fileName: string;
  path: string;
  outcome: FileOutcome;
  error?: unknown;
}

export const SCHEDULE_KEYS: Record<ScheduleKindType, readonly OutputFileKey[]> = {
  [ScheduleKind.TypeCatalogs]: ["boltCatalog", "assemblyCatalog"],
  [ScheduleKind.LookupTables]: ["gripToLength", "geometry", "diameters"],
  [ScheduleKind.GeometryHtml]: ["geometryHtml"],
};

const SCHEDULE_LABELS: Record<ScheduleKindType, string> = {
  [ScheduleKind.TypeCatalogs]: "Create type catalog files",
  [ScheduleKind.LookupTables]: "Create lookup table files",
  [ScheduleKind.GeometryHtml]: "Dump geometry parameters to an HTML table",
};

export function scheduleJobs(kind: ScheduleKindType, ctx: ScheduleContext): FileJob[] {
  const { geometries, catalog } = ctx;
  const renderers: Record<OutputFileKey, () => string> = {
    boltCatalog: () => renderBoltCatalog(geometries, catalog),
    assemblyCatalog: () => renderAssemblyCatalog(geometries, catalog),
    gripToLength: () => renderGripToLengthTable(geometries, catalog.delimiter),
    geometry: () => renderGeometryParameterTable(geometries, catalog.delimiter),
    diameters: () => renderDiameterBandingTable(geometries, catalog.delimiter),
    geometryHtml: () => renderGeometryHtml(geometries),
  };
  return SCHEDULE_KEYS[kind].map((key) => ({
    key,
    fileName: ctx.files[key],
    render: renderers[key],
  }));
}

/**
 * Menu entries for the schedule prompt, with how many of each schedule's files already exist.
 */
export function scheduleOptions(
  files: Record<OutputFileKey, string>,
  existing: readonly string[]
): ScheduleOption[] {
  return SCHEDULE_KINDS.map((kind) => {
    const names = SCHEDULE_KEYS[kind].map((key) => files[key]);
    const present = names.filter((n) => existing.includes(n)).length;
    let description = formatCount(names.length, "Will create {count} file{s}.");
    if (present > 0) {
      description += " " + formatCount(present, "{count} existing file{s} may be overwritten.");
    }
    return { kind, label: SCHEDULE_LABELS[kind], description };
  });
}

/**
 * Names of the given files that already exist in `dir`.
 */
export async function findExistingFiles(dir: string, fileNames: readonly string[]): Promise<string[]> {
  const matches = await fg(
    fileNames.map((name) => fg.escapePath(name)),
    { cwd: dir, onlyFiles: true, dot: true }
  );
  return fileNames.filter((name) => matches.includes(name));
}

export interface RunScheduleOptions {
  dir: string;
  sink: TextFileSink;
  overwrite: boolean;
  log: PassLog;
}

/**
 * Render and write every job; a failed write does not stop the remaining ones.
 */
export async function runSchedule(jobs: readonly FileJob[], options: RunScheduleOptions): Promise<FileResult[]> {
  const { dir, sink, overwrite, log } = options;
  const results: FileResult[] = [];
  for (const job of jobs) {
    const path = join(dir, job.fileName);
    log.line();
    log.line(path);
    try {
      const outcome = await sink.write(path, job.render(), overwrite);
      log.line(`- ${outcome}`);
      results.push({ fileName: job.fileName, path, outcome });
    } catch (error) {
      log.line("- failed");
      log.line(formatErrorChain(error));
      results.push({ fileName: job.fileName, path, outcome: "failed", error });
    }
  }
  return results;
}

export function summarizeFileResults(results: readonly FileResult[]): PassSummary {
  const count = (outcome: FileOutcome): number => results.filter((r) => r.outcome === outcome).length;
  const created = count("created");
  const overwritten = count("overwritten");
  const skipped = count("skipped");
  const failed = count("failed");

  const title = failed > 0 ? "Operation Completed with Errors" : "Operation Completed";
  const details = results.map(
    (r) => `${r.fileName} (${r.outcome === "failed" ? "ERROR" : r.outcome})`
  );

  if (created + overwritten + failed === 0 && skipped > 0) {
    return {
      title,
      headline: "All output files were present. Nothing to be done.",
      details,
      level: "nothing",
    };
  }

  const parts: string[] = [];
  if (created > 0) parts.push(formatCount(created, "{count} file{s} created."));
  if (overwritten > 0) parts.push(formatCount(overwritten, "{count} file{s} overwritten."));
  if (skipped > 0) parts.push(formatCount(skipped, "{count} file{s} skipped."));
  if (failed > 0) parts.push(formatCount(failed, "{count} error{s} occurred."));

  return {
    title,
    headline: parts.join(" "),
    details,
    level: failed > 0 ? "warning" : "success",
  };
}
